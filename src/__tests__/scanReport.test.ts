/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { PatternedFileRecord } from '../common/fileTypes';
import { formatPatternedReport, writePatternedReport } from '../main/scanReport';

const record = (prefix: string, baseFilename: string, folder: string, internalTitle: string): PatternedFileRecord => ({
  prefix,
  baseFilename,
  folder,
  internalTitle,
  path: path.join('/library', folder, `${prefix} ${baseFilename}`),
});

describe('patterned report', () => {
  it('pads columns to the minimum widths and sorts by pattern then filename', () => {
    const report = formatPatternedReport([
      record('B C', 'zeta.pdf', 'papers', 'Zeta'),
      record('A B', 'beta.pdf', '[root]', ''),
      record('A B', 'alpha.pdf', 'papers', 'Alpha'),
    ]);

    expect(report.split('\n')).toEqual([
      `${'Pattern'.padEnd(10)} ${'Filename'.padEnd(20)} ${'Folder'.padEnd(20)} Internal Title`,
      '-'.repeat(100),
      `${'A B'.padEnd(10)} ${'alpha.pdf'.padEnd(20)} ${'papers'.padEnd(20)} Alpha`,
      `${'A B'.padEnd(10)} ${'beta.pdf'.padEnd(20)} ${'[root]'.padEnd(20)} `,
      `${'B C'.padEnd(10)} ${'zeta.pdf'.padEnd(20)} ${'papers'.padEnd(20)} Zeta`,
      '',
    ]);
  });

  it('widens a column to its longest value plus two', () => {
    const longName = 'a-very-long-document-name.pdf';
    const report = formatPatternedReport([record('A B C D E F', longName, 'x', 'T')]);
    const [header, rule, row] = report.split('\n');

    expect(header).toBe(`${'Pattern'.padEnd(13)} ${'Filename'.padEnd(31)} ${'Folder'.padEnd(20)} Internal Title`);
    expect(rule).toBe('-'.repeat(13 + 31 + 20 + 50));
    expect(row).toBe(`${'A B C D E F'.padEnd(13)} ${longName.padEnd(31)} ${'x'.padEnd(20)} T`);
  });

  it('writes pdf-document.txt into the work folder', async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-report-'));
    try {
      const records = [record('A B', 'alpha.pdf', 'papers', 'Alpha')];
      const written = await writePatternedReport(records, path.join(workDir, 'coffeetable'));

      expect(written).toBe(path.join(workDir, 'coffeetable', 'pdf-document.txt'));
      await expect(fs.readFile(path.join(workDir, 'coffeetable', 'pdf-document.txt'), 'utf8')).resolves.toBe(
        formatPatternedReport(records),
      );
      await expect(writePatternedReport([], workDir)).resolves.toBeNull();
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });
});
