/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ValidationError } from '../src/common/errors';
import { run } from '../src/main/main';

describe('pdf-tok-catalog command line', () => {
  const originalEnv = { ...process.env };
  let workspace: string;
  let output: string[];

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-cli-'));
    process.env.PDF_CATALOG_ROOT = path.join(workspace, 'library');
    process.env.PDF_CATALOG_WORK_DIR = path.join(workspace, 'inbox');
    process.env.PDF_CATALOG_DATA_DIR = path.join(workspace, 'data');
    output = [];
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.env = { ...originalEnv };
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('scans the library and prints the differences', async () => {
    await fs.mkdir(path.join(workspace, 'library', 'folder1'), { recursive: true });
    await fs.mkdir(path.join(workspace, 'library', 'folder2'), { recursive: true });
    await fs.writeFile(path.join(workspace, 'library', 'folder1', 'A B report.pdf'), 'x'.repeat(100));
    await fs.writeFile(path.join(workspace, 'library', 'folder2', 'report.pdf'), 'y'.repeat(100));

    await run(['scan']);

    expect(output).toEqual([
      'PDFs found: 2',
      'Files with duplicate sizes: 2',
      'No previous catalog found - this is the first scan',
      'Changes: FIRST_SCAN=1',
      `Saved ${path.join(workspace, 'data', 'pdf-files-by-size.json')}`,
    ]);
  });

  it('edits and prints the classification list', async () => {
    await run(['tok', 'add', 'A', 'Science']);
    await run(['tok', 'add', 'AB', 'Applied', 'physics']);
    output = [];

    await run(['tok', 'tree']);

    expect(output).toEqual(['A  Science\n  AB  Applied physics']);
  });

  it('prefixes a listed file by row', async () => {
    await fs.mkdir(path.join(workspace, 'inbox'), { recursive: true });
    await fs.writeFile(path.join(workspace, 'inbox', 'paper.pdf'), 'paper');

    await run(['prefix', '1', 'XY']);

    expect(output[0]).toBe('paper.pdf -> X Y paper.pdf');
    await expect(fs.readdir(path.join(workspace, 'inbox'))).resolves.toEqual(['X Y paper.pdf']);
  });

  it('rejects unknown commands and bad rows', async () => {
    await expect(run(['shuffle'])).rejects.toBeInstanceOf(ValidationError);
    await expect(run(['rename', 'first', 'x.pdf'])).rejects.toBeInstanceOf(ValidationError);
  });

  it('prints usage without a command', async () => {
    await run([]);
    expect(output[0]).toMatch(/^Usage: pdf-tok-catalog <command>/);
  });
});
