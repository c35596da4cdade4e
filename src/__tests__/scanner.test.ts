/** @jest-environment ./jest/nodeRealmEnvironment.js */
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { IOError, NotFoundError } from '../common/errors';
import { isPdfFilename, scanPatternedOnly, scanPdfFiles } from '../main/scanner';

describe('scanPdfFiles', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-test-'));
    await fs.mkdir(path.join(tempDir, 'folder1', 'deep'), { recursive: true });
    await fs.mkdir(path.join(tempDir, 'folder2'));
    await fs.mkdir(path.join(tempDir, 'RAG'));
    await fs.writeFile(path.join(tempDir, 'root.pdf'), 'root');
    await fs.writeFile(path.join(tempDir, 'UPPER.PDF'), 'upper');
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'not a pdf');
    await fs.writeFile(path.join(tempDir, 'folder1', 'A B report.pdf'), 'x'.repeat(100));
    await fs.writeFile(path.join(tempDir, 'folder1', 'deep', 'manual.pdf'), 'manual');
    await fs.writeFile(path.join(tempDir, 'folder2', 'report.pdf'), 'y'.repeat(100));
    await fs.writeFile(path.join(tempDir, 'RAG', 'skipped.pdf'), 'skip');
    await fs.symlink(
      path.join(tempDir, 'folder1', 'A B report.pdf'),
      path.join(tempDir, 'folder2', 'linked.pdf'),
    );
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('visits files before subfolders in code-point order', async () => {
    const records = await scanPdfFiles(tempDir, { excludeDirNames: ['RAG'] });

    expect(records.map((record) => [record.folder, record.baseFilename])).toEqual([
      ['[root]', 'UPPER.PDF'],
      ['[root]', 'root.pdf'],
      ['folder1', 'report.pdf'],
      ['folder1/deep', 'manual.pdf'],
      ['folder2', 'report.pdf'],
    ]);
  });

  it('records the code, size and times of each file', async () => {
    const records = await scanPdfFiles(tempDir, { excludeDirNames: ['RAG'] });
    const prefixed = records.find((record) => record.folder === 'folder1');

    expect(prefixed).toMatchObject({ baseFilename: 'report.pdf', classificationCode: 'AB', sizeBytes: 100 });
    expect(prefixed?.createdAt).toBeInstanceOf(Date);
    expect(prefixed?.modifiedAt).toBeInstanceOf(Date);
    expect(records.find((record) => record.folder === 'folder2')?.classificationCode).toBe('');
  });

  it('descends into folders that are not excluded', async () => {
    const records = await scanPdfFiles(tempDir);
    expect(records.some((record) => record.folder === 'RAG' && record.baseFilename === 'skipped.pdf')).toBe(true);
  });

  it('rejects a missing root and a root that is a file', async () => {
    await expect(scanPdfFiles(path.join(tempDir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
    await expect(scanPdfFiles(path.join(tempDir, 'root.pdf'))).rejects.toBeInstanceOf(IOError);
  });

  it('detects PDFs by extension regardless of case', () => {
    expect(isPdfFilename('a.pdf')).toBe(true);
    expect(isPdfFilename('a.PDF')).toBe(true);
    expect(isPdfFilename('a.pdf.txt')).toBe(false);
    expect(isPdfFilename('pdf')).toBe(false);
    expect(isPdfFilename('.pdf')).toBe(true);
  });
});

describe('scanPdfFiles with unreadable entries', () => {
  let tempDir: string;

  const accessDenied = () => Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-errors-'));
    await fs.mkdir(path.join(tempDir, 'locked'));
    await fs.mkdir(path.join(tempDir, 'open'));
    await fs.writeFile(path.join(tempDir, 'a.pdf'), 'a');
    await fs.writeFile(path.join(tempDir, 'b.pdf'), 'b');
    await fs.writeFile(path.join(tempDir, 'locked', 'hidden.pdf'), 'hidden');
    await fs.writeFile(path.join(tempDir, 'open', 'c.pdf'), 'c');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reports a file that cannot be read and keeps walking', async () => {
    const realStat = fs.stat;
    // The root is checked first; the second stat is the first file, a.pdf.
    jest.spyOn(fs, 'stat').mockImplementationOnce(realStat).mockRejectedValueOnce(accessDenied());
    const onFileError = jest.fn();

    const records = await scanPdfFiles(tempDir, { onFileError });

    expect(records.map((record) => [record.folder, record.baseFilename])).toEqual([
      ['[root]', 'b.pdf'],
      ['locked', 'hidden.pdf'],
      ['open', 'c.pdf'],
    ]);
    expect(onFileError).toHaveBeenCalledTimes(1);
    expect(onFileError).toHaveBeenCalledWith(path.join(path.resolve(tempDir), 'a.pdf'), expect.any(Error));
  });

  it('skips a subfolder that cannot be listed', async () => {
    const realReaddir = fs.readdir;
    // The root is listed first; the second listing is the first subfolder, locked.
    jest.spyOn(fs, 'readdir').mockImplementationOnce(realReaddir).mockRejectedValueOnce(accessDenied());

    const records = await scanPdfFiles(tempDir);

    expect(records.map((record) => [record.folder, record.baseFilename])).toEqual([
      ['[root]', 'a.pdf'],
      ['[root]', 'b.pdf'],
      ['open', 'c.pdf'],
    ]);
  });

  it('fails when the root itself cannot be listed', async () => {
    jest.spyOn(fs, 'readdir').mockRejectedValueOnce(accessDenied());
    await expect(scanPdfFiles(tempDir)).rejects.toThrow('EACCES: permission denied');
  });
});

describe('scanPatternedOnly', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patterned-test-'));
    await fs.mkdir(path.join(tempDir, 'papers'));
    await fs.writeFile(path.join(tempDir, 'papers', 'A B 3 optics.pdf'), 'optics');
    await fs.writeFile(path.join(tempDir, 'papers', 'plain.pdf'), 'plain');
    await fs.writeFile(path.join(tempDir, 'Z Z broken.pdf'), 'broken');
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('keeps only prefixed files and reads their titles', async () => {
    const readTitle = jest.fn(async (filePath: string) => `title of ${path.basename(filePath)}`);
    const records = await scanPatternedOnly(tempDir, { readTitle });

    expect(records).toEqual([
      {
        prefix: 'Z Z',
        baseFilename: 'broken.pdf',
        folder: '[root]',
        internalTitle: 'title of Z Z broken.pdf',
        path: path.join(path.resolve(tempDir), 'Z Z broken.pdf'),
      },
      {
        prefix: 'A B 3',
        baseFilename: 'optics.pdf',
        folder: 'papers',
        internalTitle: 'title of A B 3 optics.pdf',
        path: path.join(path.resolve(tempDir), 'papers', 'A B 3 optics.pdf'),
      },
    ]);
    expect(readTitle).toHaveBeenCalledTimes(2);
  });

  it('reports files whose title reader throws and carries on', async () => {
    const onFileError = jest.fn();
    const records = await scanPatternedOnly(tempDir, {
      onFileError,
      readTitle: async (filePath) => {
        if (filePath.endsWith('broken.pdf')) throw new Error('unreadable');
        return '';
      },
    });

    expect(records.map((record) => record.baseFilename)).toEqual(['optics.pdf']);
    expect(onFileError).toHaveBeenCalledWith(path.join(path.resolve(tempDir), 'Z Z broken.pdf'), expect.any(Error));
  });
});
