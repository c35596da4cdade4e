/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConflictError, NotFoundError, ValidationError } from '../common/errors';
import { listBareFiles } from '../main/bareFiles';

describe('listBareFiles', () => {
  let folder: string;

  const touch = async (name: string, modified: Date) => {
    const filePath = path.join(folder, name);
    await fs.writeFile(filePath, name);
    await fs.utimes(filePath, modified, modified);
  };

  beforeEach(async () => {
    folder = await fs.mkdtemp(path.join(os.tmpdir(), 'bare-files-'));
    await touch('older.pdf', new Date(2024, 0, 1));
    await touch('newest.pdf', new Date(2024, 5, 1));
    await touch('b-tie.pdf', new Date(2024, 2, 1));
    await touch('a-tie.pdf', new Date(2024, 2, 1));
    await touch('A B classified.pdf', new Date(2024, 8, 1));
    await touch('notes.txt', new Date(2024, 8, 1));
    await fs.mkdir(path.join(folder, 'sub.pdf'));
  });

  afterEach(async () => {
    await fs.rm(folder, { recursive: true, force: true });
  });

  it('lists unprefixed PDFs, most recently modified first', async () => {
    const listing = await listBareFiles(folder);

    expect(listing.entries.map((row) => [row.displayIndex, row.filename])).toEqual([
      [1, 'newest.pdf'],
      [2, 'a-tie.pdf'],
      [3, 'b-tie.pdf'],
      [4, 'older.pdf'],
    ]);
    expect(listing.folder).toBe(folder);
  });

  it('resolves rows to filenames until invalidated', async () => {
    const listing = await listBareFiles(folder);

    expect(listing.filenameAt(2)).toBe('a-tie.pdf');
    expect(() => listing.filenameAt(0)).toThrow(ValidationError);
    expect(() => listing.filenameAt(5)).toThrow(ValidationError);
    expect(() => listing.filenameAt(1.5)).toThrow(ValidationError);

    listing.invalidate();
    expect(listing.isStale).toBe(true);
    expect(() => listing.filenameAt(1)).toThrow(ConflictError);
  });

  it('fails with NotFoundError for a missing folder', async () => {
    await expect(listBareFiles(path.join(folder, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
  });
});
