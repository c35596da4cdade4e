import fs from 'fs/promises';
import path from 'path';
import { ConflictError, NotFoundError, ValidationError, isErrnoCode, toCatalogError } from '../common/errors';
import { isBareFilename } from '../common/prefixCodec';
import { createLogger } from '../utils/log';
import { isPdfFilename } from './scanner';

const logger = createLogger('bare-files');

export interface BareFileRow {
  /** 1-based position in the listing */
  displayIndex: number;
  filename: string;
  modifiedAt: Date;
}

/**
 * Listing of the PDFs in one folder that carry no classification prefix, most
 * recently modified first. Row numbers are only meaningful for the listing
 * they came from: once a rename touches the folder the index is stale and
 * must be listed again.
 */
export class BareFileIndex {
  private stale = false;

  constructor(
    readonly folder: string,
    private readonly rows: readonly BareFileRow[],
  ) {}

  get entries(): readonly BareFileRow[] {
    return this.rows;
  }

  get size() {
    return this.rows.length;
  }

  get isStale() {
    return this.stale;
  }

  invalidate() {
    this.stale = true;
  }

  filenameAt(displayIndex: number): string {
    if (this.stale) {
      throw new ConflictError(`The file listing of ${this.folder} is out of date; list the folder again`);
    }
    const row = Number.isInteger(displayIndex) ? this.rows[displayIndex - 1] : undefined;
    if (!row) {
      throw new ValidationError(`Row ${displayIndex} is not in the listing (1-${this.rows.length})`);
    }
    return row.filename;
  }
}

const byMostRecent = (a: BareFileRow, b: BareFileRow) => {
  const delta = b.modifiedAt.getTime() - a.modifiedAt.getTime();
  if (delta !== 0) return delta;
  return a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0;
};

export const listBareFiles = async (folder: string): Promise<BareFileIndex> => {
  let names: string[];
  try {
    const entries = await fs.readdir(folder, { withFileTypes: true });
    names = entries
      .filter((entry) => entry.isFile() && isPdfFilename(entry.name) && isBareFilename(entry.name))
      .map((entry) => entry.name);
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new NotFoundError(`Folder ${folder} not found`, { cause: error });
    }
    throw toCatalogError(error, `Cannot list ${folder}`);
  }

  const rows: BareFileRow[] = [];
  for (const filename of names) {
    try {
      const stats = await fs.stat(path.join(folder, filename));
      rows.push({ displayIndex: 0, filename, modifiedAt: stats.mtime });
    } catch (error) {
      logger.warn(`Error accessing ${path.join(folder, filename)}`, error);
    }
  }

  rows.sort(byMostRecent);
  return new BareFileIndex(
    folder,
    rows.map((row, index) => ({ ...row, displayIndex: index + 1 })),
  );
};
