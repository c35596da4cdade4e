import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import { FormatError, IOError, isErrnoCode, toCatalogError } from '../common/errors';
import type {
  Catalog,
  CatalogDocument,
  CatalogDocumentFile,
  CatalogFileEntry,
  CatalogLocation,
  CatalogStats,
  SizeGroup,
} from '../types/catalog';
import { createLogger } from '../utils/log';
import { computeCatalogStats, joinClassificationCodes } from './sizeIndex';
import { documentStem, pathExists, resolveBackupPath } from './fsHelpers';

const logger = createLogger('snapshot-store');

export interface SaveCatalogOptions {
  makeBackup: boolean;
  /** Folder that receives backups; defaults to `<stem>-old-files` beside the document */
  backupDirectory?: string;
  now?: Date;
}

export interface SaveCatalogResult {
  writtenPath: string;
  backupPath: string | null;
  stats: CatalogStats;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const serializeCatalog = (catalog: Catalog): CatalogDocument =>
  catalog.map((group) => ({
    size: group.sizeBytes,
    files: group.files.map(
      (file): CatalogDocumentFile => ({
        filename: file.filename,
        ToK: joinClassificationCodes(file.classificationCodes),
        locations: file.locations.map((location) => ({ ...location })),
      }),
    ),
  }));

const parseLocation = (value: unknown, where: string): CatalogLocation => {
  if (
    !isObject(value) ||
    typeof value.folder !== 'string' ||
    typeof value.created !== 'string' ||
    typeof value.modified !== 'string'
  ) {
    throw new FormatError(`${where}: location needs string "folder", "created" and "modified"`);
  }
  return { folder: value.folder, created: value.created, modified: value.modified };
};

const parseFileEntry = (value: unknown, where: string): CatalogFileEntry => {
  if (!isObject(value) || typeof value.filename !== 'string') {
    throw new FormatError(`${where}: file entry needs a string "filename"`);
  }
  // Documents written before classification tracking have no ToK field.
  const tok = value.ToK ?? '';
  if (typeof tok !== 'string') {
    throw new FormatError(`${where}: "ToK" must be a string`);
  }
  if (!Array.isArray(value.locations)) {
    throw new FormatError(`${where}: "locations" must be an array`);
  }
  return {
    filename: value.filename,
    classificationCodes: tok.split(';').filter(Boolean),
    locations: value.locations.map((location, index) => parseLocation(location, `${where}.locations[${index}]`)),
  };
};

const parseSizeGroup = (value: unknown, where: string): SizeGroup => {
  if (!isObject(value) || typeof value.size !== 'number' || !Number.isInteger(value.size)) {
    throw new FormatError(`${where}: size group needs an integer "size"`);
  }
  if (!Array.isArray(value.files)) {
    throw new FormatError(`${where}: "files" must be an array`);
  }
  return {
    sizeBytes: value.size,
    files: value.files.map((file, index) => parseFileEntry(file, `${where}.files[${index}]`)),
  };
};

export const parseCatalogDocument = (value: unknown, source = 'catalog'): Catalog => {
  if (!Array.isArray(value)) {
    throw new FormatError(`${source}: expected an array of size groups`);
  }
  return value.map((group, index) => parseSizeGroup(group, `${source}[${index}]`));
};

/** Returns null when no document exists yet. */
export const loadCatalog = async (filePath: string): Promise<Catalog | null> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return null;
    }
    throw toCatalogError(error, `Cannot read catalog ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FormatError(`Catalog ${filePath} is not valid JSON`, { cause: error });
  }
  return parseCatalogDocument(parsed, path.basename(filePath));
};

/**
 * Writes the catalog document. With `makeBackup`, an existing document is
 * first copied into the backup folder; the new document is only written once
 * that copy has succeeded.
 */
export const saveCatalog = async (
  catalog: Catalog,
  filePath: string,
  options: SaveCatalogOptions,
): Promise<SaveCatalogResult> => {
  const now = options.now ?? new Date();
  let backupPath: string | null = null;

  if (options.makeBackup && (await pathExists(filePath))) {
    const backupDirectory =
      options.backupDirectory ?? path.join(path.dirname(filePath), `${documentStem(filePath)}-old-files`);
    try {
      await fs.mkdir(backupDirectory, { recursive: true });
      backupPath = await resolveBackupPath(backupDirectory, documentStem(filePath), now);
      await fs.copyFile(filePath, backupPath, fsConstants.COPYFILE_EXCL);
    } catch (error) {
      throw new IOError(`Backup of ${filePath} failed; the catalog was not written`, { cause: error });
    }
    logger.info(`Backed up previous catalog to ${backupPath}`);
  }

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(serializeCatalog(catalog), null, 2), 'utf8');
  } catch (error) {
    throw toCatalogError(error, `Cannot write catalog ${filePath}`);
  }

  const stats = computeCatalogStats(catalog);
  logger.info(
    `Saved catalog ${filePath} (${stats.sizeGroups} size groups, ${stats.fileEntries} filenames, ${stats.totalLocations} locations)`,
  );
  return { writtenPath: filePath, backupPath, stats };
};
