import fs from 'fs/promises';
import path from 'path';
import { FormatError, IOError, NotFoundError, isErrnoCode, toCatalogError } from '../common/errors';
import type { ClassificationDocument, ClassificationEntry } from '../types/classification';
import { createLogger } from '../utils/log';
import { documentStem, pathExists, resolveBackupPath } from './fsHelpers';
import { sortClassificationEntries } from './tokHierarchy';

const logger = createLogger('classification-store');

export interface SaveClassificationsResult {
  writtenPath: string;
  backupPath: string | null;
}

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseClassificationDocument = (value: unknown, source = 'classification document'): ClassificationEntry[] => {
  if (!isObject(value)) {
    throw new FormatError(`${source}: expected an object`);
  }
  if (!Array.isArray(value.ToK)) {
    throw new FormatError(`${source}: "ToK" list not found`);
  }
  return value.ToK.map((entry, index) => {
    if (!isObject(entry) || typeof entry.prefix !== 'string' || typeof entry.string !== 'string') {
      throw new FormatError(`${source}: ToK[${index}] needs string "prefix" and "string"`);
    }
    return { code: entry.prefix, label: entry.string };
  });
};

export const serializeClassifications = (entries: readonly ClassificationEntry[]): ClassificationDocument => ({
  ToK: sortClassificationEntries(entries).map((entry) => ({ prefix: entry.code, string: entry.label })),
});

export const loadClassifications = async (filePath: string): Promise<ClassificationEntry[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      throw new NotFoundError(`Classification document not found at ${filePath}`, { cause: error });
    }
    throw toCatalogError(error, `Cannot read classification document ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FormatError(`Classification document ${filePath} is not valid JSON`, { cause: error });
  }
  return parseClassificationDocument(parsed, path.basename(filePath));
};

// Puts the previous document back so a failed write never leaves the live path empty.
const restoreBackup = async (backupPath: string, filePath: string) => {
  try {
    await fs.rename(backupPath, filePath);
    logger.warn(`Write failed; restored ${filePath} from ${backupPath}`);
  } catch (restoreError) {
    throw new IOError(`Cannot write ${filePath} and could not restore it; the previous version is ${backupPath}`, {
      cause: restoreError,
    });
  }
};

/**
 * The classification document is the only copy of the labels, so the previous
 * version is renamed out of the way (kept beside it) rather than overwritten.
 */
export const saveClassifications = async (
  entries: readonly ClassificationEntry[],
  filePath: string,
  now: Date = new Date(),
): Promise<SaveClassificationsResult> => {
  let backupPath: string | null = null;

  if (await pathExists(filePath)) {
    try {
      backupPath = await resolveBackupPath(path.dirname(filePath), documentStem(filePath), now);
      await fs.rename(filePath, backupPath);
    } catch (error) {
      throw new IOError(`Backup of ${filePath} failed; the classification document was not written`, {
        cause: error,
      });
    }
    logger.info(`Moved previous classification document to ${backupPath}`);
  }

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(serializeClassifications(entries), null, 4), 'utf8');
  } catch (error) {
    if (backupPath) {
      await restoreBackup(backupPath, filePath);
    }
    throw toCatalogError(error, `Cannot write classification document ${filePath}`);
  }

  return { writtenPath: filePath, backupPath };
};
