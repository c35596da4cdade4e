import fs from 'fs/promises';
import path from 'path';
import { ConflictError, IOError, NotFoundError, ValidationError, isErrnoCode, toCatalogError } from '../common/errors';
import { buildPrefixedFilename, parseFilename } from '../common/prefixCodec';
import { createLogger } from '../utils/log';
import { normaliseClassificationCode } from './classificationEntries';
import { pathExists } from './fsHelpers';

const logger = createLogger('renamer');

/** Shortest code that can be read back from a filename prefix. */
export const MIN_PREFIX_CODE_LENGTH = 2;

export interface RenameResult {
  folder: string;
  fromName: string;
  toName: string;
  /** False when the new name equals the current one and nothing was touched */
  renamed: boolean;
}

// Filesystems without hard links refuse link(2) with one of these.
const LINK_UNSUPPORTED = ['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EXDEV', 'EMLINK', 'EACCES'];

const assertPlainFilename = (filename: string) => {
  if (!filename.trim()) {
    throw new ValidationError('Filename cannot be empty');
  }
  if (filename === '.' || filename === '..' || filename.includes('/') || filename.includes(path.sep)) {
    throw new ValidationError(`"${filename}" is not a plain filename`);
  }
};

const assertSourceFile = async (sourcePath: string) => {
  try {
    const stats = await fs.stat(sourcePath);
    if (!stats.isFile()) {
      throw new ValidationError(`${sourcePath} is not a file`);
    }
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new NotFoundError(`File '${path.basename(sourcePath)}' not found on disk`, { cause: error });
    }
    throw toCatalogError(error, `Cannot read ${sourcePath}`);
  }
};

const conflict = (targetPath: string, cause?: unknown) =>
  new ConflictError(`A file named '${path.basename(targetPath)}' already exists`, { cause });

/*
 * link(2) fails with EEXIST when the destination exists, so creating the new
 * name and dropping the old one cannot clobber a file that appeared after the
 * precondition check. Where hard links are unavailable we fall back to
 * check-then-rename, which keeps a small race window.
 */
const moveExclusive = async (sourcePath: string, targetPath: string) => {
  try {
    await fs.link(sourcePath, targetPath);
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) {
      throw conflict(targetPath, error);
    }
    if (!isErrnoCode(error, ...LINK_UNSUPPORTED)) {
      throw toCatalogError(error, `Cannot rename ${sourcePath}`);
    }
    logger.verbose(`Hard links unavailable for ${sourcePath}; using plain rename`);
    if (await pathExists(targetPath)) {
      throw conflict(targetPath);
    }
    await fs.rename(sourcePath, targetPath);
    return;
  }

  try {
    await fs.unlink(sourcePath);
  } catch (error) {
    await fs.unlink(targetPath).catch((cleanupError: unknown) => {
      logger.error(`Could not remove ${targetPath} after a failed rename`, cleanupError);
    });
    throw new IOError(`Cannot rename ${sourcePath}: the original name could not be released`, { cause: error });
  }
};

/**
 * Renames `folder/currentFilename` to `folder/newFilename`. Fails with
 * NotFoundError when the source is missing and ConflictError when the
 * destination exists; in both cases nothing on disk changes.
 */
export const renameTo = async (folder: string, currentFilename: string, newFilename: string): Promise<RenameResult> => {
  assertPlainFilename(currentFilename);
  assertPlainFilename(newFilename);

  const sourcePath = path.join(folder, currentFilename);
  const targetPath = path.join(folder, newFilename);
  await assertSourceFile(sourcePath);

  if (currentFilename === newFilename) {
    return { folder, fromName: currentFilename, toName: newFilename, renamed: false };
  }
  if (await pathExists(targetPath)) {
    throw conflict(targetPath);
  }

  try {
    await moveExclusive(sourcePath, targetPath);
  } catch (error) {
    throw toCatalogError(error, `Cannot rename ${sourcePath}`);
  }
  logger.info(`Renamed ${currentFilename} -> ${newFilename} in ${folder}`);
  return { folder, fromName: currentFilename, toName: newFilename, renamed: true };
};

/** Filename that results from giving `currentFilename` the prefix of `code`, replacing any existing prefix. */
export const prefixedFilename = (currentFilename: string, rawCode: string): string => {
  const code = normaliseClassificationCode(rawCode);
  if (code.length < MIN_PREFIX_CODE_LENGTH) {
    throw new ValidationError(
      `Classification code "${code}" is too short to be recognised as a filename prefix (minimum ${MIN_PREFIX_CODE_LENGTH} characters)`,
    );
  }
  const { baseFilename } = parseFilename(currentFilename);
  const newFilename = buildPrefixedFilename(code, baseFilename);
  // A base name starting with "<letter or digit> " would be read back as part of the prefix.
  const readBack = parseFilename(newFilename);
  if (readBack.code !== code || readBack.baseFilename !== baseFilename) {
    throw new ValidationError(
      `"${newFilename}" would be read back as code "${readBack.code}" for "${readBack.baseFilename}"; rename "${baseFilename}" first`,
    );
  }
  return newFilename;
};

export const applyPrefix = async (folder: string, currentFilename: string, code: string): Promise<string> => {
  const newFilename = prefixedFilename(currentFilename, code);
  await renameTo(folder, currentFilename, newFilename);
  return newFilename;
};
