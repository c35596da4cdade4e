import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import mime from 'mime-types';
import {
  ROOT_FOLDER_TOKEN,
  type FileRecord,
  type PatternedFileRecord,
  type ScanOptions,
} from '../common/fileTypes';
import { parseFilename } from '../common/prefixCodec';
import { IOError, NotFoundError, isErrnoCode } from '../common/errors';
import { createLogger } from '../utils/log';
import { readPdfTitle } from './pdfTitle';

const logger = createLogger('scanner');

interface WalkedFile {
  absolutePath: string;
  name: string;
  folder: string;
}

interface WalkOptions {
  rootPath: string;
  excluded: Set<string>;
  visit: (file: WalkedFile) => Promise<void>;
}

// mime.lookup treats a bare "pdf" as an extension, so require a dot. ".pdf" alone still counts.
export const isPdfFilename = (name: string) => name.includes('.') && mime.lookup(name) === 'application/pdf';

const computeFolder = (rootPath: string, directoryPath: string) => {
  const relative = path.relative(rootPath, directoryPath);
  const normalised = relative.split(path.sep).filter(Boolean).join('/');
  return normalised === '' ? ROOT_FOLDER_TOKEN : normalised;
};

const sortEntries = (entries: Dirent[]): Dirent[] =>
  [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

/** Birth time where the platform records one, change time otherwise. */
export const creationTimeOf = (stats: Stats): Date => (stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime);

const readEntries = async (directoryPath: string, rootPath: string): Promise<Dirent[]> => {
  try {
    return sortEntries(await fs.readdir(directoryPath, { withFileTypes: true }));
  } catch (error) {
    if (directoryPath === rootPath) {
      throw error;
    }
    logger.warn(`Skipping unreadable folder ${directoryPath}`, error);
    return [];
  }
};

const walkDirectory = async (directoryPath: string, options: WalkOptions): Promise<void> => {
  const entries = await readEntries(directoryPath, options.rootPath);
  const folder = computeFolder(options.rootPath, directoryPath);

  // Files of a folder come before its subfolders, like a top-down os walk.
  const subdirectories: string[] = [];
  for (const entry of entries) {
    if (entry.isSymbolicLink()) {
      continue;
    }
    if (entry.isDirectory()) {
      if (!options.excluded.has(entry.name)) {
        subdirectories.push(path.join(directoryPath, entry.name));
      }
      continue;
    }
    if (entry.isFile() && isPdfFilename(entry.name)) {
      await options.visit({
        absolutePath: path.join(directoryPath, entry.name),
        name: entry.name,
        folder,
      });
    }
  }

  for (const subdirectory of subdirectories) {
    await walkDirectory(subdirectory, options);
  }
};

const resolveRoot = async (rootPath: string) => {
  if (!rootPath) {
    throw new NotFoundError('Root path is required to scan');
  }
  const absoluteRoot = path.resolve(rootPath);
  let stats: Stats;
  try {
    stats = await fs.stat(absoluteRoot);
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new NotFoundError(`Root path ${absoluteRoot} does not exist`, { cause: error });
    }
    throw new IOError(`Root path ${absoluteRoot} cannot be read`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new IOError(`Root path ${absoluteRoot} is not a directory`);
  }
  return absoluteRoot;
};

const reportFileError = (options: ScanOptions, filePath: string, error: unknown) => {
  logger.warn(`Error accessing ${filePath}`, error);
  options.onFileError?.(filePath, error);
};

/**
 * Visits every PDF below `rootPath` and returns one record per file in
 * traversal order. Unreadable files are reported and skipped.
 */
export const scanPdfFiles = async (rootPath: string, options: ScanOptions = {}): Promise<FileRecord[]> => {
  const absoluteRoot = await resolveRoot(rootPath);
  const records: FileRecord[] = [];

  await walkDirectory(absoluteRoot, {
    rootPath: absoluteRoot,
    excluded: new Set(options.excludeDirNames ?? []),
    visit: async (file) => {
      try {
        const stats = await fs.stat(file.absolutePath);
        const { code, baseFilename } = parseFilename(file.name);
        records.push({
          baseFilename,
          classificationCode: code,
          folder: file.folder,
          sizeBytes: stats.size,
          createdAt: creationTimeOf(stats),
          modifiedAt: stats.mtime,
        });
      } catch (error) {
        reportFileError(options, file.absolutePath, error);
      }
    },
  });

  return records;
};

export interface PatternedScanOptions extends ScanOptions {
  readTitle?: (filePath: string) => Promise<string>;
}

/** Like {@link scanPdfFiles}, restricted to prefixed files and enriched with the embedded title. */
export const scanPatternedOnly = async (
  rootPath: string,
  options: PatternedScanOptions = {},
): Promise<PatternedFileRecord[]> => {
  const absoluteRoot = await resolveRoot(rootPath);
  const readTitle = options.readTitle ?? readPdfTitle;
  const records: PatternedFileRecord[] = [];

  await walkDirectory(absoluteRoot, {
    rootPath: absoluteRoot,
    excluded: new Set(options.excludeDirNames ?? []),
    visit: async (file) => {
      const { prefix, baseFilename } = parseFilename(file.name);
      if (!prefix) {
        return;
      }
      try {
        records.push({
          prefix,
          baseFilename,
          folder: file.folder,
          internalTitle: await readTitle(file.absolutePath),
          path: file.absolutePath,
        });
      } catch (error) {
        reportFileError(options, file.absolutePath, error);
      }
    },
  });

  return records;
};
