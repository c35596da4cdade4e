import fs from 'fs/promises';
import path from 'path';
import { formatBackupStamp } from '../common/timestamps';

export const pathExists = async (targetPath: string) => {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
};

export const documentStem = (filePath: string) => path.basename(filePath, path.extname(filePath));

/**
 * `<directory>/<stem>_<YYYY-MM-DD_HH-MM-SS>.json`, with `-1`, `-2`… appended
 * when a backup from the same second already exists.
 */
export const resolveBackupPath = async (directory: string, stem: string, now: Date): Promise<string> => {
  const base = `${stem}_${formatBackupStamp(now)}`;
  let candidate = path.join(directory, `${base}.json`);
  let suffix = 1;
  while (await pathExists(candidate)) {
    candidate = path.join(directory, `${base}-${suffix}.json`);
    suffix += 1;
  }
  return candidate;
};
