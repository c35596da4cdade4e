import fs from 'fs/promises';
import path from 'path';
import { toCatalogError } from '../common/errors';
import type { PatternedFileRecord } from '../common/fileTypes';

export const PATTERNED_REPORT_FILENAME = 'pdf-document.txt';

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const sortPatternedRecords = (records: readonly PatternedFileRecord[]): PatternedFileRecord[] =>
  [...records].sort((a, b) => compareText(a.prefix, b.prefix) || compareText(a.baseFilename, b.baseFilename));

const columnWidth = (values: string[], minimum: number) =>
  Math.max(minimum, ...values.map((value) => value.length + 2));

/**
 * Fixed-width table of prefixed files: pattern, filename and folder columns
 * padded to their widest value plus two, then the embedded title.
 */
export const formatPatternedReport = (records: readonly PatternedFileRecord[]): string => {
  const sorted = sortPatternedRecords(records);
  const patternWidth = columnWidth(sorted.map((record) => record.prefix), 10);
  const filenameWidth = columnWidth(sorted.map((record) => record.baseFilename), 20);
  const folderWidth = columnWidth(sorted.map((record) => record.folder), 20);

  const row = (pattern: string, filename: string, folder: string, title: string) =>
    `${pattern.padEnd(patternWidth)} ${filename.padEnd(filenameWidth)} ${folder.padEnd(folderWidth)} ${title}`;

  const lines = [
    row('Pattern', 'Filename', 'Folder', 'Internal Title'),
    '-'.repeat(patternWidth + filenameWidth + folderWidth + 50),
    ...sorted.map((record) => row(record.prefix, record.baseFilename, record.folder, record.internalTitle)),
  ];
  return `${lines.join('\n')}\n`;
};

/** Writes the report into `directory`; nothing is written when there are no records. */
export const writePatternedReport = async (
  records: readonly PatternedFileRecord[],
  directory: string,
): Promise<string | null> => {
  if (records.length === 0) {
    return null;
  }
  const filePath = path.join(directory, PATTERNED_REPORT_FILENAME);
  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(filePath, formatPatternedReport(records), 'utf8');
  } catch (error) {
    throw toCatalogError(error, `Cannot write report ${filePath}`);
  }
  return filePath;
};
