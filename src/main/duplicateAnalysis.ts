import fs from 'fs/promises';
import path from 'path';
import { toCatalogError } from '../common/errors';
import { formatNumber } from '../common/formatNumber';
import type { Catalog } from '../types/catalog';

export interface DeletableFile {
  filename: string;
  sizeBytes: number;
  /** Protected folders holding the same file, in catalog order */
  protectedLocations: string[];
}

export interface FolderDuplicates {
  folder: string;
  files: DeletableFile[];
}

export interface DuplicateAnalysis {
  protectedFolders: string[];
  ignoredFolders: string[];
  /** Entries present in a protected folder and in at least one other folder */
  filesInProtected: number;
  /** Copies outside protected folders that could be removed */
  deletableDuplicates: number;
  /** Most deletable files first; ties keep first-seen order */
  folders: FolderDuplicates[];
}

export interface DuplicateAnalysisOptions {
  protectedFolders: readonly string[];
  ignoredFolders: readonly string[];
}

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

/** True when any `/`-separated segment of `folder` is one of `names`. */
export const folderHasSegment = (folder: string, names: readonly string[]) =>
  folder.split('/').some((segment) => names.includes(segment));

export const analyzeDuplicates = (catalog: Catalog, options: DuplicateAnalysisOptions): DuplicateAnalysis => {
  const byFolder = new Map<string, DeletableFile[]>();
  let filesInProtected = 0;
  let deletableDuplicates = 0;

  catalog.forEach((group) => {
    group.files.forEach((entry) => {
      const protectedLocations: string[] = [];
      const otherLocations: string[] = [];
      entry.locations.forEach(({ folder }) => {
        if (folderHasSegment(folder, options.ignoredFolders)) return;
        if (folderHasSegment(folder, options.protectedFolders)) {
          protectedLocations.push(folder);
        } else {
          otherLocations.push(folder);
        }
      });

      if (protectedLocations.length === 0 || otherLocations.length === 0) return;
      filesInProtected += 1;
      deletableDuplicates += otherLocations.length;
      otherLocations.forEach((folder) => {
        const files = byFolder.get(folder) ?? [];
        files.push({ filename: entry.filename, sizeBytes: group.sizeBytes, protectedLocations });
        byFolder.set(folder, files);
      });
    });
  });

  // Array.prototype.sort is stable, so equal counts stay in first-seen order.
  const folders = [...byFolder.entries()]
    .map(([folder, files]) => ({ folder, files }))
    .sort((a, b) => b.files.length - a.files.length);

  return {
    protectedFolders: [...options.protectedFolders],
    ignoredFolders: [...options.ignoredFolders],
    filesInProtected,
    deletableDuplicates,
    folders,
  };
};

export const formatDuplicateReport = (analysis: DuplicateAnalysis): string => {
  const lines = ['DETAILED DUPLICATE PDF ANALYSIS REPORT', RULE, ''];

  lines.push('Protected folders (DO NOT DELETE from these):');
  analysis.protectedFolders.forEach((folder) => lines.push(`  - ${folder}`));
  lines.push('', 'Ignored folders (not included in analysis):');
  analysis.ignoredFolders.forEach((folder) => lines.push(`  - ${folder}`));
  lines.push(
    '',
    `Total files in protected folders: ${formatNumber(analysis.filesInProtected)}`,
    `Total deletable duplicates: ${formatNumber(analysis.deletableDuplicates)}`,
    '',
    RULE,
    '',
  );

  analysis.folders.forEach(({ folder, files }) => {
    lines.push('', `Folder: ${folder}`, `Deletable files: ${files.length}`, THIN_RULE);
    files.forEach((file) => {
      lines.push(
        `  ${file.filename}`,
        `    Size: ${formatNumber(file.sizeBytes)} bytes`,
        `    Also in protected folder(s): ${file.protectedLocations.join(', ')}`,
      );
    });
    lines.push('');
  });

  return `${lines.join('\n')}\n`;
};

export const writeDuplicateReport = async (analysis: DuplicateAnalysis, filePath: string) => {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, formatDuplicateReport(analysis), 'utf8');
  } catch (error) {
    throw toCatalogError(error, `Cannot write duplicate report ${filePath}`);
  }
  return filePath;
};
