/** Folder token used when a file sits directly in the scanned root. */
export const ROOT_FOLDER_TOKEN = '[root]';

export interface FileRecord {
  /** Filename with any classification prefix stripped and trimmed */
  baseFilename: string;
  /** Classification code without separators, empty when the file is bare */
  classificationCode: string;
  /** Folder relative to the scanned root, `/`-separated, or {@link ROOT_FOLDER_TOKEN} */
  folder: string;
  /** File size in bytes */
  sizeBytes: number;
  createdAt: Date;
  modifiedAt: Date;
}

export interface PatternedFileRecord {
  /** The prefix as written in the filename, e.g. `"A B 3"` */
  prefix: string;
  baseFilename: string;
  folder: string;
  /** Title stored in the document metadata; empty when absent */
  internalTitle: string;
  /** Absolute path on disk, for callers that open the file */
  path: string;
}

export interface ScanOptions {
  /** Directory names pruned from the traversal wherever they appear */
  excludeDirNames?: Iterable<string>;
  /** Called for every file that could not be read; the scan carries on */
  onFileError?: (filePath: string, error: unknown) => void;
}
