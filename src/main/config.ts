import os from 'os';
import path from 'path';

export interface CatalogConfig {
  /** Tree that is scanned */
  rootPath: string;
  dataDirectory: string;
  catalogFile: string;
  catalogBackupDirectory: string;
  classificationFile: string;
  /** Folder of bare files to classify; also receives the patterned report */
  workDirectory: string;
  duplicateReportFile: string;
  excludeDirNames: string[];
  duplicatesOnly: boolean;
  protectedFolders: string[];
  ignoredFolders: string[];
}

type Env = Record<string, string | undefined>;

const DEFAULT_EXCLUDED = ['RAG'];
const DEFAULT_PROTECTED = ['documents', '1hugefiles', 'documents-in-folders', '1-spark-library'];
const DEFAULT_IGNORED = ['pdfmanager'];

const readString = (env: Env, key: string) => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const readList = (env: Env, key: string, fallback: string[]) => {
  const value = env[key];
  if (value === undefined) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
};

const readBoolean = (env: Env, key: string, fallback: boolean) => {
  const value = readString(env, key)?.toLowerCase();
  if (value === undefined) return fallback;
  return ['1', 'true', 't', 'yes', 'y', 'on'].includes(value);
};

const expandHome = (value: string) =>
  value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;

/**
 * Resolves paths and folder lists from `PDF_CATALOG_*` environment variables.
 * Values in `overrides` win; derived paths follow the resolved root and data
 * folder unless set explicitly.
 */
export const resolveCatalogConfig = (overrides: Partial<CatalogConfig> = {}, env: Env = process.env): CatalogConfig => {
  const pathFrom = (key: string) => {
    const value = readString(env, key);
    return value ? path.resolve(expandHome(value)) : undefined;
  };

  const rootPath = overrides.rootPath ?? pathFrom('PDF_CATALOG_ROOT') ?? path.join(os.homedir(), 'Dropbox');
  const dataDirectory = overrides.dataDirectory ?? pathFrom('PDF_CATALOG_DATA_DIR') ?? path.join(rootPath, 'pdfmanager');

  return {
    rootPath,
    dataDirectory,
    catalogFile: overrides.catalogFile ?? pathFrom('PDF_CATALOG_FILE') ?? path.join(dataDirectory, 'pdf-files-by-size.json'),
    catalogBackupDirectory:
      overrides.catalogBackupDirectory ??
      pathFrom('PDF_CATALOG_BACKUP_DIR') ??
      path.join(dataDirectory, 'pdf-files-by-size-old-files'),
    classificationFile:
      overrides.classificationFile ??
      pathFrom('PDF_CATALOG_TOK_FILE') ??
      path.join(dataDirectory, 'pdf_manager_tok_init.json'),
    workDirectory: overrides.workDirectory ?? pathFrom('PDF_CATALOG_WORK_DIR') ?? path.join(rootPath, 'coffeetable'),
    duplicateReportFile: overrides.duplicateReportFile ?? path.join(dataDirectory, 'duplicate-analysis.txt'),
    excludeDirNames: overrides.excludeDirNames ?? readList(env, 'PDF_CATALOG_EXCLUDE', DEFAULT_EXCLUDED),
    duplicatesOnly: overrides.duplicatesOnly ?? readBoolean(env, 'PDF_CATALOG_DUPLICATES_ONLY', true),
    protectedFolders: overrides.protectedFolders ?? readList(env, 'PDF_CATALOG_PROTECTED', DEFAULT_PROTECTED),
    ignoredFolders: overrides.ignoredFolders ?? readList(env, 'PDF_CATALOG_IGNORED', DEFAULT_IGNORED),
  };
};
