import { bold, cyan, dim, green, magenta, red, yellow } from 'colorette';
import { formatNumber } from '../common/formatNumber';
import type { CatalogChange, CatalogDiff } from '../types/diff';

const MAX_CHANGE_PREVIEW = 200;

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isVerboseEnabled = () => coerceBoolean(process.env.PDF_CATALOG_LOG_VERBOSE);

const shouldLogErrors = () => process.env.NODE_ENV !== 'production' || coerceBoolean(process.env.DEBUG_PROD);

const timestamp = () => dim(new Date().toISOString());

const formatDuration = (durationMs: number) => `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

const prefix = cyan('📚 [Catalog]');

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.log(`   ${line}`));
  });
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.error(`   ${line}`));
  });
};

const colourForChange = (change: CatalogChange) => {
  switch (change.kind) {
    case 'NEW':
    case 'MOVED_TO':
      return green;
    case 'REMOVED':
    case 'MOVED_FROM':
      return red;
    case 'CLASSIFICATION_CHANGED':
      return magenta;
    default:
      return yellow;
  }
};

export interface ScanStartInfo {
  rootPath: string;
  excludeDirNames: string[];
  mode: 'catalog' | 'patterned';
}

export interface ScanSummaryInfo {
  rootPath: string;
  totalFiles: number;
  duplicateFiles?: number;
  durationMs: number;
  failedFiles: number;
}

export interface ErrorLogInfo {
  stage?: 'scan' | 'diff' | 'save' | 'rename' | 'classification' | 'report' | 'unknown';
  path?: string;
}

export const logScanStart = (info: ScanStartInfo) => {
  if (!isVerboseEnabled()) return;
  const header = `${prefix} ${bold(info.mode === 'catalog' ? 'Scanning all PDFs' : 'Scanning prefixed PDFs')}`;
  emit(header, [
    `Root: ${info.rootPath}`,
    `Excluded folders: ${info.excludeDirNames.length ? info.excludeDirNames.join(', ') : '—'}`,
  ]);
};

export const logScanSummary = (info: ScanSummaryInfo) => {
  if (!isVerboseEnabled()) return;
  const header = `${prefix} ${green('Scan complete')} ${dim(`in ${formatDuration(info.durationMs)}`)}`;
  const details = [`Root: ${info.rootPath}`, `PDFs found: ${formatNumber(info.totalFiles)}`];
  if (info.duplicateFiles !== undefined) {
    details.push(`Files with duplicate sizes: ${formatNumber(info.duplicateFiles)}`);
  }
  if (info.failedFiles > 0) {
    details.push(yellow(`Unreadable files skipped: ${formatNumber(info.failedFiles)}`));
  }
  emit(header, details);
};

export const logDiff = (diff: CatalogDiff) => {
  if (!isVerboseEnabled()) return;
  if (!diff.hasChanges) {
    emit(`${prefix} ${dim('No differences from the previous scan')}`);
    return;
  }
  const header = `${prefix} ${yellow('Differences from the previous scan')} ${bold(formatNumber(diff.changes.length))}`;
  const preview = diff.changes.slice(0, MAX_CHANGE_PREVIEW).map((change) => colourForChange(change)(change.message));
  if (diff.changes.length > MAX_CHANGE_PREVIEW) {
    preview.push(dim(`… truncated, +${formatNumber(diff.changes.length - MAX_CHANGE_PREVIEW)} more changes`));
  }
  emit(header, preview);
};

export const logError = (error: unknown, info: ErrorLogInfo = {}) => {
  if (!shouldLogErrors()) return;
  const err = error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown catalog error');
  const header = `${red('☠️ [Catalog]')} ${red('Operation failed')}`;
  const details: string[] = [];
  if (info.stage) {
    details.push(`Stage: ${info.stage}`);
  }
  if (info.path) {
    details.push(`Path: ${info.path}`);
  }
  details.push(err.stack ?? err.message);
  emitError(header, details);
};
