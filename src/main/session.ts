import path from 'path';
import { ConflictError, NotFoundError, ValidationError } from '../common/errors';
import type { PatternedFileRecord } from '../common/fileTypes';
import type { Catalog } from '../types/catalog';
import type { ClassificationEntry, ClassificationNode } from '../types/classification';
import type { CatalogDiff } from '../types/diff';
import { logDiff, logError, logScanStart, logScanSummary } from '../utils/catalogLogger';
import { createLogger } from '../utils/log';
import { BareFileIndex, listBareFiles } from './bareFiles';
import {
  addClassificationEntry,
  deleteClassificationEntry,
  normaliseClassificationCode,
  updateClassificationEntry,
} from './classificationEntries';
import { loadClassifications, saveClassifications } from './classificationStore';
import { resolveCatalogConfig, type CatalogConfig } from './config';
import { analyzeDuplicates, writeDuplicateReport, type DuplicateAnalysis } from './duplicateAnalysis';
import { prefixedFilename, renameTo } from './safeRenamer';
import { scanPatternedOnly, scanPdfFiles } from './scanner';
import { sortPatternedRecords, writePatternedReport } from './scanReport';
import { buildSizeIndex, countDuplicateRecords, countRecords, toCatalog } from './sizeIndex';
import { diffCatalogs } from './snapshotDiffer';
import { loadCatalog, saveCatalog, type SaveCatalogResult } from './snapshotStore';
import { buildClassificationTree } from './tokHierarchy';

const logger = createLogger('session');

export interface CatalogSessionDeps {
  scanPdfFiles?: typeof scanPdfFiles;
  scanPatternedOnly?: typeof scanPatternedOnly;
  now?: () => Date;
}

export interface ScanAndCompareResult {
  rootPath: string;
  totalFiles: number;
  duplicateFiles: number;
  catalog: Catalog;
  diff: CatalogDiff;
  /** Null when nothing changed and the stored catalog was left alone */
  saved: SaveCatalogResult | null;
  failedFiles: string[];
  durationMs: number;
}

export interface PatternedScanResult {
  records: PatternedFileRecord[];
  reportPath: string | null;
  failedFiles: string[];
}

export interface RowRenameResult {
  folder: string;
  fromName: string;
  toName: string;
  /** Fresh listing of the folder after the rename */
  listing: BareFileIndex;
}

export interface PrefixRowResult extends RowRenameResult {
  code: string;
  /** Label of the code when classifications are loaded */
  label: string | null;
}

export interface DuplicateAnalysisResult {
  analysis: DuplicateAnalysis;
  reportPath: string;
}

/**
 * Everything one user works with between commands: resolved paths, the
 * loaded classifications and the last bare-file listing. Scans, renames and
 * document writes go through one queue and never overlap.
 */
export class CatalogSession {
  readonly config: CatalogConfig;

  private readonly deps: Required<CatalogSessionDeps>;

  private tail: Promise<void> = Promise.resolve();

  private scanInFlight = false;

  private classifications: ClassificationEntry[] | null = null;

  private bareIndex: BareFileIndex | null = null;

  constructor(config: Partial<CatalogConfig> = {}, deps: CatalogSessionDeps = {}) {
    this.config = resolveCatalogConfig(config);
    this.deps = {
      scanPdfFiles: deps.scanPdfFiles ?? scanPdfFiles,
      scanPatternedOnly: deps.scanPatternedOnly ?? scanPatternedOnly,
      now: deps.now ?? (() => new Date()),
    };
  }

  get isScanning() {
    return this.scanInFlight;
  }

  get loadedClassifications(): readonly ClassificationEntry[] | null {
    return this.classifications;
  }

  get currentListing(): BareFileIndex | null {
    return this.bareIndex;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only orders work; each failure reaches the caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async exclusiveScan<T>(task: () => Promise<T>): Promise<T> {
    if (this.scanInFlight) {
      throw new ConflictError('A scan is already running');
    }
    this.scanInFlight = true;
    try {
      return await this.enqueue(task);
    } finally {
      this.scanInFlight = false;
    }
  }

  scanAndCompare(): Promise<ScanAndCompareResult> {
    return this.exclusiveScan(async () => {
      const { rootPath, excludeDirNames, duplicatesOnly, catalogFile, catalogBackupDirectory } = this.config;
      const failedFiles: string[] = [];
      const startedAt = Date.now();
      logScanStart({ rootPath, excludeDirNames, mode: 'catalog' });

      try {
        const records = await this.deps.scanPdfFiles(rootPath, {
          excludeDirNames,
          onFileError: (filePath) => failedFiles.push(filePath),
        });
        const index = buildSizeIndex(records);
        const catalog = toCatalog(index, duplicatesOnly);
        const totalFiles = countRecords(index);
        const duplicateFiles = countDuplicateRecords(index);
        const durationMs = Date.now() - startedAt;
        logScanSummary({ rootPath, totalFiles, duplicateFiles, durationMs, failedFiles: failedFiles.length });

        const previous = await loadCatalog(catalogFile);
        const diff = diffCatalogs(previous, catalog);
        logDiff(diff);

        const saved = diff.hasChanges
          ? await saveCatalog(catalog, catalogFile, {
              makeBackup: true,
              backupDirectory: catalogBackupDirectory,
              now: this.deps.now(),
            })
          : null;
        if (!saved) {
          logger.info(`No changes since the last scan; ${catalogFile} left as it was`);
        }

        return { rootPath, totalFiles, duplicateFiles, catalog, diff, saved, failedFiles, durationMs };
      } catch (error) {
        logError(error, { stage: 'scan', path: rootPath });
        throw error;
      }
    });
  }

  scanPatterned(): Promise<PatternedScanResult> {
    return this.exclusiveScan(async () => {
      const { rootPath, excludeDirNames, workDirectory } = this.config;
      const failedFiles: string[] = [];
      const startedAt = Date.now();
      logScanStart({ rootPath, excludeDirNames, mode: 'patterned' });

      const records = sortPatternedRecords(
        await this.deps.scanPatternedOnly(rootPath, {
          excludeDirNames,
          onFileError: (filePath) => failedFiles.push(filePath),
        }),
      );
      logScanSummary({
        rootPath,
        totalFiles: records.length,
        durationMs: Date.now() - startedAt,
        failedFiles: failedFiles.length,
      });

      const reportPath = await writePatternedReport(records, workDirectory);
      if (reportPath) {
        logger.info(`Wrote ${records.length} prefixed files to ${reportPath}`);
      }
      return { records, reportPath, failedFiles };
    });
  }

  async loadClassifications(): Promise<ClassificationEntry[]> {
    const entries = await loadClassifications(this.config.classificationFile);
    this.classifications = entries;
    logger.info(`Loaded ${entries.length} classifications from ${this.config.classificationFile}`);
    return entries;
  }

  async classificationTree(): Promise<ClassificationNode[]> {
    const entries = this.classifications ?? (await this.loadClassifications());
    return buildClassificationTree(entries);
  }

  private async entriesForEdit(allowMissing: boolean): Promise<ClassificationEntry[]> {
    if (this.classifications) {
      return this.classifications;
    }
    try {
      return await this.loadClassifications();
    } catch (error) {
      if (allowMissing && error instanceof NotFoundError) {
        logger.info(`Starting a new classification document at ${this.config.classificationFile}`);
        return [];
      }
      throw error;
    }
  }

  private persistClassifications(next: ClassificationEntry[]) {
    return saveClassifications(next, this.config.classificationFile, this.deps.now()).then((result) => {
      this.classifications = next;
      return result;
    });
  }

  addClassification(code: string, label: string): Promise<ClassificationEntry[]> {
    return this.enqueue(async () => {
      const next = addClassificationEntry(await this.entriesForEdit(true), code, label);
      await this.persistClassifications(next);
      return next;
    });
  }

  updateClassification(originalCode: string, code: string, label: string): Promise<ClassificationEntry[]> {
    return this.enqueue(async () => {
      const next = updateClassificationEntry(await this.entriesForEdit(false), originalCode, code, label);
      await this.persistClassifications(next);
      return next;
    });
  }

  deleteClassification(code: string): Promise<ClassificationEntry> {
    return this.enqueue(async () => {
      const { entries, removed } = deleteClassificationEntry(await this.entriesForEdit(false), code);
      await this.persistClassifications(entries);
      return removed;
    });
  }

  listBareFiles(folder: string = this.config.workDirectory): Promise<BareFileIndex> {
    return this.enqueue(async () => {
      const listing = await listBareFiles(path.resolve(folder));
      this.bareIndex?.invalidate();
      this.bareIndex = listing;
      return listing;
    });
  }

  private requireListing(): BareFileIndex {
    if (!this.bareIndex) {
      throw new ValidationError('No folder has been listed yet');
    }
    return this.bareIndex;
  }

  private labelFor(code: string): string | null {
    if (!this.classifications) {
      return null;
    }
    const entry = this.classifications.find((candidate) => candidate.code === code);
    if (!entry) {
      throw new ValidationError(`Classification code "${code}" is not in the classification list`);
    }
    return entry.label;
  }

  /*
   * The listing only goes stale once the rename succeeded; a failed rename
   * leaves both the file and the listing untouched.
   */
  private async renameListed(listing: BareFileIndex, fromName: string, toName: string): Promise<RowRenameResult> {
    try {
      await renameTo(listing.folder, fromName, toName);
    } catch (error) {
      logError(error, { stage: 'rename', path: path.join(listing.folder, fromName) });
      throw error;
    }
    listing.invalidate();
    const refreshed = await listBareFiles(listing.folder);
    this.bareIndex = refreshed;
    return { folder: listing.folder, fromName, toName, listing: refreshed };
  }

  applyPrefixToRow(row: number, rawCode: string): Promise<PrefixRowResult> {
    return this.enqueue(async () => {
      const listing = this.requireListing();
      const fromName = listing.filenameAt(row);
      const code = normaliseClassificationCode(rawCode);
      const label = this.labelFor(code);
      const toName = prefixedFilename(fromName, code);
      const result = await this.renameListed(listing, fromName, toName);
      return { ...result, code, label };
    });
  }

  renameRow(row: number, newFilename: string): Promise<RowRenameResult> {
    return this.enqueue(async () => {
      const listing = this.requireListing();
      const fromName = listing.filenameAt(row);
      return this.renameListed(listing, fromName, newFilename.trim());
    });
  }

  analyzeDuplicates(): Promise<DuplicateAnalysisResult> {
    return this.enqueue(async () => {
      const catalog = await loadCatalog(this.config.catalogFile);
      if (!catalog) {
        throw new NotFoundError(`No catalog found at ${this.config.catalogFile}; run a scan first`);
      }
      const analysis = analyzeDuplicates(catalog, {
        protectedFolders: this.config.protectedFolders,
        ignoredFolders: this.config.ignoredFolders,
      });
      const reportPath = await writeDuplicateReport(analysis, this.config.duplicateReportFile);
      logger.info(`Duplicate analysis written to ${reportPath}`);
      return { analysis, reportPath };
    });
  }
}
