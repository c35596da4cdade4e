import type { FileRecord } from '../common/fileTypes';
import { formatCatalogTimestamp } from '../common/timestamps';
import type { Catalog, CatalogFileEntry, CatalogStats } from '../types/catalog';

/** Records grouped by exact byte size; each group keeps discovery order. */
export type SizeIndex = Map<number, FileRecord[]>;

export const buildSizeIndex = (records: Iterable<FileRecord>): SizeIndex => {
  const index: SizeIndex = new Map();
  for (const record of records) {
    const group = index.get(record.sizeBytes);
    if (group) {
      group.push(record);
    } else {
      index.set(record.sizeBytes, [record]);
    }
  }
  return index;
};

/** Number of records that share their size with at least one other record. */
export const countDuplicateRecords = (index: SizeIndex) =>
  [...index.values()].reduce((total, group) => (group.length > 1 ? total + group.length : total), 0);

export const countRecords = (index: SizeIndex) =>
  [...index.values()].reduce((total, group) => total + group.length, 0);

const compareCodes = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const groupByBaseFilename = (records: FileRecord[]): CatalogFileEntry[] => {
  const byName = new Map<string, { codes: Set<string>; entry: CatalogFileEntry }>();
  for (const record of records) {
    let bucket = byName.get(record.baseFilename);
    if (!bucket) {
      bucket = {
        codes: new Set(),
        entry: { filename: record.baseFilename, classificationCodes: [], locations: [] },
      };
      byName.set(record.baseFilename, bucket);
    }
    if (record.classificationCode) {
      bucket.codes.add(record.classificationCode);
    }
    bucket.entry.locations.push({
      folder: record.folder,
      created: formatCatalogTimestamp(record.createdAt),
      modified: formatCatalogTimestamp(record.modifiedAt),
    });
  }
  return [...byName.values()].map(({ codes, entry }) => ({
    ...entry,
    classificationCodes: [...codes].sort(compareCodes),
  }));
};

/**
 * Builds the catalog view of a size index: size groups ascending, one entry
 * per base filename in first-seen order. With `duplicatesOnly`, sizes held by
 * a single file are left out.
 */
export const toCatalog = (index: SizeIndex, duplicatesOnly: boolean): Catalog =>
  [...index.keys()]
    .sort((a, b) => a - b)
    .flatMap((sizeBytes) => {
      const records = index.get(sizeBytes) ?? [];
      if (duplicatesOnly && records.length <= 1) {
        return [];
      }
      return [{ sizeBytes, files: groupByBaseFilename(records) }];
    });

export const joinClassificationCodes = (codes: readonly string[]) => codes.join(';');

export const computeCatalogStats = (catalog: Catalog): CatalogStats => ({
  sizeGroups: catalog.length,
  fileEntries: catalog.reduce((total, group) => total + group.files.length, 0),
  totalLocations: catalog.reduce(
    (total, group) => total + group.files.reduce((sum, file) => sum + file.locations.length, 0),
    0,
  ),
});
