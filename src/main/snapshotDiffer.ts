import { formatNumber } from '../common/formatNumber';
import type { Catalog, CatalogFileEntry, CatalogLocation } from '../types/catalog';
import type { CatalogChange, CatalogChangeKind, CatalogDiff, EntryPresenceChange } from '../types/diff';
import { joinClassificationCodes } from './sizeIndex';

interface KeyedEntry {
  sizeBytes: number;
  entry: CatalogFileEntry;
}

export const FIRST_SCAN_MESSAGE = 'No previous catalog found - this is the first scan';

const entryKey = (sizeBytes: number, filename: string) => `${sizeBytes}\u0000${filename}`;

const indexCatalog = (catalog: Catalog): Map<string, KeyedEntry> => {
  const index = new Map<string, KeyedEntry>();
  catalog.forEach((group) => {
    group.files.forEach((entry) => {
      index.set(entryKey(group.sizeBytes, entry.filename), { sizeBytes: group.sizeBytes, entry });
    });
  });
  return index;
};

const compareKeyed = (a: KeyedEntry, b: KeyedEntry) => {
  if (a.sizeBytes !== b.sizeBytes) return a.sizeBytes - b.sizeBytes;
  if (a.entry.filename === b.entry.filename) return 0;
  return a.entry.filename < b.entry.filename ? -1 : 1;
};

const presenceChange = (kind: 'NEW' | 'REMOVED', { sizeBytes, entry }: KeyedEntry): EntryPresenceChange => {
  const classification = joinClassificationCodes(entry.classificationCodes);
  const tokDisplay = classification ? ` [ToK: ${classification}]` : '';
  const locationCount = entry.locations.length;
  const where = kind === 'NEW' ? `${locationCount} location(s)` : `was in ${locationCount} location(s)`;
  return {
    kind,
    sizeBytes,
    filename: entry.filename,
    classification,
    locationCount,
    message: `${kind}: ${entry.filename}${tokDisplay} (size: ${formatNumber(sizeBytes)} bytes, ${where})`,
  };
};

/** First location per folder, in order of first appearance. */
const locationsByFolder = (locations: readonly CatalogLocation[]) => {
  const byFolder = new Map<string, CatalogLocation>();
  locations.forEach((location) => {
    if (!byFolder.has(location.folder)) {
      byFolder.set(location.folder, location);
    }
  });
  return byFolder;
};

const compareEntry = (sizeBytes: number, previous: CatalogFileEntry, current: CatalogFileEntry): CatalogChange[] => {
  const changes: CatalogChange[] = [];
  const { filename } = current;

  const previousTok = joinClassificationCodes(previous.classificationCodes);
  const currentTok = joinClassificationCodes(current.classificationCodes);
  if (previousTok !== currentTok) {
    changes.push({
      kind: 'CLASSIFICATION_CHANGED',
      sizeBytes,
      filename,
      previous: previousTok,
      current: currentTok,
      message: `CLASSIFICATION_CHANGED: ${filename} - '${previousTok}' -> '${currentTok}'`,
    });
  }

  const previousFolders = locationsByFolder(previous.locations);
  const currentFolders = locationsByFolder(current.locations);

  currentFolders.forEach((_location, folder) => {
    if (!previousFolders.has(folder)) {
      changes.push({ kind: 'MOVED_TO', sizeBytes, filename, folder, message: `MOVED_TO: ${filename} now in: ${folder}` });
    }
  });

  previousFolders.forEach((_location, folder) => {
    if (!currentFolders.has(folder)) {
      changes.push({
        kind: 'MOVED_FROM',
        sizeBytes,
        filename,
        folder,
        message: `MOVED_FROM: ${filename} no longer in: ${folder}`,
      });
    }
  });

  currentFolders.forEach((location, folder) => {
    const before = previousFolders.get(folder);
    if (before && (before.created !== location.created || before.modified !== location.modified)) {
      changes.push({
        kind: 'MODIFIED',
        sizeBytes,
        filename,
        folder,
        message: `MODIFIED: ${filename} in ${folder} - dates changed`,
      });
    }
  });

  return changes;
};

/**
 * Compares two catalogs keyed by (size, base filename). Changes come out
 * ordered by size, then filename; neither catalog is modified.
 */
export const diffCatalogs = (previous: Catalog | null, current: Catalog): CatalogDiff => {
  if (previous === null) {
    return { hasChanges: true, changes: [{ kind: 'FIRST_SCAN', message: FIRST_SCAN_MESSAGE }] };
  }

  const previousIndex = indexCatalog(previous);
  const currentIndex = indexCatalog(current);
  const keys = new Map<string, KeyedEntry>([...previousIndex, ...currentIndex]);
  const ordered = [...keys.entries()].sort(([, a], [, b]) => compareKeyed(a, b));

  const changes: CatalogChange[] = [];
  ordered.forEach(([key, keyed]) => {
    const before = previousIndex.get(key);
    const after = currentIndex.get(key);
    if (!before && after) {
      changes.push(presenceChange('NEW', after));
    } else if (before && !after) {
      changes.push(presenceChange('REMOVED', before));
    } else if (before && after) {
      changes.push(...compareEntry(keyed.sizeBytes, before.entry, after.entry));
    }
  });

  return { hasChanges: changes.length > 0, changes };
};

export const summariseChanges = (diff: CatalogDiff): Record<CatalogChangeKind, number> => {
  const summary: Record<CatalogChangeKind, number> = {
    FIRST_SCAN: 0,
    NEW: 0,
    REMOVED: 0,
    MOVED_TO: 0,
    MOVED_FROM: 0,
    MODIFIED: 0,
    CLASSIFICATION_CHANGED: 0,
  };
  diff.changes.forEach((change) => {
    summary[change.kind] += 1;
  });
  return summary;
};
