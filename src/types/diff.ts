export type CatalogChangeKind =
  | 'FIRST_SCAN'
  | 'NEW'
  | 'REMOVED'
  | 'MOVED_TO'
  | 'MOVED_FROM'
  | 'MODIFIED'
  | 'CLASSIFICATION_CHANGED';

interface CatalogChangeBase {
  kind: CatalogChangeKind;
  /** Human-readable line, suitable for a report */
  message: string;
}

export interface FirstScanChange extends CatalogChangeBase {
  kind: 'FIRST_SCAN';
}

export interface EntryPresenceChange extends CatalogChangeBase {
  kind: 'NEW' | 'REMOVED';
  sizeBytes: number;
  filename: string;
  classification: string;
  locationCount: number;
}

export interface LocationChange extends CatalogChangeBase {
  kind: 'MOVED_TO' | 'MOVED_FROM' | 'MODIFIED';
  sizeBytes: number;
  filename: string;
  folder: string;
}

export interface ClassificationChange extends CatalogChangeBase {
  kind: 'CLASSIFICATION_CHANGED';
  sizeBytes: number;
  filename: string;
  previous: string;
  current: string;
}

export type CatalogChange = FirstScanChange | EntryPresenceChange | LocationChange | ClassificationChange;

export interface CatalogDiff {
  hasChanges: boolean;
  changes: CatalogChange[];
}
