export interface CatalogLocation {
  folder: string;
  /** `YYYY-MM-DD HH:MM:SS` */
  created: string;
  /** `YYYY-MM-DD HH:MM:SS` */
  modified: string;
}

export interface CatalogFileEntry {
  /** Base filename, shared by every location of this entry */
  filename: string;
  /** Distinct classification codes seen across the locations, sorted */
  classificationCodes: string[];
  /** Locations in discovery order */
  locations: CatalogLocation[];
}

export interface SizeGroup {
  sizeBytes: number;
  files: CatalogFileEntry[];
}

/** Size groups sorted by `sizeBytes` ascending. */
export type Catalog = SizeGroup[];

export interface CatalogStats {
  sizeGroups: number;
  fileEntries: number;
  totalLocations: number;
}

/*
 * On-disk shape of the catalog document. Classification codes are stored as
 * one semicolon-joined string under the legacy `ToK` key.
 */
export interface CatalogDocumentFile {
  filename: string;
  ToK: string;
  locations: CatalogLocation[];
}

export interface CatalogDocumentGroup {
  size: number;
  files: CatalogDocumentFile[];
}

export type CatalogDocument = CatalogDocumentGroup[];
