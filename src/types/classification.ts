export interface ClassificationEntry {
  code: string;
  label: string;
}

export interface ClassificationNode {
  code: string;
  label: string;
  /** Code of the parent node; null for roots */
  parentCode: string | null;
  depth: number;
  children: ClassificationNode[];
}

export interface ClassificationDocumentEntry {
  prefix: string;
  string: string;
}

export interface ClassificationDocument {
  ToK: ClassificationDocumentEntry[];
}
