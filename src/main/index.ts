export * from '../common/errors';
export * from '../common/fileTypes';
export * from '../common/formatNumber';
export * from '../common/prefixCodec';
export * from '../common/timestamps';
export type * from '../types/catalog';
export type * from '../types/classification';
export type * from '../types/diff';
export * from './bareFiles';
export * from './classificationEntries';
export * from './classificationStore';
export * from './config';
export * from './duplicateAnalysis';
export { readPdfTitle } from './pdfTitle';
export * from './safeRenamer';
export * from './scanner';
export * from './scanReport';
export * from './session';
export * from './sizeIndex';
export * from './snapshotDiffer';
export * from './snapshotStore';
export * from './tokHierarchy';
