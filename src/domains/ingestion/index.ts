// ──────────────────────────────────────────
// Ingestion domain: barrel export
// ──────────────────────────────────────────

export { loadDataset, parseDataset } from './csv-loader';
export type { LoadOptions } from './csv-loader';
export { describeDataset, columnDistribution } from './describe';
export { findColumn } from './schema';
