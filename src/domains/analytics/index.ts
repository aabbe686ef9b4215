// ──────────────────────────────────────────
// Analytics domain: barrel export
// ──────────────────────────────────────────

export { aggregate, summarize } from './aggregator';
export {
  applyFilter,
  describeFilter,
  emptyFilter,
  filterOptions,
  hasFilterQuery,
  parseFilter,
  parseFilterQuery,
} from './filters';
