// ──────────────────────────────────────────
// Reports domain: barrel export
// ──────────────────────────────────────────

export { ReportGenerator } from './report.generator';
export type { ReportGeneratorOptions } from './report.generator';
export { buildReportLayout, formatCount, formatNumber } from './layout';
export type { ReportLayout, ReportMeta } from './layout';
