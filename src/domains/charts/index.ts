// ──────────────────────────────────────────
// Charts domain: barrel export
// ──────────────────────────────────────────

export { CHART_IDS, renderChart, renderCharts, renderColumnDistribution } from './renderer';
export { rasterize } from './rasterize';
