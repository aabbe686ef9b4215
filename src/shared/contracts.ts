// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import { AggregateView, DeliveryRecord, FilterSelection } from './types';

/**
 * Analytics contract: exposed to the Dashboard and Reports domains.
 * Both read the current view through this, never the raw session state.
 */
export interface AnalyticsContract {
  /** Name of the loaded CSV, shown in report headers. */
  datasetName(): string;
  getFilter(): FilterSelection;
  filteredRecords(): readonly DeliveryRecord[];
  view(): AggregateView;
}

/**
 * Chart rasterization: the Reports domain embeds PNGs, the Charts domain
 * provides the default implementation.
 */
export type Rasterizer = (svg: string) => Promise<Buffer>;
