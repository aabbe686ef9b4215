// ──────────────────────────────────────────
// Shared type definitions for the delivery analytics dashboard
// ──────────────────────────────────────────

export type ReportFormat = 'pdf' | 'docx';
export type MissingValueStrategy = 'reject' | 'drop' | 'fill';
export type ColumnKind = 'string' | 'number' | 'datetime';
export type NumericField = 'deliveryTime' | 'orderValue' | 'serviceRating';
export type CategoricalField = 'platform' | 'productCategory';

export interface DeliveryRecord {
  readonly orderId: string;
  readonly platform: string;
  readonly deliveryTime: number;
  readonly orderValue: number;
  readonly productCategory: string;
  readonly serviceRating: number;
  readonly timestamp: Date | null;
}

export interface ColumnInfo {
  name: string;
  field: keyof DeliveryRecord;
  kind: ColumnKind;
  required: boolean;
  present: boolean;
  missing: number;
}

export interface Dataset {
  source: string;
  loadedAt: Date;
  records: readonly DeliveryRecord[];
  columns: ColumnInfo[];
  rowsDropped: number;
  valuesFilled: number;
}

export interface NumericSummary {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  median: number | null;
  p75: number | null;
  max: number | null;
}

export interface DatasetDescription {
  source: string;
  loadedAt: string;
  rows: number;
  rowsDropped: number;
  valuesFilled: number;
  columns: ColumnInfo[];
  numeric: Record<string, NumericSummary>;
}

// ── Filters ──

export interface NumericRange {
  min?: number;
  max?: number;
}

export interface FilterSelection {
  platforms: string[];
  categories: string[];
  deliveryTime?: NumericRange;
  orderValue?: NumericRange;
  minRating?: number;
  /** Inclusive YYYY-MM-DD bounds applied to the order timestamp. */
  from?: string;
  to?: string;
}

export interface FilterOptions {
  platforms: string[];
  categories: string[];
  deliveryTime: NumericRange;
  orderValue: NumericRange;
  serviceRating: NumericRange;
  dates: { from: string | null; to: string | null };
}

// ── Aggregates ──

export interface DistributionStats {
  count: number;
  mean: number | null;
  median: number | null;
  p25: number | null;
  p75: number | null;
  p90: number | null;
  min: number | null;
  max: number | null;
  std: number | null;
}

export interface GroupStats {
  key: string;
  orders: number;
  revenue: number;
  deliveryTime: DistributionStats;
  orderValue: DistributionStats;
  serviceRating: DistributionStats;
}

export interface Overview {
  totalOrders: number;
  totalPlatforms: number;
  totalCategories: number;
  totalRevenue: number;
  avgDeliveryTime: number | null;
  avgOrderValue: number | null;
  avgRating: number | null;
  highValueOrders: number;
}

export interface MetricHighlight {
  min: number | null;
  max: number | null;
  mean: number | null;
  best: string | null;
  worst: string | null;
}

export interface Highlights {
  /** best = fastest platform, worst = slowest */
  deliveryTime: MetricHighlight;
  /** best = highest mean order value */
  orderValue: MetricHighlight;
  serviceRating: MetricHighlight;
}

export interface CorrelationMatrix {
  fields: NumericField[];
  values: (number | null)[][];
}

export interface HistogramBin {
  x0: number;
  x1: number;
  count: number;
}

export interface TimeSeriesPoint {
  date: string;
  orders: number;
  avgDeliveryTime: number | null;
  avgOrderValue: number | null;
  avgRating: number | null;
}

export interface AggregateView {
  filter: FilterSelection;
  overview: Overview;
  highlights: Highlights;
  platforms: GroupStats[];
  categories: GroupStats[];
  correlation: CorrelationMatrix;
  deliveryTimeHistogram: HistogramBin[];
  timeSeries: TimeSeriesPoint[];
}

export type ColumnDistribution =
  | { kind: 'numeric'; column: string; bins: HistogramBin[] }
  | { kind: 'categorical'; column: string; counts: { value: string; count: number }[] };

// ── Charts & reports ──

export type ChartId =
  | 'delivery-time-distribution'
  | 'correlation-matrix'
  | 'order-value-vs-delivery-time'
  | 'delivery-time-by-platform'
  | 'delivery-time-by-category'
  | 'order-value-by-platform'
  | 'daily-trend';

export interface Chart {
  id: ChartId | 'column-distribution';
  title: string;
  svg: string;
  width: number;
  height: number;
}

export interface GeneratedReport {
  format: ReportFormat;
  fileName: string;
  path: string;
  bytes: number;
  createdAt: Date;
}
