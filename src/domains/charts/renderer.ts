// ──────────────────────────────────────────
// Charts: registry + rendering entry points
// ──────────────────────────────────────────

import { AggregateView, Chart, ChartId, ColumnDistribution, DeliveryRecord } from '../../shared/types';
import {
  columnDistributionSvg,
  correlationMatrix,
  dailyTrend,
  deliveryTimeByCategory,
  deliveryTimeByPlatform,
  deliveryTimeDistribution,
  orderValueByPlatform,
  orderValueVsDeliveryTime,
} from './builders';

interface ChartDef {
  title: string;
  build: (view: AggregateView, records: readonly DeliveryRecord[]) => string;
}

const CHARTS: Record<ChartId, ChartDef> = {
  'delivery-time-distribution': { title: 'Delivery Time Distribution', build: deliveryTimeDistribution },
  'correlation-matrix': { title: 'Correlation Matrix', build: correlationMatrix },
  'order-value-vs-delivery-time': { title: 'Order Value vs Delivery Time', build: orderValueVsDeliveryTime },
  'delivery-time-by-platform': { title: 'Delivery Time by Platform', build: deliveryTimeByPlatform },
  'delivery-time-by-category': { title: 'Average Delivery Time by Category', build: deliveryTimeByCategory },
  'order-value-by-platform': { title: 'Order Value by Platform', build: orderValueByPlatform },
  'daily-trend': { title: 'Average Delivery Time per Day', build: dailyTrend },
};

/** Display order on the dashboard and in reports. */
export const CHART_IDS: readonly ChartId[] = [
  'delivery-time-distribution',
  'correlation-matrix',
  'order-value-vs-delivery-time',
  'delivery-time-by-platform',
  'delivery-time-by-category',
  'order-value-by-platform',
  'daily-trend',
];

export function isChartId(value: string): value is ChartId {
  return CHART_IDS.some((id) => id === value);
}

/**
 * Every chart for a view, in display order. The daily trend is only
 * included when the filtered records carry timestamps.
 */
export function renderCharts(view: AggregateView, records: readonly DeliveryRecord[]): Chart[] {
  return CHART_IDS.filter((id) => id !== 'daily-trend' || view.timeSeries.length > 0).map((id) =>
    build(id, view, records)
  );
}

/** One chart by id; null when the id is not a known chart. */
export function renderChart(id: string, view: AggregateView, records: readonly DeliveryRecord[]): Chart | null {
  return isChartId(id) ? build(id, view, records) : null;
}

function build(id: ChartId, view: AggregateView, records: readonly DeliveryRecord[]): Chart {
  const def = CHARTS[id];
  return toChart(id, def.title, def.build(view, records));
}

export function renderColumnDistribution(distribution: ColumnDistribution): Chart {
  return toChart('column-distribution', `Distribution of ${distribution.column}`, columnDistributionSvg(distribution));
}

function toChart(id: Chart['id'], title: string, svg: string): Chart {
  const size = /<svg[^>]*\bwidth="(\d+)"[^>]*\bheight="(\d+)"/.exec(svg);
  return {
    id,
    title,
    svg,
    width: size ? Number(size[1]) : 0,
    height: size ? Number(size[2]) : 0,
  };
}
