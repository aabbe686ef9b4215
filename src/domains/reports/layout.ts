// ──────────────────────────────────────────
// Reports: fixed report template, shared by PDF + Word renderers
// ──────────────────────────────────────────

import { describeFilter } from '../analytics';
import { AggregateView } from '../../shared/types';

export interface ReportMeta {
  title: string;
  generatedAt: Date;
  source: string;
}

export interface ReportTable {
  columns: string[];
  rows: string[][];
}

export interface ReportLayout {
  title: string;
  subtitle: string;
  overview: { label: string; value: string }[];
  highlights: string[];
  platformTable: ReportTable;
  categoryTable: ReportTable;
}

/** A chart already rasterized for embedding. */
export interface ReportImage {
  title: string;
  png: Buffer;
  width: number;
  height: number;
}

export function buildReportLayout(view: AggregateView, meta: ReportMeta): ReportLayout {
  const { overview, highlights } = view;

  return {
    title: meta.title,
    subtitle: `Generated ${formatTimestamp(meta.generatedAt)} | ${describeFilter(view.filter)}`,
    overview: [
      { label: 'Dataset', value: meta.source },
      { label: 'Total Orders', value: formatCount(overview.totalOrders) },
      { label: 'Number of Platforms', value: formatCount(overview.totalPlatforms) },
      { label: 'Number of Product Categories', value: formatCount(overview.totalCategories) },
      { label: 'Total Revenue (INR)', value: formatNumber(overview.totalRevenue) },
      { label: 'Avg Order Value (INR)', value: formatNumber(overview.avgOrderValue) },
      { label: 'Avg Delivery Time (min)', value: formatNumber(overview.avgDeliveryTime) },
      { label: 'Avg Service Rating', value: formatNumber(overview.avgRating) },
      { label: 'Orders Above Avg Value', value: formatCount(overview.highValueOrders) },
    ],
    highlights: [
      `Fastest platform: ${highlights.deliveryTime.best ?? 'n/a'}`,
      `Slowest platform: ${highlights.deliveryTime.worst ?? 'n/a'}`,
      `Highest avg order value: ${highlights.orderValue.best ?? 'n/a'}`,
      `Best rated platform: ${highlights.serviceRating.best ?? 'n/a'}`,
    ],
    platformTable: {
      columns: ['Platform', 'Total Orders', 'Avg Order Value', 'Avg Delivery Time', 'Avg Rating'],
      rows: view.platforms.map((p) => [
        p.key,
        formatCount(p.orders),
        formatNumber(p.orderValue.mean),
        formatNumber(p.deliveryTime.mean),
        formatNumber(p.serviceRating.mean),
      ]),
    },
    categoryTable: {
      columns: ['Category', 'Orders', 'Avg Delivery Time', 'Avg Rating'],
      rows: view.categories.map((c) => [
        c.key,
        formatCount(c.orders),
        formatNumber(c.deliveryTime.mean),
        formatNumber(c.serviceRating.mean),
      ]),
    },
  };
}

// ── Formatting ──

export function formatNumber(value: number | null): string {
  if (value === null) return 'n/a';
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/** YYYY-MM-DD HH:MM UTC */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}
