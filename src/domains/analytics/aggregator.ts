// ──────────────────────────────────────────
// Analytics: aggregator, (records, filter) → AggregateView
// ──────────────────────────────────────────

import { ascending, group, max, mean, min } from 'd3';
import { distribution, histogram, meanOf, pearson, round, total } from '../../shared/stats';
import {
  AggregateView,
  CategoricalField,
  CorrelationMatrix,
  DeliveryRecord,
  FilterSelection,
  GroupStats,
  Highlights,
  MetricHighlight,
  NumericField,
  Overview,
  TimeSeriesPoint,
} from '../../shared/types';
import { applyFilter, dateKey, emptyFilter } from './filters';

const CORRELATED_FIELDS: NumericField[] = ['deliveryTime', 'orderValue', 'serviceRating'];

/**
 * Build the view for a filter over the full record set.
 * Pure: the same records and filter always give a deep-equal result.
 */
export function aggregate(
  records: readonly DeliveryRecord[],
  filter: FilterSelection = emptyFilter()
): AggregateView {
  return summarize(applyFilter(records, filter), filter);
}

/** Build the view over records that are already filtered. */
export function summarize(rows: readonly DeliveryRecord[], filter: FilterSelection = emptyFilter()): AggregateView {
  const byPlatform = groupSorted(rows, 'platform');
  const byCategory = groupSorted(rows, 'productCategory');

  return {
    filter,
    overview: overview(rows, byPlatform.size, byCategory.size),
    highlights: highlights(rows, byPlatform),
    platforms: Array.from(byPlatform, ([key, groupRows]) => groupStats(key, groupRows)),
    categories: Array.from(byCategory, ([key, groupRows]) => groupStats(key, groupRows)),
    correlation: correlation(rows),
    deliveryTimeHistogram: histogram(rows.map((r) => r.deliveryTime)),
    timeSeries: timeSeries(rows),
  };
}

// ── Sections ──

function overview(rows: readonly DeliveryRecord[], platforms: number, categories: number): Overview {
  const orderValues = rows.map((r) => r.orderValue);
  const avgOrderValue = mean(orderValues);

  return {
    totalOrders: rows.length,
    totalPlatforms: platforms,
    totalCategories: categories,
    totalRevenue: total(orderValues),
    avgDeliveryTime: meanOf(rows.map((r) => r.deliveryTime)),
    avgOrderValue: round(avgOrderValue),
    avgRating: meanOf(rows.map((r) => r.serviceRating)),
    // compared against the unrounded mean
    highValueOrders: avgOrderValue === undefined ? 0 : orderValues.filter((v) => v > avgOrderValue).length,
  };
}

function groupStats(key: string, rows: readonly DeliveryRecord[]): GroupStats {
  return {
    key,
    orders: rows.length,
    revenue: total(rows.map((r) => r.orderValue)),
    deliveryTime: distribution(rows.map((r) => r.deliveryTime)),
    orderValue: distribution(rows.map((r) => r.orderValue)),
    serviceRating: distribution(rows.map((r) => r.serviceRating)),
  };
}

function highlights(
  rows: readonly DeliveryRecord[],
  byPlatform: Map<string, readonly DeliveryRecord[]>
): Highlights {
  const metric = (field: NumericField, higherIsBetter: boolean): MetricHighlight => {
    const values = rows.map((r) => r[field]);
    const { lowest, highest } = extremeGroups(byPlatform, field);
    return {
      min: round(min(values)),
      max: round(max(values)),
      mean: meanOf(values),
      best: higherIsBetter ? highest : lowest,
      worst: higherIsBetter ? lowest : highest,
    };
  };

  return {
    deliveryTime: metric('deliveryTime', false),
    orderValue: metric('orderValue', true),
    serviceRating: metric('serviceRating', true),
  };
}

function correlation(rows: readonly DeliveryRecord[]): CorrelationMatrix {
  const columns = CORRELATED_FIELDS.map((field) => rows.map((r) => r[field]));
  return {
    fields: [...CORRELATED_FIELDS],
    values: columns.map((xs) => columns.map((ys) => pearson(xs, ys))),
  };
}

function timeSeries(rows: readonly DeliveryRecord[]): TimeSeriesPoint[] {
  const byDay = new Map<string, DeliveryRecord[]>();
  for (const r of rows) {
    if (!r.timestamp) continue;
    const day = dateKey(r.timestamp);
    const list = byDay.get(day) ?? [];
    list.push(r);
    byDay.set(day, list);
  }

  return Array.from(byDay.keys())
    .sort(ascending)
    .map((date) => {
      const dayRows = byDay.get(date) ?? [];
      return {
        date,
        orders: dayRows.length,
        avgDeliveryTime: meanOf(dayRows.map((r) => r.deliveryTime)),
        avgOrderValue: meanOf(dayRows.map((r) => r.orderValue)),
        avgRating: meanOf(dayRows.map((r) => r.serviceRating)),
      };
    });
}

// ── Helpers ──

/** Group rows by a categorical field; map iteration follows sorted keys. */
function groupSorted(
  rows: readonly DeliveryRecord[],
  field: CategoricalField
): Map<string, readonly DeliveryRecord[]> {
  const grouped = group(rows, (r) => r[field]);
  const keys = Array.from(grouped.keys()).sort(ascending);
  return new Map<string, readonly DeliveryRecord[]>(keys.map((key) => [key, grouped.get(key) ?? []]));
}

/**
 * Platforms with the lowest and highest unrounded mean of a field.
 * Iterates in sorted key order with strict comparisons, so ties go to the
 * lexicographically first platform.
 */
function extremeGroups(
  groups: Map<string, readonly DeliveryRecord[]>,
  field: NumericField
): { lowest: string | null; highest: string | null } {
  let lowest: string | null = null;
  let highest: string | null = null;
  let lowValue = Number.POSITIVE_INFINITY;
  let highValue = Number.NEGATIVE_INFINITY;

  for (const [key, rows] of groups) {
    const value = mean(rows, (r) => r[field]);
    if (value === undefined) continue;
    if (value < lowValue) {
      lowValue = value;
      lowest = key;
    }
    if (value > highValue) {
      highValue = value;
      highest = key;
    }
  }

  return { lowest, highest };
}
