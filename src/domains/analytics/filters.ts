// ──────────────────────────────────────────
// Analytics: filter selection (parsing, application, options)
// ──────────────────────────────────────────

import { ascending, extent } from 'd3';
import { z } from 'zod';
import { FilterError } from '../../shared/errors';
import { sortedUnique } from '../../shared/stats';
import { DeliveryRecord, FilterOptions, FilterSelection, NumericRange } from '../../shared/types';

const list = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    const items = value === undefined ? [] : Array.isArray(value) ? value : value.split(',');
    return sortedUnique(items.map((s) => s.trim()).filter((s) => s !== ''));
  });

// JSON numbers or numeric strings from the query; null, booleans and arrays are rejected
const num = (check: z.ZodNumber = z.number()) =>
  z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())]).pipe(check.finite());

const range = z
  .object({ min: num().optional(), max: num().optional() })
  .strict()
  .refine((r) => r.min === undefined || r.max === undefined || r.min <= r.max, {
    message: 'min must not exceed max',
  });

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

const filterSchema = z
  .object({
    platforms: list,
    categories: list,
    deliveryTime: range.optional(),
    orderValue: range.optional(),
    minRating: num(z.number().min(0).max(5)).optional(),
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .strict()
  .refine((f) => f.from === undefined || f.to === undefined || f.from <= f.to, {
    message: 'from must not be after to',
    path: ['from'],
  });

export function emptyFilter(): FilterSelection {
  return { platforms: [], categories: [] };
}

/** Validate a JSON filter body. Unknown keys are rejected. */
export function parseFilter(input: unknown): FilterSelection {
  const result = filterSchema.safeParse(input ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new FilterError(`Invalid filter: ${detail}`);
  }

  const f = result.data;
  const filter: FilterSelection = { platforms: f.platforms, categories: f.categories };
  const deliveryTime = compactRange(f.deliveryTime);
  const orderValue = compactRange(f.orderValue);
  if (deliveryTime) filter.deliveryTime = deliveryTime;
  if (orderValue) filter.orderValue = orderValue;
  if (f.minRating !== undefined) filter.minRating = f.minRating;
  if (f.from !== undefined) filter.from = f.from;
  if (f.to !== undefined) filter.to = f.to;
  return filter;
}

const QUERY_KEYS = [
  'platforms', 'categories',
  'minDeliveryTime', 'maxDeliveryTime',
  'minOrderValue', 'maxOrderValue',
  'minRating', 'from', 'to',
] as const;

/**
 * Flat query-string form:
 * ?platforms=A,B&categories=C&minDeliveryTime=10&maxDeliveryTime=40&minRating=3&from=2024-01-01
 */
export function parseFilterQuery(query: Record<string, unknown>): FilterSelection {
  const value = (key: (typeof QUERY_KEYS)[number]): unknown => {
    const v = query[key];
    if (typeof v === 'string') return v.trim() === '' ? undefined : v;
    return v;
  };

  const body: Record<string, unknown> = {
    platforms: value('platforms'),
    categories: value('categories'),
    minRating: value('minRating'),
    from: value('from'),
    to: value('to'),
  };
  if (value('minDeliveryTime') !== undefined || value('maxDeliveryTime') !== undefined) {
    body.deliveryTime = { min: value('minDeliveryTime'), max: value('maxDeliveryTime') };
  }
  if (value('minOrderValue') !== undefined || value('maxOrderValue') !== undefined) {
    body.orderValue = { min: value('minOrderValue'), max: value('maxOrderValue') };
  }

  return parseFilter(body);
}

export function hasFilterQuery(query: Record<string, unknown>): boolean {
  return QUERY_KEYS.some((key) => query[key] !== undefined);
}

export function applyFilter(records: readonly DeliveryRecord[], filter: FilterSelection): DeliveryRecord[] {
  const platforms = new Set(filter.platforms);
  const categories = new Set(filter.categories);
  const datesActive = filter.from !== undefined || filter.to !== undefined;

  return records.filter((r) => {
    if (platforms.size > 0 && !platforms.has(r.platform)) return false;
    if (categories.size > 0 && !categories.has(r.productCategory)) return false;
    if (!inRange(r.deliveryTime, filter.deliveryTime)) return false;
    if (!inRange(r.orderValue, filter.orderValue)) return false;
    if (filter.minRating !== undefined && r.serviceRating < filter.minRating) return false;

    if (datesActive) {
      if (!r.timestamp) return false;
      const day = dateKey(r.timestamp);
      if (filter.from !== undefined && day < filter.from) return false;
      if (filter.to !== undefined && day > filter.to) return false;
    }
    return true;
  });
}

export function filterOptions(records: readonly DeliveryRecord[]): FilterOptions {
  const days = records.flatMap((r) => (r.timestamp ? [dateKey(r.timestamp)] : [])).sort(ascending);
  return {
    platforms: sortedUnique(records.map((r) => r.platform)),
    categories: sortedUnique(records.map((r) => r.productCategory)),
    deliveryTime: toRange(extent(records, (r) => r.deliveryTime)),
    orderValue: toRange(extent(records, (r) => r.orderValue)),
    serviceRating: toRange(extent(records, (r) => r.serviceRating)),
    dates: { from: days[0] ?? null, to: days[days.length - 1] ?? null },
  };
}

/** Human-readable summary used in report subtitles and the dashboard header. */
export function describeFilter(filter: FilterSelection): string {
  const parts: string[] = [];
  if (filter.platforms.length > 0) parts.push(`Platforms: ${filter.platforms.join(', ')}`);
  if (filter.categories.length > 0) parts.push(`Categories: ${filter.categories.join(', ')}`);
  if (filter.deliveryTime) parts.push(`Delivery time: ${describeRange(filter.deliveryTime, ' min')}`);
  if (filter.orderValue) parts.push(`Order value: ${describeRange(filter.orderValue, '')}`);
  if (filter.minRating !== undefined) parts.push(`Minimum rating: ${filter.minRating}`);
  if (filter.from !== undefined || filter.to !== undefined) {
    parts.push(`Dates: ${filter.from ?? 'start'} to ${filter.to ?? 'end'}`);
  }
  return parts.length > 0 ? parts.join('; ') : 'All orders';
}

export function dateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ── Helpers ──

function inRange(value: number, range: NumericRange | undefined): boolean {
  if (!range) return true;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}

function compactRange(range: NumericRange | undefined): NumericRange | undefined {
  if (!range || (range.min === undefined && range.max === undefined)) return undefined;
  const out: NumericRange = {};
  if (range.min !== undefined) out.min = range.min;
  if (range.max !== undefined) out.max = range.max;
  return out;
}

function toRange([min, max]: [number, number] | [undefined, undefined]): NumericRange {
  return min === undefined || max === undefined ? {} : { min, max };
}

function describeRange(range: NumericRange, unit: string): string {
  if (range.min !== undefined && range.max !== undefined) return `${range.min} to ${range.max}${unit}`;
  if (range.min !== undefined) return `at least ${range.min}${unit}`;
  return `at most ${range.max}${unit}`;
}
