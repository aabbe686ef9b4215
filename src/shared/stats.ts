// ──────────────────────────────────────────
// Descriptive statistics helpers (d3-array)
// ──────────────────────────────────────────

import { ascending, bin, deviation, max, mean, median, min, quantile, sum, thresholdSturges } from 'd3';
import { DistributionStats, HistogramBin, NumericSummary } from './types';

export function round(value: number | null | undefined, digits = 2): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function meanOf(values: number[]): number | null {
  return round(mean(values));
}

export function total(values: number[]): number {
  return round(sum(values)) ?? 0;
}

export function distribution(values: number[]): DistributionStats {
  return {
    count: values.length,
    mean: round(mean(values)),
    median: round(median(values)),
    p25: round(quantile(values, 0.25)),
    p75: round(quantile(values, 0.75)),
    p90: round(quantile(values, 0.9)),
    min: round(min(values)),
    max: round(max(values)),
    // sample standard deviation (n - 1), undefined below two values
    std: round(deviation(values)),
  };
}

export function numericSummary(values: number[]): NumericSummary {
  const d = distribution(values);
  return {
    count: d.count,
    mean: d.mean,
    std: d.std,
    min: d.min,
    p25: d.p25,
    median: d.median,
    p75: d.p75,
    max: d.max,
  };
}

/** Pearson correlation coefficient; null when undefined (n < 2 or zero variance). */
export function pearson(xs: number[], ys: number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  const mx = mean(xs.slice(0, n)) ?? 0;
  const my = mean(ys.slice(0, n)) ?? 0;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;
  return round(sxy / Math.sqrt(sxx * syy), 3);
}

export function histogram(values: number[]): HistogramBin[] {
  if (values.length === 0) return [];
  const bins = bin<number, number>().thresholds(thresholdSturges)(values);
  // All values equal: d3 yields one zero-width bin, so give it a unit width around the value
  if (bins.length === 1 && bins[0].x0 === bins[0].x1) {
    const value = bins[0].x0 ?? 0;
    return [{ x0: value - 0.5, x1: value + 0.5, count: bins[0].length }];
  }
  return bins.map((b) => ({
    x0: b.x0 ?? 0,
    x1: b.x1 ?? 0,
    count: b.length,
  }));
}

/** Most frequent value; ties resolve to the lexicographically smallest. */
export function mode(values: string[]): string | null {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);

  let best: string | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && ascending(value, best) < 0)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/** Unique values in code-unit order, for stable group ordering. */
export function sortedUnique(values: string[]): string[] {
  return Array.from(new Set(values)).sort(ascending);
}
