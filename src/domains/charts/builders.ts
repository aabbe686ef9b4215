// ──────────────────────────────────────────
// Charts: one builder per chart, view → SVG markup
// ──────────────────────────────────────────

import {
  ascending,
  curveMonotoneX,
  interpolateRdBu,
  line,
  max,
  scaleBand,
  scaleDiverging,
  scaleLinear,
  scaleOrdinal,
  scaleUtc,
  schemeTableau10,
} from 'd3';
import {
  AggregateView,
  ColumnDistribution,
  DeliveryRecord,
  DistributionStats,
  GroupStats,
  HistogramBin,
  NumericField,
} from '../../shared/types';
import {
  COLORS,
  Frame,
  axisBottomBand,
  axisBottomLinear,
  axisBottomTime,
  axisLeft,
  el,
  emptyState,
  frame,
  legend,
  svgDocument,
  text,
} from './svg';

export const FIELD_LABELS: Record<NumericField, string> = {
  deliveryTime: 'Delivery Time (min)',
  orderValue: 'Order Value (INR)',
  serviceRating: 'Service Rating',
};

// Categorical bar charts show at most this many bars
const MAX_BARS = 20;

// ── Histograms ──

export function deliveryTimeDistribution(view: AggregateView): string {
  return histogramSvg(
    frame(),
    'Delivery Time Distribution',
    view.deliveryTimeHistogram,
    FIELD_LABELS.deliveryTime
  );
}

function histogramSvg(f: Frame, title: string, bins: HistogramBin[], xLabel: string): string {
  if (bins.length === 0) return emptyState(f, title);

  const x = scaleLinear()
    .domain([bins[0].x0, bins[bins.length - 1].x1])
    .range([0, f.innerWidth]);
  const y = scaleLinear()
    .domain([0, max(bins, (b) => b.count) ?? 0])
    .nice()
    .range([f.innerHeight, 0]);

  const bars = bins.map((b) =>
    el('rect', {
      class: 'bar',
      x: x(b.x0) + 1,
      y: y(b.count),
      width: Math.max(0, x(b.x1) - x(b.x0) - 2),
      height: f.innerHeight - y(b.count),
      fill: COLORS.accent,
    })
  );

  return svgDocument(f, title, [axisLeft(y, f, 'Orders'), axisBottomLinear(x, f, xLabel), ...bars]);
}

// ── Correlation heatmap ──

export function correlationMatrix(view: AggregateView): string {
  const f = frame(560, 460, { top: 56, right: 24, bottom: 96, left: 140 });
  const title = 'Correlation Matrix';
  if (view.overview.totalOrders === 0) return emptyState(f, title);

  const labels = view.correlation.fields.map((field) => FIELD_LABELS[field]);
  const x = scaleBand().domain(labels).range([0, f.innerWidth]).padding(0.04);
  const y = scaleBand().domain(labels).range([0, f.innerHeight]).padding(0.04);
  const color = scaleDiverging(interpolateRdBu).domain([1, 0, -1]);

  const cells = view.correlation.values.flatMap((row, i) =>
    row.map((value, j) => {
      const cx = x(labels[j]) ?? 0;
      const cy = y(labels[i]) ?? 0;
      return el('g', { class: 'cell' }, [
        el('rect', {
          x: cx,
          y: cy,
          width: x.bandwidth(),
          height: y.bandwidth(),
          fill: value === null ? COLORS.light : color(value),
        }),
        text(value === null ? 'n/a' : value.toFixed(2), {
          x: cx + x.bandwidth() / 2,
          y: cy + y.bandwidth() / 2,
          dy: '0.32em',
          'text-anchor': 'middle',
          'font-size': 14,
          fill: value !== null && Math.abs(value) > 0.6 ? COLORS.white : COLORS.primary,
        }),
      ]);
    })
  );

  const rowLabels = labels.map((label) =>
    text(label, {
      x: -8,
      y: (y(label) ?? 0) + y.bandwidth() / 2,
      dy: '0.32em',
      'text-anchor': 'end',
      fill: COLORS.primary,
    })
  );

  return svgDocument(f, title, [...cells, ...rowLabels, axisBottomBand(x, f, '')]);
}

// ── Scatter ──

export function orderValueVsDeliveryTime(view: AggregateView, records: readonly DeliveryRecord[]): string {
  const f = frame(720, 420, { top: 56, right: 160, bottom: 64, left: 72 });
  const title = 'Order Value vs Delivery Time';
  if (records.length === 0) return emptyState(f, title);

  const platforms = view.platforms.map((p) => p.key);
  const color = scaleOrdinal<string, string>(schemeTableau10).domain(platforms);
  const x = scaleLinear()
    .domain([0, max(records, (r) => r.orderValue) ?? 0])
    .nice()
    .range([0, f.innerWidth]);
  const y = scaleLinear()
    .domain([0, max(records, (r) => r.deliveryTime) ?? 0])
    .nice()
    .range([f.innerHeight, 0]);

  const points = records.map((r) =>
    el('circle', {
      class: 'point',
      cx: x(r.orderValue),
      cy: y(r.deliveryTime),
      r: 3,
      fill: color(r.platform),
      'fill-opacity': 0.7,
    })
  );

  return svgDocument(f, title, [
    axisLeft(y, f, FIELD_LABELS.deliveryTime),
    axisBottomLinear(x, f, FIELD_LABELS.orderValue),
    ...points,
    legend(
      platforms.map((p) => ({ label: p, color: color(p) })),
      f.innerWidth + 16
    ),
  ]);
}

// ── Box plots ──

export function deliveryTimeByPlatform(view: AggregateView): string {
  return boxPlotSvg('Delivery Time by Platform', view.platforms, (g) => g.deliveryTime, 'Platform', FIELD_LABELS.deliveryTime);
}

export function orderValueByPlatform(view: AggregateView): string {
  return boxPlotSvg('Order Value by Platform', view.platforms, (g) => g.orderValue, 'Platform', FIELD_LABELS.orderValue);
}

/** Boxes span p25..p75 with the median marked; whiskers run from min to max. */
function boxPlotSvg(
  title: string,
  groups: GroupStats[],
  pick: (g: GroupStats) => DistributionStats,
  xLabel: string,
  yLabel: string
): string {
  const f = frame();
  if (groups.length === 0) return emptyState(f, title);

  const color = scaleOrdinal<string, string>(schemeTableau10).domain(groups.map((g) => g.key));
  const x = scaleBand()
    .domain(groups.map((g) => g.key))
    .range([0, f.innerWidth])
    .padding(0.3);
  const y = scaleLinear()
    .domain([0, max(groups, (g) => pick(g).max ?? 0) ?? 0])
    .nice()
    .range([f.innerHeight, 0]);

  const boxes = groups.map((g) => {
    const d = pick(g);
    if (d.min === null || d.max === null || d.p25 === null || d.p75 === null || d.median === null) return '';
    const left = x(g.key) ?? 0;
    const mid = left + x.bandwidth() / 2;
    return el('g', { class: 'box' }, [
      el('line', { x1: mid, x2: mid, y1: y(d.min), y2: y(d.max), stroke: COLORS.secondary }),
      el('line', { x1: mid - 8, x2: mid + 8, y1: y(d.min), y2: y(d.min), stroke: COLORS.secondary }),
      el('line', { x1: mid - 8, x2: mid + 8, y1: y(d.max), y2: y(d.max), stroke: COLORS.secondary }),
      el('rect', {
        x: left,
        y: y(d.p75),
        width: x.bandwidth(),
        height: Math.max(1, y(d.p25) - y(d.p75)),
        fill: color(g.key),
        'fill-opacity': 0.75,
        stroke: COLORS.secondary,
      }),
      el('line', {
        class: 'median',
        x1: left,
        x2: left + x.bandwidth(),
        y1: y(d.median),
        y2: y(d.median),
        stroke: COLORS.primary,
        'stroke-width': 2,
      }),
    ]);
  });

  return svgDocument(f, title, [axisLeft(y, f, yLabel), axisBottomBand(x, f, xLabel), ...boxes]);
}

// ── Bars ──

/** Categories ordered fastest first. */
export function deliveryTimeByCategory(view: AggregateView): string {
  const f = frame(640, 420, { top: 56, right: 24, bottom: 96, left: 72 });
  const title = 'Average Delivery Time by Category';
  const rows = view.categories
    .filter((c) => c.deliveryTime.mean !== null)
    .map((c) => ({ label: c.key, value: c.deliveryTime.mean ?? 0 }))
    .sort((a, b) => ascending(a.value, b.value) || ascending(a.label, b.label));

  return barSvg(f, title, rows, 'Product Category', FIELD_LABELS.deliveryTime);
}

function barSvg(
  f: Frame,
  title: string,
  rows: { label: string; value: number }[],
  xLabel: string,
  yLabel: string
): string {
  if (rows.length === 0) return emptyState(f, title);

  const x = scaleBand()
    .domain(rows.map((r) => r.label))
    .range([0, f.innerWidth])
    .padding(0.2);
  const y = scaleLinear()
    .domain([0, max(rows, (r) => r.value) ?? 0])
    .nice()
    .range([f.innerHeight, 0]);

  const bars = rows.map((r) =>
    el('rect', {
      class: 'bar',
      x: x(r.label) ?? 0,
      y: y(r.value),
      width: x.bandwidth(),
      height: f.innerHeight - y(r.value),
      fill: COLORS.accent,
    })
  );

  return svgDocument(f, title, [axisLeft(y, f, yLabel), axisBottomBand(x, f, xLabel), ...bars]);
}

// ── Daily trend ──

export function dailyTrend(view: AggregateView): string {
  const f = frame(720, 400);
  const title = 'Average Delivery Time per Day';
  const points = view.timeSeries
    .filter((p) => p.avgDeliveryTime !== null)
    .map((p) => ({ date: new Date(`${p.date}T00:00:00Z`), value: p.avgDeliveryTime ?? 0 }));
  if (points.length === 0) return emptyState(f, title, 'No timestamped orders for the current filter');

  const first = points[0].date;
  const last = points[points.length - 1].date;
  const x = scaleUtc()
    .domain(first.getTime() === last.getTime() ? [first, new Date(first.getTime() + 86_400_000)] : [first, last])
    .range([0, f.innerWidth]);
  const y = scaleLinear()
    .domain([0, max(points, (p) => p.value) ?? 0])
    .nice()
    .range([f.innerHeight, 0]);

  const path = line<{ date: Date; value: number }>()
    .x((p) => x(p.date))
    .y((p) => y(p.value))
    .curve(curveMonotoneX)(points);

  return svgDocument(f, title, [
    axisLeft(y, f, FIELD_LABELS.deliveryTime),
    axisBottomTime(x, f, 'Date'),
    el('path', { class: 'trend', d: path ?? '', fill: 'none', stroke: COLORS.accent, 'stroke-width': 2 }),
    ...points.map((p) => el('circle', { class: 'point', cx: x(p.date), cy: y(p.value), r: 3, fill: COLORS.primary })),
  ]);
}

// ── Column explorer ──

export function columnDistributionSvg(distribution: ColumnDistribution): string {
  const title = `Distribution of ${distribution.column}`;
  if (distribution.kind === 'numeric') {
    return histogramSvg(frame(), title, distribution.bins, distribution.column);
  }

  const f = frame(640, 420, { top: 56, right: 24, bottom: 96, left: 72 });
  const rows = distribution.counts.slice(0, MAX_BARS).map((c) => ({ label: c.value, value: c.count }));
  return barSvg(f, title, rows, distribution.column, 'Count');
}
