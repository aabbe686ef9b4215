import { describe, it, expect } from 'vitest';
import { aggregate } from '../../src/domains/analytics';
import {
  CHART_IDS,
  rasterize,
  renderChart,
  renderCharts,
  renderColumnDistribution,
} from '../../src/domains/charts';
import { columnDistribution } from '../../src/domains/ingestion';
import { ChartRenderError } from '../../src/shared/errors';
import { record, sampleDataset } from '../helpers/fixtures';

const { records } = sampleDataset();
const view = aggregate(records);

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function occurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

function svgOf(id: string, v = view, rows = records): string {
  const chart = renderChart(id, v, rows);
  if (!chart) throw new Error(`no chart ${id}`);
  return chart.svg;
}

describe('renderCharts', () => {
  it('renders every chart in display order when timestamps are present', () => {
    const charts = renderCharts(view, records);

    expect(charts.map((c) => c.id)).toEqual([...CHART_IDS]);
    for (const chart of charts) {
      expect(chart.svg.startsWith(`<svg xmlns="http://www.w3.org/2000/svg" width="${chart.width}" height="${chart.height}"`)).toBe(true);
      expect(chart.svg.endsWith('</svg>')).toBe(true);
    }
  });

  it('leaves out the daily trend when no record has a timestamp', () => {
    const undated = [record({ orderId: 'A' }), record({ orderId: 'B', platform: 'Beta', deliveryTime: 20 })];
    const ids = renderCharts(aggregate(undated), undated).map((c) => c.id);

    expect(ids).toHaveLength(6);
    expect(ids).not.toContain('daily-trend');
  });

  it('reads chart sizes from the root element', () => {
    const chart = renderChart('delivery-time-distribution', view, records);
    expect(chart).toMatchObject({ title: 'Delivery Time Distribution', width: 640, height: 400 });
  });
});

describe('renderChart', () => {
  it('returns null for an unknown id', () => {
    expect(renderChart('pie-of-everything', view, records)).toBeNull();
  });

  it('plots one point per order in the scatter chart', () => {
    expect(occurrences(svgOf('order-value-vs-delivery-time'), 'class="point"')).toBe(6);
  });

  it('draws one box per platform', () => {
    expect(occurrences(svgOf('delivery-time-by-platform'), 'class="box"')).toBe(3);
    expect(occurrences(svgOf('order-value-by-platform'), 'class="median"')).toBe(3);
  });

  it('orders category bars by ascending mean delivery time', () => {
    const svg = svgOf('delivery-time-by-category');

    expect(occurrences(svg, 'class="bar"')).toBe(3);
    const dairy = svg.indexOf('>Dairy</text>');
    const grocery = svg.indexOf('>Grocery</text>');
    const snacks = svg.indexOf('>Snacks</text>');
    expect(dairy).toBeGreaterThan(-1);
    expect(dairy).toBeLessThan(grocery);
    expect(grocery).toBeLessThan(snacks);
  });

  it('labels the correlation heatmap cells', () => {
    const svg = svgOf('correlation-matrix');
    expect(occurrences(svg, 'class="cell"')).toBe(9);
    expect(occurrences(svg, '>1.00</text>')).toBeGreaterThanOrEqual(3);
  });

  it('draws the daily trend as a path', () => {
    expect(svgOf('daily-trend')).toContain('class="trend"');
  });

  it('escapes text taken from the data', () => {
    const rows = [record({ platform: 'A&B <x>' }), record({ orderId: 'X2', platform: 'Plain', deliveryTime: 30 })];
    const svg = svgOf('order-value-vs-delivery-time', aggregate(rows), rows);

    expect(svg).toContain('A&amp;B &lt;x&gt;');
    expect(svg).not.toContain('A&B');
  });

  it('draws a visible bar when every delivery time is the same', () => {
    const single = [record({ deliveryTime: 20 })];
    const svg = svgOf('delivery-time-distribution', aggregate(single), single);

    expect(occurrences(svg, 'class="bar"')).toBe(1);
    expect(svg).not.toContain('width="0"');
  });

  it('shows an empty state when the filter matches nothing', () => {
    const empty = aggregate(records, { platforms: ['Nope'], categories: [] });

    for (const id of ['delivery-time-distribution', 'delivery-time-by-platform', 'delivery-time-by-category']) {
      expect(svgOf(id, empty, [])).toContain('No data for the current filter');
    }
  });
});

describe('renderColumnDistribution', () => {
  it('draws categorical counts as bars', () => {
    const chart = renderColumnDistribution(columnDistribution(records, 'Product Category'));

    expect(chart.id).toBe('column-distribution');
    expect(chart.title).toBe('Distribution of Product Category');
    expect(occurrences(chart.svg, 'class="bar"')).toBe(3);
  });

  it('draws numeric columns as a histogram', () => {
    const distribution = columnDistribution(records, 'Order Value (INR)');
    const chart = renderColumnDistribution(distribution);

    expect(distribution.kind).toBe('numeric');
    if (distribution.kind === 'numeric') {
      expect(occurrences(chart.svg, 'class="bar"')).toBe(distribution.bins.length);
    }
  });
});

describe('rasterize', () => {
  it('turns a chart into a PNG', async () => {
    const chart = renderChart('delivery-time-by-category', view, records);
    if (!chart) throw new Error('missing chart');

    const png = await rasterize(chart.svg);
    expect(png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
  });

  it('raises ChartRenderError for markup it cannot read', async () => {
    await expect(rasterize('<svg')).rejects.toBeInstanceOf(ChartRenderError);
  });
});
