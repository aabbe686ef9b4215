// ──────────────────────────────────────────
// Charts: SVG string primitives + axes
// ──────────────────────────────────────────

import { ScaleBand, ScaleLinear, ScaleTime } from 'd3';

export type Attrs = Record<string, string | number | undefined>;

export const COLORS = {
  primary: '#2c3e50',
  secondary: '#34495e',
  accent: '#3498db',
  success: '#2ecc71',
  danger: '#e74c3c',
  light: '#ecf0f1',
  border: '#bdc3c7',
  white: '#ffffff',
} as const;

export interface Frame {
  width: number;
  height: number;
  margin: { top: number; right: number; bottom: number; left: number };
  innerWidth: number;
  innerHeight: number;
}

export function frame(
  width = 640,
  height = 400,
  margin = { top: 56, right: 24, bottom: 64, left: 72 }
): Frame {
  return {
    width,
    height,
    margin,
    innerWidth: width - margin.left - margin.right,
    innerHeight: height - margin.top - margin.bottom,
  };
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function el(tag: string, attrs: Attrs = {}, children: string | string[] = ''): string {
  const attrText = Object.entries(attrs)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => ` ${k}="${escapeXml(String(v))}"`)
    .join('');
  const body = Array.isArray(children) ? children.join('') : children;
  return body === '' ? `<${tag}${attrText}/>` : `<${tag}${attrText}>${body}</${tag}>`;
}

export function text(content: string, attrs: Attrs = {}): string {
  return el('text', attrs, escapeXml(content));
}

/** Root element with background and centered title; body is drawn inside the margins. */
export function svgDocument(f: Frame, title: string, body: string[]): string {
  return el(
    'svg',
    {
      xmlns: 'http://www.w3.org/2000/svg',
      width: f.width,
      height: f.height,
      viewBox: `0 0 ${f.width} ${f.height}`,
      'font-family': 'Helvetica, Arial, sans-serif',
      'font-size': 12,
    },
    [
      el('rect', { width: f.width, height: f.height, fill: COLORS.white }),
      text(title, {
        class: 'title',
        x: f.width / 2,
        y: 28,
        'text-anchor': 'middle',
        'font-size': 18,
        'font-weight': 'bold',
        fill: COLORS.primary,
      }),
      el('g', { transform: `translate(${f.margin.left},${f.margin.top})` }, body),
    ]
  );
}

export function emptyState(f: Frame, title: string, message = 'No data for the current filter'): string {
  return svgDocument(f, title, [
    text(message, {
      class: 'empty',
      x: f.innerWidth / 2,
      y: f.innerHeight / 2,
      'text-anchor': 'middle',
      fill: COLORS.secondary,
    }),
  ]);
}

// ── Axes ──

export function axisLeft(scale: ScaleLinear<number, number>, f: Frame, label: string, ticks = 6): string {
  const format = scale.tickFormat(ticks);
  const tickMarks = scale.ticks(ticks).map((t) =>
    el('g', { class: 'tick', transform: `translate(0,${scale(t)})` }, [
      el('line', { x1: 0, x2: f.innerWidth, stroke: COLORS.light }),
      text(format(t), { x: -8, dy: '0.32em', 'text-anchor': 'end', fill: COLORS.secondary }),
    ])
  );
  return el('g', { class: 'axis axis-y' }, [
    ...tickMarks,
    el('line', { y1: 0, y2: f.innerHeight, stroke: COLORS.secondary }),
    text(label, {
      transform: `translate(${-f.margin.left + 16},${f.innerHeight / 2}) rotate(-90)`,
      'text-anchor': 'middle',
      fill: COLORS.primary,
    }),
  ]);
}

export function axisBottomLinear(scale: ScaleLinear<number, number>, f: Frame, label: string, ticks = 8): string {
  const format = scale.tickFormat(ticks);
  return bottomAxis(
    scale.ticks(ticks).map((t) => ({ x: scale(t), label: format(t) })),
    f,
    label
  );
}

export function axisBottomTime(scale: ScaleTime<number, number>, f: Frame, label: string, ticks = 6): string {
  const format = scale.tickFormat(ticks, '%b %d');
  return bottomAxis(
    scale.ticks(ticks).map((t) => ({ x: scale(t), label: format(t) })),
    f,
    label
  );
}

export function axisBottomBand(scale: ScaleBand<string>, f: Frame, label: string): string {
  // Long category names are tilted so they do not overlap
  const tilt = scale.domain().some((d) => d.length * 6.5 > scale.bandwidth());
  const ticks = scale.domain().map((d) => ({ x: (scale(d) ?? 0) + scale.bandwidth() / 2, label: d }));
  return bottomAxis(ticks, f, label, tilt);
}

function bottomAxis(ticks: { x: number; label: string }[], f: Frame, label: string, tilt = false): string {
  const tickMarks = ticks.map((t) =>
    el('g', { class: 'tick', transform: `translate(${t.x},${f.innerHeight})` }, [
      el('line', { y2: 5, stroke: COLORS.secondary }),
      text(t.label, {
        y: 18,
        'text-anchor': tilt ? 'end' : 'middle',
        transform: tilt ? 'rotate(-30)' : undefined,
        fill: COLORS.secondary,
      }),
    ])
  );
  return el('g', { class: 'axis axis-x' }, [
    el('line', { x1: 0, x2: f.innerWidth, y1: f.innerHeight, y2: f.innerHeight, stroke: COLORS.secondary }),
    ...tickMarks,
    text(label, {
      x: f.innerWidth / 2,
      y: f.innerHeight + f.margin.bottom - 8,
      'text-anchor': 'middle',
      fill: COLORS.primary,
    }),
  ]);
}

export function legend(entries: { label: string; color: string }[], x: number, y = 0): string {
  return el(
    'g',
    { class: 'legend', transform: `translate(${x},${y})` },
    entries.map((e, i) =>
      el('g', { transform: `translate(0,${i * 18})` }, [
        el('rect', { width: 12, height: 12, fill: e.color }),
        text(e.label, { x: 18, y: 10, fill: COLORS.primary }),
      ])
    )
  );
}
