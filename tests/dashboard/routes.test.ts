/**
 * HTTP tests: the app listens on an ephemeral local port and is driven with fetch.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import type { Server } from 'node:http';
import { DashboardSession } from '../../src/domains/dashboard';
import { ReportGenerator } from '../../src/domains/reports';
import { createApp } from '../../src/server';
import { csv, makeTempDir, sampleDataset, tinyPng } from '../helpers/fixtures';

interface Harness {
  baseUrl: string;
  server: Server;
  outputDir: string;
}

async function start(): Promise<Harness> {
  const outputDir = makeTempDir('routes-test');
  const png = await tinyPng();
  const session = new DashboardSession(sampleDataset());
  const reports = new ReportGenerator({ outputDir, title: 'Test Report', rasterize: async () => png });
  const app = createApp(session, reports);

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Expected a TCP address'));
        return;
      }
      resolve({ baseUrl: `http://127.0.0.1:${address.port}`, server, outputDir });
    });
  });
}

async function stop(h: Harness): Promise<void> {
  await new Promise<void>((resolve) => h.server.close(() => resolve()));
  fs.rmSync(h.outputDir, { recursive: true, force: true });
}

function putJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, { method: 'PUT', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });
}

describe('dashboard API', () => {
  let h: Harness;

  beforeAll(async () => {
    h = await start();
  });

  afterAll(async () => {
    await stop(h);
  });

  it('serves the page and a health check', async () => {
    const page = await fetch(`${h.baseUrl}/`);
    expect(page.status).toBe(200);
    expect(await page.text()).toContain('<title>E-commerce Delivery Analytics</title>');

    const health = await fetch(`${h.baseUrl}/health`);
    expect(await health.json()).toEqual({ status: 'ok', dataset: 'sample.csv', records: 6 });
  });

  it('describes the dataset', async () => {
    const res = await fetch(`${h.baseUrl}/api/dataset`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.rows).toBe(6);
    expect(body.numeric['Order Value (INR)'].mean).toBe(350);
  });

  it('answers ad-hoc summaries without touching the active filter', async () => {
    const res = await fetch(`${h.baseUrl}/api/summary?platforms=Beta`);
    const view = await res.json();
    expect(view.overview.totalOrders).toBe(2);

    const filters = await (await fetch(`${h.baseUrl}/api/filters`)).json();
    expect(filters.active).toEqual({ platforms: [], categories: [] });
    expect(filters.options.platforms).toEqual(['Alpha', 'Beta', 'Gamma']);
  });

  it('sets, applies and resets the active filter', async () => {
    const set = await putJson(`${h.baseUrl}/api/filters`, { platforms: ['Alpha'] });
    expect(set.status).toBe(200);
    expect((await set.json()).active).toEqual({ platforms: ['Alpha'], categories: [] });

    const summary = await (await fetch(`${h.baseUrl}/api/summary`)).json();
    expect(summary.overview.totalOrders).toBe(2);

    const reset = await fetch(`${h.baseUrl}/api/filters`, { method: 'DELETE' });
    expect((await reset.json()).active).toEqual({ platforms: [], categories: [] });
  });

  it('rejects an invalid filter with 400 and keeps the previous one', async () => {
    await putJson(`${h.baseUrl}/api/filters`, { categories: ['Dairy'] });

    const res = await putJson(`${h.baseUrl}/api/filters`, { minRating: 9 });
    expect(res.status).toBe(400);
    expect((await res.json()).error).toMatch(/^Invalid filter: minRating/);

    const filters = await (await fetch(`${h.baseUrl}/api/filters`)).json();
    expect(filters.active.categories).toEqual(['Dairy']);
    await fetch(`${h.baseUrl}/api/filters`, { method: 'DELETE' });
  });

  it('rejects malformed JSON with 400', async () => {
    const res = await fetch(`${h.baseUrl}/api/filters`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: '{"platforms":',
    });
    expect(res.status).toBe(400);
    expect(typeof (await res.json()).error).toBe('string');
  });

  it('lists charts and serves them as SVG', async () => {
    const list = await (await fetch(`${h.baseUrl}/api/charts`)).json();
    expect(list.charts).toHaveLength(7);
    expect(list.charts[0]).toMatchObject({
      id: 'delivery-time-distribution',
      url: '/api/charts/delivery-time-distribution.svg',
    });

    const res = await fetch(`${h.baseUrl}/api/charts/correlation-matrix.svg`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toMatch(/^image\/svg\+xml/);
    expect((await res.text()).startsWith('<svg')).toBe(true);
  });

  it('answers 404 for an unknown chart', async () => {
    const res = await fetch(`${h.baseUrl}/api/charts/pie-of-everything.svg`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown chart: pie-of-everything' });
  });

  it('explores single columns', async () => {
    const columns = await (await fetch(`${h.baseUrl}/api/columns`)).json();
    expect(columns.columns.map((c: { name: string }) => c.name)).toContain('Product Category');

    const dist = await (await fetch(`${h.baseUrl}/api/columns/Platform/distribution`)).json();
    expect(dist).toEqual({
      kind: 'categorical',
      column: 'Platform',
      counts: [
        { value: 'Alpha', count: 2 },
        { value: 'Beta', count: 2 },
        { value: 'Gamma', count: 2 },
      ],
    });

    const chart = await fetch(`${h.baseUrl}/api/columns/${encodeURIComponent('Order Value (INR)')}/chart.svg`);
    expect(chart.status).toBe(200);
    expect(await chart.text()).toContain('Distribution of Order Value (INR)');

    const missing = await fetch(`${h.baseUrl}/api/columns/Nope/distribution`);
    expect(missing.status).toBe(404);
  });

  it('generates a report as a download and lists it', async () => {
    const bad = await fetch(`${h.baseUrl}/api/reports`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ format: 'xls' }),
    });
    expect(bad.status).toBe(400);

    const res = await fetch(`${h.baseUrl}/api/reports`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ format: 'docx' }),
    });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-disposition')).toMatch(/delivery-report-\d{8}-\d{6}\.docx/);
    const bytes = Buffer.from(await res.arrayBuffer());
    expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');

    const list = await (await fetch(`${h.baseUrl}/api/reports`)).json();
    expect(list.reports).toHaveLength(1);
    expect(list.reports[0].format).toBe('docx');
  });
});

describe('dataset upload', () => {
  let h: Harness;

  beforeAll(async () => {
    h = await start();
  });

  afterAll(async () => {
    await stop(h);
  });

  function upload(body: string, name: string): Promise<Response> {
    return fetch(`${h.baseUrl}/api/dataset?name=${name}`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/csv' },
      body,
    });
  }

  it('rejects an invalid CSV and keeps the loaded dataset', async () => {
    const res = await upload('Order ID,Platform\nO1,Alpha\n', 'bad.csv');

    expect(res.status).toBe(400);
    expect((await res.json()).error).toMatch(/^Missing required column\(s\): Delivery Time \(Minutes\)/);
    expect(await (await fetch(`${h.baseUrl}/health`)).json()).toMatchObject({ dataset: 'sample.csv', records: 6 });
  });

  it('replaces the dataset with a valid CSV', async () => {
    const res = await upload(csv(['N1,Delta,12,80,Dairy,4,', 'N2,Delta,18,120,Snacks,5,']), 'new.csv');

    expect(res.status).toBe(201);
    expect((await res.json()).rows).toBe(2);
    expect(await (await fetch(`${h.baseUrl}/health`)).json()).toEqual({ status: 'ok', dataset: 'new.csv', records: 2 });
  });
});
