import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { aggregate } from '../../src/domains/analytics';
import { renderCharts } from '../../src/domains/charts';
import { DashboardSession } from '../../src/domains/dashboard';
import { ReportGenerator } from '../../src/domains/reports';
import { ReportError } from '../../src/shared/errors';
import { makeTempDir, sampleDataset, tinyPng } from '../helpers/fixtures';

const NOW = new Date(Date.UTC(2024, 0, 5, 14, 30, 0));

describe('ReportGenerator', () => {
  const dirs: string[] = [];

  function outputDir(): string {
    const dir = makeTempDir('report-test');
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a PDF named after the generation time', async () => {
    const dir = outputDir();
    const generator = new ReportGenerator({ outputDir: dir, title: 'Test Report', now: () => NOW });

    const report = await generator.generate(aggregate(sampleDataset().records), [], 'pdf');

    expect(report.fileName).toBe('delivery-report-20240105-143000.pdf');
    expect(report.path).toBe(path.join(dir, report.fileName));
    const content = fs.readFileSync(report.path);
    expect(content.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(report.bytes).toBe(content.length);
    expect(fs.readdirSync(dir)).toEqual([report.fileName]);
  });

  it('writes a Word document as a zip package', async () => {
    const generator = new ReportGenerator({ outputDir: outputDir(), title: 'Test Report', now: () => NOW });

    const report = await generator.generate(aggregate(sampleDataset().records), [], 'docx');

    expect(report.fileName).toBe('delivery-report-20240105-143000.docx');
    expect(fs.readFileSync(report.path).subarray(0, 2).toString('latin1')).toBe('PK');
  });

  it('never overwrites an earlier report', async () => {
    const generator = new ReportGenerator({ outputDir: outputDir(), title: 'Test Report', now: () => NOW });
    const view = aggregate(sampleDataset().records);

    const first = await generator.generate(view, [], 'pdf');
    const second = await generator.generate(view, [], 'pdf');

    expect(first.fileName).toBe('delivery-report-20240105-143000.pdf');
    expect(second.fileName).toBe('delivery-report-20240105-143000-1.pdf');
  });

  it('gives concurrent reports from the same second distinct files', async () => {
    const dir = outputDir();
    const generator = new ReportGenerator({ outputDir: dir, title: 'Test Report', now: () => NOW });
    const view = aggregate(sampleDataset().records);

    const reports = await Promise.all([
      generator.generate(view, [], 'pdf'),
      generator.generate(view, [], 'pdf'),
      generator.generate(view, [], 'pdf'),
    ]);

    const names = reports.map((r) => r.fileName).sort();
    expect(names).toEqual([
      'delivery-report-20240105-143000-1.pdf',
      'delivery-report-20240105-143000-2.pdf',
      'delivery-report-20240105-143000.pdf',
    ]);
    expect(fs.readdirSync(dir).sort()).toEqual(names);
    for (const report of reports) {
      expect(fs.readFileSync(report.path).length).toBe(report.bytes);
    }
  });

  it('raises ReportError when the output directory cannot be created', async () => {
    const dir = outputDir();
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, 'x');
    const generator = new ReportGenerator({ outputDir: path.join(blocker, 'reports'), title: 'Test Report' });

    const attempt = generator.generate(aggregate(sampleDataset().records), [], 'docx');

    await expect(attempt).rejects.toBeInstanceOf(ReportError);
    await expect(attempt).rejects.toThrow(/^Cannot create report directory: /);
  });

  it('embeds rasterized charts', async () => {
    const png = await tinyPng();
    const rasterized: string[] = [];
    const generator = new ReportGenerator({
      outputDir: outputDir(),
      title: 'Test Report',
      now: () => NOW,
      rasterize: async (svg) => {
        rasterized.push(svg);
        return png;
      },
    });
    const { records } = sampleDataset();
    const view = aggregate(records);
    const charts = renderCharts(view, records);

    const pdf = await generator.generate(view, charts, 'pdf');
    const docx = await generator.generate(view, charts, 'docx');

    expect(rasterized).toHaveLength(charts.length * 2);
    expect(pdf.bytes).toBeGreaterThan(0);
    expect(docx.bytes).toBeGreaterThan(0);
  });

  it('raises ReportError and leaves no file when a chart fails to render', async () => {
    const dir = outputDir();
    const generator = new ReportGenerator({
      outputDir: dir,
      title: 'Test Report',
      now: () => NOW,
      rasterize: async () => {
        throw new Error('boom');
      },
    });
    const { records } = sampleDataset();
    const view = aggregate(records);

    const attempt = generator.generate(view, renderCharts(view, records), 'pdf');

    await expect(attempt).rejects.toBeInstanceOf(ReportError);
    await expect(attempt).rejects.toThrow('Failed to render pdf report: boom');
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('generates from a session using its dataset name and active filter', async () => {
    const png = await tinyPng();
    const generator = new ReportGenerator({
      outputDir: outputDir(),
      title: 'Test Report',
      now: () => NOW,
      rasterize: async () => png,
    });
    const session = new DashboardSession(sampleDataset());
    session.setFilter({ platforms: ['Beta'] });

    const report = await generator.generateFor(session, 'docx');

    expect(report.format).toBe('docx');
    expect(fs.existsSync(report.path)).toBe(true);
  });

  it('lists reports newest first and ignores other files', async () => {
    const dir = outputDir();
    const older = path.join(dir, 'delivery-report-20240101-080000.pdf');
    const newer = path.join(dir, 'delivery-report-20240102-080000.docx');
    fs.writeFileSync(older, 'a');
    fs.writeFileSync(newer, 'bb');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');
    fs.utimesSync(older, new Date('2024-01-01T08:00:00Z'), new Date('2024-01-01T08:00:00Z'));
    fs.utimesSync(newer, new Date('2024-01-02T08:00:00Z'), new Date('2024-01-02T08:00:00Z'));

    const list = await new ReportGenerator({ outputDir: dir, title: 'Test Report' }).list();

    expect(list.map((r) => [r.fileName, r.format, r.bytes])).toEqual([
      ['delivery-report-20240102-080000.docx', 'docx', 2],
      ['delivery-report-20240101-080000.pdf', 'pdf', 1],
    ]);
  });

  it('lists nothing when the output directory does not exist yet', async () => {
    const generator = new ReportGenerator({ outputDir: path.join(outputDir(), 'missing'), title: 'Test Report' });
    expect(await generator.list()).toEqual([]);
  });
});
