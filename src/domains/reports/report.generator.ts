// ──────────────────────────────────────────
// Reports: generator, view + charts → PDF / Word file on disk
// ──────────────────────────────────────────

import { link, mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { renderCharts, rasterize as defaultRasterize } from '../charts';
import { AnalyticsContract, Rasterizer } from '../../shared/contracts';
import { ReportError, messageOf } from '../../shared/errors';
import { AggregateView, Chart, GeneratedReport, ReportFormat } from '../../shared/types';
import { ReportImage, buildReportLayout } from './layout';
import { renderPdf } from './pdf.document';
import { renderWord } from './word.document';

const FILE_PATTERN = /^delivery-report-\d{8}-\d{6}(?:-\d+)?\.(pdf|docx)$/;

// Distinct temp names for reports written concurrently by this process
let tmpSequence = 0;

export interface ReportGeneratorOptions {
  outputDir: string;
  title: string;
  rasterize?: Rasterizer;
  now?: () => Date;
}

export class ReportGenerator {
  private readonly rasterize: Rasterizer;
  private readonly now: () => Date;

  constructor(private readonly options: ReportGeneratorOptions) {
    this.rasterize = options.rasterize ?? defaultRasterize;
    this.now = options.now ?? (() => new Date());
  }

  /** Report for whatever the session currently shows. */
  async generateFor(source: AnalyticsContract, format: ReportFormat): Promise<GeneratedReport> {
    const view = source.view();
    const charts = renderCharts(view, source.filteredRecords());
    return this.generate(view, charts, format, source.datasetName());
  }

  /**
   * Render and write one report. The file only appears under its final name
   * once fully written; any failure raises ReportError and leaves no file.
   */
  async generate(
    view: AggregateView,
    charts: Chart[],
    format: ReportFormat,
    source = 'dataset'
  ): Promise<GeneratedReport> {
    const createdAt = this.now();
    const layout = buildReportLayout(view, { title: this.options.title, generatedAt: createdAt, source });

    let content: Buffer;
    try {
      const images = await Promise.all(charts.map((chart) => this.toImage(chart)));
      content = format === 'pdf' ? await renderPdf(layout, images) : await renderWord(layout, images);
    } catch (err) {
      throw new ReportError(`Failed to render ${format} report: ${messageOf(err)}`, { cause: err });
    }

    const { fileName, filePath } = await this.writeUnique(createdAt, format, content);
    console.log(`[Reports] Wrote ${fileName} (${content.length} bytes, ${charts.length} charts)`);
    return { format, fileName, path: filePath, bytes: content.length, createdAt };
  }

  /** Reports already in the output directory, newest first. */
  async list(): Promise<GeneratedReport[]> {
    let names: string[];
    try {
      names = await readdir(this.options.outputDir);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return [];
      throw new ReportError(`Cannot list reports: ${messageOf(err)}`, { cause: err });
    }

    const reports = await Promise.all(
      names.flatMap((fileName) => {
        const match = FILE_PATTERN.exec(fileName);
        if (!match) return [];
        const format: ReportFormat = match[1] === 'pdf' ? 'pdf' : 'docx';
        const filePath = path.join(this.options.outputDir, fileName);
        return [
          stat(filePath).then((s) => ({ format, fileName, path: filePath, bytes: s.size, createdAt: s.mtime })),
        ];
      })
    );

    return reports.sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.fileName < b.fileName ? 1 : -1)
    );
  }

  // ── Helpers ──

  private async toImage(chart: Chart): Promise<ReportImage> {
    return {
      title: chart.title,
      png: await this.rasterize(chart.svg),
      width: chart.width,
      height: chart.height,
    };
  }

  /**
   * Writes to a private temp file, then hard-links it to
   * delivery-report-YYYYMMDD-HHMMSS.<ext>, moving on to -1, -2… while the
   * link fails with EEXIST. A link never replaces an existing file.
   */
  private async writeUnique(
    at: Date,
    format: ReportFormat,
    content: Buffer
  ): Promise<{ fileName: string; filePath: string }> {
    const dir = this.options.outputDir;
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new ReportError(`Cannot create report directory: ${messageOf(err)}`, { cause: err });
    }

    const base = `delivery-report-${timestamp(at)}`;
    const tmpPath = path.join(dir, `.${base}.${process.pid}-${++tmpSequence}.tmp`);
    try {
      await writeFile(tmpPath, content);
      for (let n = 0; ; n++) {
        const fileName = n === 0 ? `${base}.${format}` : `${base}-${n}.${format}`;
        const filePath = path.join(dir, fileName);
        try {
          await link(tmpPath, filePath);
          return { fileName, filePath };
        } catch (err) {
          if (!hasCode(err, 'EEXIST')) throw err;
        }
      }
    } catch (err) {
      throw new ReportError(`Failed to write report ${base}.${format}: ${messageOf(err)}`, { cause: err });
    } finally {
      await rm(tmpPath, { force: true });
    }
  }
}

/** UTC YYYYMMDD-HHMMSS */
function timestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
