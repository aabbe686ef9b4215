// ──────────────────────────────────────────
// Script: one-shot PDF / Word report from the terminal
//
// Usage:
//   npx tsx scripts/report.ts [--format pdf|docx|both] [--data path.csv] [--out dir]
//                             [--platform A --platform B] [--category C] [--min-rating 3]
//                             [--from 2024-01-01] [--to 2024-01-31]
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { parseArgs } from 'util';
import { loadConfig } from '../src/config';
import { describeFilter } from '../src/domains/analytics';
import { DashboardSession } from '../src/domains/dashboard';
import { loadDataset } from '../src/domains/ingestion';
import { ReportGenerator } from '../src/domains/reports';
import { ReportFormat } from '../src/shared/types';

async function main() {
  const { values } = parseArgs({
    options: {
      format: { type: 'string' },
      data: { type: 'string' },
      out: { type: 'string' },
      platform: { type: 'string', multiple: true },
      category: { type: 'string', multiple: true },
      'min-rating': { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
    },
  });

  const format = values.format ?? 'pdf';
  const formats: ReportFormat[] =
    format === 'both' ? ['pdf', 'docx'] : format === 'pdf' || format === 'docx' ? [format] : [];
  if (formats.length === 0) {
    throw new Error(`--format must be pdf, docx or both (got "${format}")`);
  }

  const config = loadConfig();
  const datasetPath = values.data ? path.resolve(values.data) : config.datasetPath;
  const outputDir = values.out ? path.resolve(values.out) : config.reportOutputDir;

  const dataset = await loadDataset(datasetPath, { missing: config.missingValues });
  const session = new DashboardSession(dataset, config.missingValues);
  session.setFilter({
    platforms: values.platform,
    categories: values.category,
    minRating: values['min-rating'],
    from: values.from,
    to: values.to,
  });
  console.log(`[Report] Filter: ${describeFilter(session.getFilter())}`);

  const generator = new ReportGenerator({ outputDir, title: config.reportTitle });
  for (const f of formats) {
    const report = await generator.generateFor(session, f);
    console.log(`[Report] ${report.format.toUpperCase()} → ${report.path}`);
  }
}

main().catch((err) => {
  console.error('[Report] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
