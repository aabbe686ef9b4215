// ──────────────────────────────────────────
// Script: dataset summary in the terminal
//
// Usage:
//   npx tsx scripts/describe.ts [path.csv] [--column "Platform"]
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import path from 'path';
import { parseArgs } from 'util';
import { loadConfig } from '../src/config';
import { aggregate } from '../src/domains/analytics';
import { columnDistribution, describeDataset, loadDataset } from '../src/domains/ingestion';
import { formatCount, formatNumber } from '../src/domains/reports';

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: { column: { type: 'string' } },
  });

  const config = loadConfig();
  const datasetPath = positionals[0] ? path.resolve(positionals[0]) : config.datasetPath;
  const dataset = await loadDataset(datasetPath, { missing: config.missingValues });
  const description = describeDataset(dataset);

  console.log(`\nDataset: ${description.source} (${formatCount(description.rows)} rows)`);
  if (description.rowsDropped > 0) console.log(`  rows dropped: ${formatCount(description.rowsDropped)}`);
  if (description.valuesFilled > 0) console.log(`  values filled: ${formatCount(description.valuesFilled)}`);

  console.log('\nColumns:');
  console.table(
    description.columns.map((c) => ({
      column: c.name,
      kind: c.kind,
      required: c.required,
      present: c.present,
      missing: c.missing,
    }))
  );

  console.log('\nNumeric summary:');
  console.table(description.numeric);

  const view = aggregate(dataset.records);
  console.log('\nPlatforms:');
  console.table(
    view.platforms.map((p) => ({
      platform: p.key,
      orders: p.orders,
      'avg order value': formatNumber(p.orderValue.mean),
      'avg delivery time': formatNumber(p.deliveryTime.mean),
      'avg rating': formatNumber(p.serviceRating.mean),
    }))
  );

  if (values.column) {
    const dist = columnDistribution(dataset.records, values.column);
    console.log(`\nDistribution of ${dist.column}:`);
    if (dist.kind === 'numeric') {
      console.table(dist.bins.map((b) => ({ from: b.x0, to: b.x1, count: b.count })));
    } else {
      console.table(dist.counts);
    }
  }
}

main().catch((err) => {
  console.error('[Describe] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
