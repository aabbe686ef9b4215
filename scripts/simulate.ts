// ──────────────────────────────────────────
// Simulator: writes a synthetic delivery CSV for local runs
//
// Usage:
//   npx tsx scripts/simulate.ts [--rows 500] [--days 30] [--seed 42] [--out data/delivery_data.csv]
//
// Each platform gets its own delivery-time profile; ratings drop as
// deliveries get slower so the correlation chart has something to show.
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { faker } from '@faker-js/faker';
import { stringify } from 'csv-stringify/sync';
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { COLUMN_BY_FIELD } from '../src/domains/ingestion/schema';

// ── Catalog ─────────────────────────────────────────────────────────

const PLATFORMS = [
  { name: 'QuickCart', minutes: [8, 25] },
  { name: 'DashMart', minutes: [12, 40] },
  { name: 'FreshRun', minutes: [20, 65] },
] as const;

const CATEGORIES = [
  { name: 'Grocery', value: [150, 1200] },
  { name: 'Dairy', value: [40, 400] },
  { name: 'Snacks', value: [30, 350] },
  { name: 'Beverages', value: [50, 600] },
  { name: 'Personal Care', value: [120, 1500] },
  { name: 'Fruits & Vegetables', value: [60, 800] },
] as const;

// ── Generators ──────────────────────────────────────────────────────

function makeRow(seq: number, from: Date, to: Date): string[] {
  const platform = faker.helpers.arrayElement(PLATFORMS);
  const category = faker.helpers.arrayElement(CATEGORIES);
  const deliveryTime = faker.number.int({ min: platform.minutes[0], max: platform.minutes[1] });
  const orderValue = faker.number.int({ min: category.value[0], max: category.value[1] });

  // 5 for the quickest deliveries, losing about a point every 15 minutes
  const baseRating = 5 - (deliveryTime - 8) / 15 + faker.number.float({ min: -0.8, max: 0.8 });
  const serviceRating = Math.min(5, Math.max(1, Math.round(baseRating)));

  const placedAt = faker.date.between({ from, to });

  return [
    `ORD${String(seq).padStart(6, '0')}`,
    platform.name,
    String(deliveryTime),
    String(orderValue),
    category.name,
    String(serviceRating),
    placedAt.toISOString().slice(0, 19).replace('T', ' '),
  ];
}

// ── Main ────────────────────────────────────────────────────────────

function main() {
  const { values } = parseArgs({
    options: {
      rows: { type: 'string' },
      days: { type: 'string' },
      seed: { type: 'string' },
      out: { type: 'string' },
    },
  });

  const rows = parseInt(values.rows ?? '500', 10);
  const days = parseInt(values.days ?? '30', 10);
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(days) || days < 1) {
    throw new Error('--rows and --days must be positive integers');
  }
  if (values.seed !== undefined) faker.seed(parseInt(values.seed, 10));

  const to = new Date();
  const from = new Date(to.getTime() - days * 86_400_000);

  const header = [
    COLUMN_BY_FIELD.orderId.header,
    COLUMN_BY_FIELD.platform.header,
    COLUMN_BY_FIELD.deliveryTime.header,
    COLUMN_BY_FIELD.orderValue.header,
    COLUMN_BY_FIELD.productCategory.header,
    COLUMN_BY_FIELD.serviceRating.header,
    COLUMN_BY_FIELD.timestamp.header,
  ];
  const data = Array.from({ length: rows }, (_, i) => makeRow(i + 1, from, to));

  const outPath = path.resolve(values.out ?? process.env.DATASET_PATH ?? 'data/delivery_data.csv');
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, stringify([header, ...data]));

  console.log(`[Simulate] Wrote ${rows} orders over ${days} days to ${outPath}`);
}

try {
  main();
} catch (err) {
  console.error('[Simulate] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
}
