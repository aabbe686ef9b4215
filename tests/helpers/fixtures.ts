/**
 * Shared fixtures: a small delivery CSV with hand-checkable aggregates.
 *
 *   Alpha: delivery 10, 20   value 200, 400   rating 5, 4
 *   Beta:  delivery 30, 40   value 300, 100   rating 3, 2
 *   Gamma: delivery 15, 25   value 600, 500   rating 4, 5
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { parseDataset } from '../../src/domains/ingestion';
import type { Dataset, DeliveryRecord } from '../../src/shared/types';

export const HEADER =
  'Order ID,Platform,Delivery Time (Minutes),Order Value (INR),Product Category,Service Rating,Timestamp';

export const SAMPLE_ROWS = [
  'O1,Alpha,10,200,Dairy,5,2024-01-01 09:00:00',
  'O2,Alpha,20,400,Snacks,4,2024-01-01 12:00:00',
  'O3,Beta,30,300,Dairy,3,2024-01-02 10:00:00',
  'O4,Beta,40,100,Snacks,2,2024-01-02 18:00:00',
  'O5,Gamma,15,600,Dairy,4,2024-01-03 08:30:00',
  'O6,Gamma,25,500,Grocery,5,2024-01-03 20:00:00',
];

export function csv(rows: string[], header = HEADER): string {
  return [header, ...rows].join('\n') + '\n';
}

export function sampleDataset(): Dataset {
  return parseDataset(csv(SAMPLE_ROWS), { source: 'sample.csv' });
}

export function record(overrides: Partial<DeliveryRecord> = {}): DeliveryRecord {
  return {
    orderId: 'X1',
    platform: 'Alpha',
    deliveryTime: 10,
    orderValue: 100,
    productCategory: 'Dairy',
    serviceRating: 4,
    timestamp: null,
    ...overrides,
  };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

/** A real 4x4 PNG, for tests that only need something embeddable. */
export function tinyPng(): Promise<Buffer> {
  return sharp({ create: { width: 4, height: 4, channels: 3, background: '#3498db' } })
    .png()
    .toBuffer();
}
