// ──────────────────────────────────────────
// Ingestion: CSV column schema + cell validators
// ──────────────────────────────────────────

import { z } from 'zod';
import { ColumnKind, DeliveryRecord } from '../../shared/types';

export interface ColumnDef {
  header: string;
  field: keyof DeliveryRecord;
  kind: ColumnKind;
  required: boolean;
}

export const COLUMN_BY_FIELD = {
  orderId: { header: 'Order ID', field: 'orderId', kind: 'string', required: true },
  platform: { header: 'Platform', field: 'platform', kind: 'string', required: true },
  deliveryTime: { header: 'Delivery Time (Minutes)', field: 'deliveryTime', kind: 'number', required: true },
  orderValue: { header: 'Order Value (INR)', field: 'orderValue', kind: 'number', required: true },
  productCategory: { header: 'Product Category', field: 'productCategory', kind: 'string', required: true },
  serviceRating: { header: 'Service Rating', field: 'serviceRating', kind: 'number', required: true },
  timestamp: { header: 'Timestamp', field: 'timestamp', kind: 'datetime', required: false },
} as const satisfies Record<keyof DeliveryRecord, ColumnDef>;

export const COLUMNS: readonly ColumnDef[] = Object.values(COLUMN_BY_FIELD);

export const TEXT_FIELDS = ['orderId', 'platform', 'productCategory'] as const;
export const NUMERIC_FIELDS = ['deliveryTime', 'orderValue', 'serviceRating'] as const;
export type TextField = (typeof TEXT_FIELDS)[number];

export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase();
}

export function findColumn(header: string): ColumnDef | undefined {
  const key = normalizeHeader(header);
  return COLUMNS.find((c) => normalizeHeader(c.header) === key);
}

// ── Cell validators ──

const text = z.string().trim().min(1);

// Plain decimal notation only: no hex, no bare exponent
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const numeric = (min: number, max = Number.POSITIVE_INFINITY) =>
  z
    .string()
    .trim()
    .regex(DECIMAL, 'expected a decimal number')
    .transform(Number)
    .pipe(z.number().finite().min(min).max(max));

// "YYYY-MM-DD HH:MM[:SS]" without a zone is read as UTC.
// The only other accepted form is ISO-8601 with an explicit zone.
const LOCAL_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const ZONED_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

export function parseTimestamp(raw: string): Date | null {
  const value = raw.trim();

  const local = LOCAL_DATETIME.exec(value);
  if (local) {
    const [, y, mo, d, h = '0', mi = '0', s = '0'] = local;
    const parts = [y, mo, d, h, mi, s].map(Number);
    const date = utcDate(parts);
    return date && isSameInstant(date, parts) ? date : null;
  }

  const zoned = ZONED_DATETIME.exec(value);
  if (zoned) {
    // Check the wall-clock parts before the offset moves them
    const [, y, mo, d, h, mi, s = '0'] = zoned;
    const parts = [y, mo, d, h, mi, s].map(Number);
    const wall = utcDate(parts);
    if (!wall || !isSameInstant(wall, parts)) return null;
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  return null;
}

function utcDate([y, mo, d, h, mi, s]: number[]): Date | null {
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  return Number.isNaN(date.getTime()) ? null : date;
}

// Date.UTC rolls 2024-02-30 over to March; reject anything that moved
function isSameInstant(date: Date, [y, mo, d, h, mi, s]: number[]): boolean {
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === mo - 1 &&
    date.getUTCDate() === d &&
    date.getUTCHours() === h &&
    date.getUTCMinutes() === mi &&
    date.getUTCSeconds() === s
  );
}

const timestamp = z
  .string()
  .trim()
  .min(1)
  .transform((raw, ctx) => {
    const date = parseTimestamp(raw);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp: ${raw}` });
      return z.NEVER;
    }
    return date;
  });

export const cellSchemas = {
  orderId: text,
  platform: text,
  productCategory: text,
  deliveryTime: numeric(0),
  orderValue: numeric(0),
  serviceRating: numeric(0, 5),
  timestamp,
} as const;

export type CellField = keyof typeof cellSchemas;

export function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}
