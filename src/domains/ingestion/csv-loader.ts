// ──────────────────────────────────────────
// Ingestion: CSV loader, the single entry point for delivery records
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { mean } from 'd3';
import { ColumnIssue, DatasetError, messageOf } from '../../shared/errors';
import { mode } from '../../shared/stats';
import {
  ColumnInfo,
  Dataset,
  DeliveryRecord,
  MissingValueStrategy,
  NumericField,
} from '../../shared/types';
import {
  COLUMNS,
  COLUMN_BY_FIELD,
  NUMERIC_FIELDS,
  TEXT_FIELDS,
  TextField,
  cellSchemas,
  isPresent,
  normalizeHeader,
} from './schema';

export interface LoadOptions {
  missing?: MissingValueStrategy;
  /** Label shown in the dashboard; defaults to the file name. */
  source?: string;
}

// Row numbers listed per malformed column before the message is truncated
const MAX_ROWS_IN_MESSAGE = 5;

interface DraftRow {
  row: number;
  text: Partial<Record<TextField, string>>;
  numbers: Partial<Record<NumericField, number>>;
  timestamp: Date | null;
  blanks: (TextField | NumericField)[];
}

export async function loadDataset(filePath: string, options: LoadOptions = {}): Promise<Dataset> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new DatasetError(`Cannot read dataset file ${filePath}: ${messageOf(err)}`);
  }

  const dataset = parseDataset(content, {
    ...options,
    source: options.source ?? path.basename(filePath),
  });
  console.log(`[Loader] Loaded ${dataset.records.length} records from ${filePath}`);
  return dataset;
}

export function parseDataset(content: string, options: LoadOptions = {}): Dataset {
  const strategy = options.missing ?? 'reject';

  if (content.trim() === '') {
    throw new DatasetError('Dataset is empty: expected a header row with the delivery columns');
  }

  let rows: string[][];
  try {
    rows = parse(content, { bom: true, skip_empty_lines: true });
  } catch (err) {
    throw new DatasetError(`Malformed CSV: ${messageOf(err)}`);
  }

  const [header = [], ...data] = rows;

  // 1. Resolve column positions, fail on any missing required column
  const normalized = header.map(normalizeHeader);
  const indexOf = (field: keyof DeliveryRecord): number =>
    normalized.indexOf(normalizeHeader(COLUMN_BY_FIELD[field].header));

  const missingColumns = COLUMNS.filter((c) => c.required && indexOf(c.field) < 0);
  if (missingColumns.length > 0) {
    const names = missingColumns.map((c) => c.header);
    throw new DatasetError(
      `Missing required column(s): ${names.join(', ')}. Found: ${header.join(', ') || '(none)'}`,
      names.map((column): ColumnIssue => ({ column, kind: 'missing', rows: [] }))
    );
  }

  // 2. Validate every cell, collecting problems per column
  const malformed = new Map<keyof DeliveryRecord, number[]>();
  const flag = (field: keyof DeliveryRecord, row: number) => {
    const list = malformed.get(field) ?? [];
    list.push(row);
    malformed.set(field, list);
  };
  const blankCounts = new Map<keyof DeliveryRecord, number>();
  const countBlank = (field: keyof DeliveryRecord) => blankCounts.set(field, (blankCounts.get(field) ?? 0) + 1);

  const drafts: DraftRow[] = data.map((cells, i) => {
    const row = i + 1;
    const cell = (field: keyof DeliveryRecord): string | undefined => {
      const idx = indexOf(field);
      return idx < 0 ? undefined : cells[idx];
    };
    const draft: DraftRow = { row, text: {}, numbers: {}, timestamp: null, blanks: [] };

    for (const field of TEXT_FIELDS) {
      const raw = cell(field);
      if (!isPresent(raw)) {
        countBlank(field);
        if (field === 'orderId' || strategy === 'reject') flag(field, row);
        else draft.blanks.push(field);
        continue;
      }
      draft.text[field] = cellSchemas[field].parse(raw);
    }

    for (const field of NUMERIC_FIELDS) {
      const raw = cell(field);
      if (!isPresent(raw)) {
        countBlank(field);
        if (strategy === 'reject') flag(field, row);
        else draft.blanks.push(field);
        continue;
      }
      const result = cellSchemas[field].safeParse(raw);
      if (result.success) draft.numbers[field] = result.data;
      else flag(field, row);
    }

    const rawTimestamp = cell('timestamp');
    if (isPresent(rawTimestamp)) {
      const result = cellSchemas.timestamp.safeParse(rawTimestamp);
      if (result.success) draft.timestamp = result.data;
      else flag('timestamp', row);
    } else if (indexOf('timestamp') >= 0) {
      countBlank('timestamp');
    }

    return draft;
  });

  if (malformed.size > 0) {
    throw malformedError(malformed);
  }

  // 3. Apply the missing-value strategy
  const kept = strategy === 'drop' ? drafts.filter((d) => d.blanks.length === 0) : drafts;
  let valuesFilled = 0;

  if (strategy === 'fill') {
    valuesFilled = fillBlanks(kept);
  }

  // 4. Freeze into records
  const records = Object.freeze(kept.map(toRecord));

  const columns: ColumnInfo[] = COLUMNS.map((c) => ({
    name: c.header,
    field: c.field,
    kind: c.kind,
    required: c.required,
    present: indexOf(c.field) >= 0,
    missing: blankCounts.get(c.field) ?? 0,
  }));

  return {
    source: options.source ?? 'upload.csv',
    loadedAt: new Date(),
    records,
    columns,
    rowsDropped: drafts.length - kept.length,
    valuesFilled,
  };
}

// ── Helpers ──

function malformedError(malformed: Map<keyof DeliveryRecord, number[]>): DatasetError {
  const issues: ColumnIssue[] = [];
  const parts: string[] = [];

  // Report in schema order, not discovery order
  for (const column of COLUMNS) {
    const rows = malformed.get(column.field);
    if (!rows) continue;
    issues.push({ column: column.header, kind: 'malformed', rows });

    const shown = rows.slice(0, MAX_ROWS_IN_MESSAGE).join(', ');
    const more = rows.length > MAX_ROWS_IN_MESSAGE ? ` and ${rows.length - MAX_ROWS_IN_MESSAGE} more` : '';
    parts.push(`'${column.header}' (rows ${shown}${more})`);
  }

  return new DatasetError(`Malformed values in column(s): ${parts.join('; ')}`, issues);
}

function fillBlanks(drafts: DraftRow[]): number {
  let filled = 0;

  for (const field of NUMERIC_FIELDS) {
    const present = drafts.flatMap((d) => {
      const value = d.numbers[field];
      return value === undefined ? [] : [value];
    });
    // Unrounded: rounding belongs to the aggregates
    const fillValue = mean(present);
    for (const draft of drafts) {
      if (!draft.blanks.includes(field)) continue;
      if (fillValue === undefined) {
        throw new DatasetError(
          `Cannot fill blank '${COLUMN_BY_FIELD[field].header}' values: the column has no values`,
          [{ column: COLUMN_BY_FIELD[field].header, kind: 'malformed', rows: [draft.row] }]
        );
      }
      draft.numbers[field] = fillValue;
      filled++;
    }
  }

  for (const field of ['platform', 'productCategory'] as const) {
    const present = drafts.flatMap((d) => {
      const value = d.text[field];
      return value === undefined ? [] : [value];
    });
    const fillValue = mode(present);
    for (const draft of drafts) {
      if (!draft.blanks.includes(field)) continue;
      if (fillValue === null) {
        throw new DatasetError(
          `Cannot fill blank '${COLUMN_BY_FIELD[field].header}' values: the column has no values`,
          [{ column: COLUMN_BY_FIELD[field].header, kind: 'malformed', rows: [draft.row] }]
        );
      }
      draft.text[field] = fillValue;
      filled++;
    }
  }

  return filled;
}

function toRecord(draft: DraftRow): DeliveryRecord {
  const { text, numbers } = draft;
  if (
    text.orderId === undefined ||
    text.platform === undefined ||
    text.productCategory === undefined ||
    numbers.deliveryTime === undefined ||
    numbers.orderValue === undefined ||
    numbers.serviceRating === undefined
  ) {
    throw new DatasetError(`Row ${draft.row} is incomplete after validation`);
  }

  return Object.freeze({
    orderId: text.orderId,
    platform: text.platform,
    deliveryTime: numbers.deliveryTime,
    orderValue: numbers.orderValue,
    productCategory: text.productCategory,
    serviceRating: numbers.serviceRating,
    timestamp: draft.timestamp,
  });
}
