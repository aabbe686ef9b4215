// ──────────────────────────────────────────
// Ingestion: dataset description + per-column distributions
// ──────────────────────────────────────────

import { ascending, descending } from 'd3';
import { DatasetError } from '../../shared/errors';
import { histogram, numericSummary } from '../../shared/stats';
import { ColumnDistribution, Dataset, DatasetDescription, DeliveryRecord } from '../../shared/types';
import { COLUMNS, NUMERIC_FIELDS, findColumn } from './schema';

export function describeDataset(dataset: Dataset): DatasetDescription {
  const numeric: DatasetDescription['numeric'] = {};
  for (const field of NUMERIC_FIELDS) {
    const header = COLUMNS.find((c) => c.field === field)?.header ?? field;
    numeric[header] = numericSummary(dataset.records.map((r) => r[field]));
  }

  return {
    source: dataset.source,
    loadedAt: dataset.loadedAt.toISOString(),
    rows: dataset.records.length,
    rowsDropped: dataset.rowsDropped,
    valuesFilled: dataset.valuesFilled,
    columns: dataset.columns,
    numeric,
  };
}

/**
 * Distribution of a single column, looked up by its CSV header.
 * Numeric columns are binned; everything else is value-counted.
 */
export function columnDistribution(records: readonly DeliveryRecord[], header: string): ColumnDistribution {
  const column = findColumn(header);
  if (!column) {
    throw new DatasetError(`Unknown column: ${header}`);
  }

  const { field } = column;
  if (field === 'deliveryTime' || field === 'orderValue' || field === 'serviceRating') {
    return { kind: 'numeric', column: column.header, bins: histogram(records.map((r) => r[field])) };
  }

  const counts = new Map<string, number>();
  for (const record of records) {
    const value = field === 'timestamp' ? record.timestamp?.toISOString().slice(0, 10) ?? '' : record[field];
    if (value === '') continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return {
    kind: 'categorical',
    column: column.header,
    counts: Array.from(counts, ([value, count]) => ({ value, count })).sort(
      (a, b) => descending(a.count, b.count) || ascending(a.value, b.value)
    ),
  };
}
