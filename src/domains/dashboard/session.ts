// ──────────────────────────────────────────
// Dashboard: session state (dataset + active filter)
// ──────────────────────────────────────────

import { aggregate, applyFilter, emptyFilter, filterOptions, parseFilter } from '../analytics';
import { parseDataset } from '../ingestion';
import { AnalyticsContract } from '../../shared/contracts';
import { AggregateView, Dataset, DeliveryRecord, FilterOptions, FilterSelection, MissingValueStrategy } from '../../shared/types';

/**
 * Single-user session. Filter changes and uploads are all-or-nothing:
 * on any validation error the previous state is kept.
 */
export class DashboardSession implements AnalyticsContract {
  private filter: FilterSelection = emptyFilter();

  constructor(
    private dataset: Dataset,
    private readonly missing: MissingValueStrategy = 'reject'
  ) {}

  getDataset(): Dataset {
    return this.dataset;
  }

  datasetName(): string {
    return this.dataset.source;
  }

  getFilter(): FilterSelection {
    return this.filter;
  }

  /** Validates before replacing; throws FilterError on bad input. */
  setFilter(input: unknown): FilterSelection {
    this.filter = parseFilter(input);
    return this.filter;
  }

  resetFilter(): FilterSelection {
    this.filter = emptyFilter();
    return this.filter;
  }

  options(): FilterOptions {
    return filterOptions(this.dataset.records);
  }

  filteredRecords(): readonly DeliveryRecord[] {
    return applyFilter(this.dataset.records, this.filter);
  }

  view(): AggregateView {
    return aggregate(this.dataset.records, this.filter);
  }

  /** Parse an uploaded CSV; on success it replaces the dataset and clears the filter. */
  replaceDataset(content: string, source: string): Dataset {
    const next = parseDataset(content, { missing: this.missing, source });
    this.dataset = next;
    this.filter = emptyFilter();
    console.log(`[Dashboard] Dataset replaced by ${source} (${next.records.length} records)`);
    return next;
  }
}
