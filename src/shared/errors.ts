// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export interface ColumnIssue {
  column: string;
  kind: 'missing' | 'malformed';
  /** 1-based data row numbers (the first record after the header is row 1). */
  rows: number[];
}

/** Raised when the dataset cannot be read or does not match the expected schema. */
export class DatasetError extends Error {
  constructor(
    message: string,
    public readonly issues: ColumnIssue[] = []
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}

export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterError';
  }
}

export class ChartRenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChartRenderError';
  }
}

export class ReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportError';
  }
}

/** HTTP status for an error raised while handling a dashboard request. */
export function statusFor(err: unknown): number {
  if (err instanceof DatasetError || err instanceof FilterError) return 400;
  return 500;
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
