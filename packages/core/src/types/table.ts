/**
 * Summary of one table as seen by a connection at load time.
 * A fresh, frozen object is produced on every load.
 */
export interface TableSummary {
  readonly name: string;
  readonly rowCount: number;
  readonly colCount: number;
  /** ISO-8601 creation time, when the backend reports it */
  readonly created?: string;
  /** ISO-8601 last-update time, when the backend reports it */
  readonly updated?: string;
}

/**
 * Per-table configuration. Opaque to the core.
 */
export type TableConfig = Readonly<Record<string, unknown>>;

/**
 * Build a frozen TableSummary, clamping counts to non-negative integers.
 */
export function tableSummary(input: {
  name: string;
  rowCount?: number | null;
  colCount?: number | null;
  created?: string | null;
  updated?: string | null;
}): TableSummary {
  const summary: TableSummary = {
    name: input.name,
    rowCount: toCount(input.rowCount),
    colCount: toCount(input.colCount),
    ...(input.created ? { created: input.created } : {}),
    ...(input.updated ? { updated: input.updated } : {}),
  };
  return Object.freeze(summary);
}

function toCount(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.min(Math.floor(value), 0xffffffff);
}
