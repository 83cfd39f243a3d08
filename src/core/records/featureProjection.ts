import type { RecordTable } from "./record.types";

export class MissingColumnsError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required columns in input data: ${missing.join(", ")}`);
    this.name = "MissingColumnsError";
    this.missing = missing;
  }
}

/**
 * Keeps only the feature columns, in the configured order. Row order and
 * identifiers are untouched so the projected table stays position-aligned
 * with its source.
 */
export const projectFeatures = (table: RecordTable, featureColumns: readonly string[]): RecordTable => {
  const missing = featureColumns.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }

  const indexes = featureColumns.map((column) => table.columns.indexOf(column));
  return {
    columns: [...featureColumns],
    rows: table.rows.map((row) => ({ id: row.id, cells: indexes.map((i) => row.cells[i] ?? "") }))
  };
};
