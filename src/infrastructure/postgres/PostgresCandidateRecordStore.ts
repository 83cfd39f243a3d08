import { Pool, type QueryResultRow } from "pg";
import { findTimeColumn } from "../../core/records/columnTypes";
import type { CandidateRecord, RecordTable } from "../../core/records/record.types";
import type { CandidateQuery, CandidateRecordStore } from "../../ports/CandidateRecordStore";
import type { PipelineConfig } from "../../application/pipeline/pipeline.config";
import { logEvent } from "../../shared/logging/log";

export type CandidateTableConfig = Pick<
  PipelineConfig,
  "table" | "idColumn" | "valueColumn" | "predictedFlagColumn" | "parameterColumn"
>;

export const quoteIdentifier = (input: string): string => `"${input.replace(/"/g, '""')}"`;

export const createPostgresPool = (connectionString: string): Pool => {
  const pool = new Pool({ connectionString });
  pool.on("error", (err: Error) => {
    logEvent("error", "postgres.idle_client_error", { message: err.message });
  });
  return pool;
};

/** Relational cells become CSV text exactly once, here. */
export const toCell = (value: unknown): string => {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
};

export type CandidateSql = { text: string; values: unknown[] };

/**
 * `SELECT *` keeps every column of the source table in the export; the
 * recency filter is added only when the table has a time-like column.
 */
export const buildCandidateQuery = (
  table: CandidateTableConfig,
  query: CandidateQuery,
  columns: readonly string[]
): CandidateSql => {
  const values: unknown[] = [query.sentinelValue];
  const where = [`${quoteIdentifier(table.valueColumn)} = $1`, `${quoteIdentifier(table.predictedFlagColumn)} = false`];

  if (query.parameter !== undefined) {
    values.push(query.parameter);
    where.push(`${quoteIdentifier(table.parameterColumn)} = $${values.length}`);
  }

  const timeColumn = query.since ? findTimeColumn(columns) : undefined;
  if (query.since && timeColumn) {
    values.push(query.since);
    where.push(`${quoteIdentifier(timeColumn)} >= $${values.length}`);
  }

  return {
    text: `SELECT * FROM ${quoteIdentifier(table.table)} WHERE ${where.join(" AND ")} ORDER BY ${quoteIdentifier(table.idColumn)}`,
    values
  };
};

export class PostgresCandidateRecordStore implements CandidateRecordStore {
  private columns?: string[];

  constructor(
    private readonly pool: Pool,
    private readonly table: CandidateTableConfig
  ) {}

  private async tableColumns(): Promise<string[]> {
    if (this.columns) return this.columns;

    const result = await this.pool.query<{ column_name: string }>(
      "SELECT column_name FROM information_schema.columns WHERE table_name = $1 ORDER BY ordinal_position",
      [this.table.table]
    );
    this.columns = result.rows.map((row) => row.column_name);
    return this.columns;
  }

  async findCandidates(query: CandidateQuery): Promise<RecordTable> {
    const columns = query.since ? await this.tableColumns() : [];
    const sql = buildCandidateQuery(this.table, query, columns);
    const result = await this.pool.query<QueryResultRow>(sql.text, sql.values);

    const resultColumns = result.fields.map((field) => field.name);
    if (!resultColumns.includes(this.table.idColumn)) {
      throw new Error(`Table ${this.table.table} has no column ${this.table.idColumn}`);
    }

    const rows: CandidateRecord[] = result.rows.map((row) => ({
      id: toCell(row[this.table.idColumn]),
      cells: resultColumns.map((column) => toCell(row[column]))
    }));
    return { columns: resultColumns, rows };
  }

  async updatePrediction(id: string, predictedValue: number): Promise<boolean> {
    const { table, valueColumn, predictedFlagColumn, idColumn } = this.table;
    const result = await this.pool.query(
      `UPDATE ${quoteIdentifier(table)} SET ${quoteIdentifier(valueColumn)} = $1, ${quoteIdentifier(
        predictedFlagColumn
      )} = TRUE WHERE ${quoteIdentifier(idColumn)} = $2 RETURNING ${quoteIdentifier(idColumn)}`,
      [predictedValue, id]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
