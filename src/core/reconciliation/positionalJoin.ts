import type { PredictionRecord, RecordTable, ReconciledTable } from "../records/record.types";

export class ReconciliationError extends Error {
  readonly inputCount: number;
  readonly predictionCount: number;

  constructor(inputCount: number, predictionCount: number) {
    super(`Insufficient predictions: got ${predictionCount}, expected ${inputCount}`);
    this.name = "ReconciliationError";
    this.inputCount = inputCount;
    this.predictionCount = predictionCount;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type PositionalJoinOptions = {
  originalColumns: readonly string[];
  predictionColumn: string;
  predictedFlagColumn: string;
  predictedFlagValue?: string;
};

export type PositionalJoinResult = {
  table: ReconciledTable;
  truncatedPredictions: number;
};

/**
 * Positional Join: the prediction service is never given an id column, so
 * input row i and prediction row i are correlated by array index alone. Both
 * sides must come from order-preserving readers.
 *
 * - more predictions than inputs: the surplus is dropped
 * - fewer predictions than inputs: no safe mapping exists, so it throws
 *
 * Output columns follow `originalColumns` (those present in the input), then
 * any other input columns, then the prediction column. The predicted-flag
 * column keeps its position when the input already has it.
 */
export const positionalJoin = (
  input: RecordTable,
  predictions: readonly PredictionRecord[],
  options: PositionalJoinOptions
): PositionalJoinResult => {
  if (predictions.length < input.rows.length) {
    throw new ReconciliationError(input.rows.length, predictions.length);
  }

  const { predictionColumn, predictedFlagColumn } = options;
  const flagValue = options.predictedFlagValue ?? "TRUE";

  const ordered = options.originalColumns.filter((column) => input.columns.includes(column));
  const extras = input.columns.filter((column) => !ordered.includes(column));
  const baseColumns = [...ordered, ...extras].filter((column) => column !== predictionColumn);
  const hasFlag = baseColumns.includes(predictedFlagColumn);
  const columns = hasFlag
    ? [...baseColumns, predictionColumn]
    : [...baseColumns, predictionColumn, predictedFlagColumn];

  const sourceIndexes = baseColumns.map((column) => input.columns.indexOf(column));
  const flagIndex = baseColumns.indexOf(predictedFlagColumn);

  const rows = input.rows.map((row, position) => {
    const cells = sourceIndexes.map((sourceIndex) => row.cells[sourceIndex] ?? "");
    if (flagIndex >= 0) cells[flagIndex] = flagValue;

    const prediction = predictions[position];
    cells.push(prediction?.score ?? "");
    if (!hasFlag) cells.push(flagValue);

    return { id: row.id, cells };
  });

  return {
    table: { columns, rows, predictionColumn, predictedFlagColumn },
    truncatedPredictions: predictions.length - input.rows.length
  };
};
