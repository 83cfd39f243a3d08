/**
 * Cells are kept as text: every stage boundary is a CSV object, so a value
 * read from the relational store is stringified once at export time.
 */
export type CandidateRecord = {
  id: string;
  cells: string[]; // aligned with RecordTable.columns, id cell included
};

export type RecordTable = {
  columns: string[];
  rows: CandidateRecord[];
};

export type PredictionRecord = {
  position: number;
  score: string;
};

export type ReconciledTable = RecordTable & {
  predictionColumn: string;
  predictedFlagColumn: string;
};
