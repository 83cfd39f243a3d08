import type { RecordTable } from "../core/records/record.types";

export type CandidateQuery = {
  sentinelValue: number;
  parameter?: string;
  since?: Date; // applied only when the table has a detectable time column
};

export interface CandidateRecordStore {
  findCandidates(query: CandidateQuery): Promise<RecordTable>;
  /** Returns false when no row carries `id`. Each call commits on its own. */
  updatePrediction(id: string, predictedValue: number): Promise<boolean>;
}
