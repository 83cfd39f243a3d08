import { parsePredictedValue } from "../../core/predictions/rounding";
import { parseCsvRows } from "../../core/records/csvCodec";
import type { WriteStageResult } from "../../core/workflow/workflow.types";
import type { CandidateRecordStore } from "../../ports/CandidateRecordStore";
import type { ObjectStorage } from "../../ports/ObjectStorage";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { PipelineError } from "../pipeline/pipeline.error-handler";

export type WritePredictionsDeps = {
  store: CandidateRecordStore;
  storage: ObjectStorage;
  config: Pick<PipelineConfig, "idColumn" | "predictionColumn">;
};

export type WritePredictionsInput = {
  fileLocation: string | null;
  expectedRecords: number;
};

export type SkippedRow = {
  row: number;
  reason: "missing_id" | "invalid_value" | "id_not_found" | "update_failed";
};

/**
 * Applies predictions one row at a time. Each update commits on its own, so a
 * failing row never rolls back the rows already written.
 */
export const writePredictions = async (
  deps: WritePredictionsDeps,
  input: WritePredictionsInput
): Promise<WriteStageResult> => {
  const { store, storage, config } = deps;

  if (input.expectedRecords === 0 || input.fileLocation === null) {
    logEvent("info", "write.nothing_to_update", { fileLocation: input.fileLocation });
    return { statusCode: 200, totalRecords: 0, updatedRecords: 0 };
  }

  const [header, ...body] = parseCsvRows(await storage.readObject(input.fileLocation));
  const columns = (header ?? []).map((name) => name.trim());
  const idIndex = columns.indexOf(config.idColumn);
  const valueIndex = columns.indexOf(config.predictionColumn);
  if (idIndex < 0 || valueIndex < 0) {
    throw new PipelineError({
      code: "MissingColumns",
      status: 400,
      message: `Required columns (${config.idColumn}, ${config.predictionColumn}) not found in ${input.fileLocation}`,
      context: { key: input.fileLocation }
    });
  }

  if (body.length !== input.expectedRecords) {
    logEvent("warn", "write.count_mismatch", { expected: input.expectedRecords, parsed: body.length });
  }

  let updatedRecords = 0;
  const skipped: SkippedRow[] = [];

  for (const [index, cells] of body.entries()) {
    const row = index + 1;
    const id = (cells[idIndex] ?? "").trim();
    if (id === "") {
      skipped.push({ row, reason: "missing_id" });
      logEvent("warn", "write.row_skipped", { row, reason: "missing_id" });
      continue;
    }

    const value = parsePredictedValue(cells[valueIndex] ?? "");
    if (value === undefined) {
      skipped.push({ row, reason: "invalid_value" });
      logEvent("warn", "write.row_skipped", { row, id, reason: "invalid_value" });
      continue;
    }

    try {
      if (await store.updatePrediction(id, value)) {
        updatedRecords += 1;
      } else {
        skipped.push({ row, reason: "id_not_found" });
        logEvent("warn", "write.row_skipped", { row, id, reason: "id_not_found" });
      }
    } catch (err) {
      skipped.push({ row, reason: "update_failed" });
      logEvent("error", "write.row_failed", { row, id, message: toErrorMessage(err) });
    }
  }

  logEvent("info", "write.completed", { totalRecords: body.length, updatedRecords, skipped: skipped.length });
  return { statusCode: 200, totalRecords: body.length, updatedRecords };
};
