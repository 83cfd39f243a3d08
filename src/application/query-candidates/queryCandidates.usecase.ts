import { formatRunTimestamp, queryExportKey } from "../../core/jobs/objectKeys";
import { encodeRecordTable } from "../../core/records/csvCodec";
import type { QueryStageResult } from "../../core/workflow/workflow.types";
import type { CandidateRecordStore } from "../../ports/CandidateRecordStore";
import type { ObjectStorage } from "../../ports/ObjectStorage";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import type { PipelineConfig } from "../pipeline/pipeline.config";

const HOUR_MS = 60 * 60 * 1000;

export type QueryCandidatesDeps = {
  store: CandidateRecordStore;
  storage: ObjectStorage;
  config: PipelineConfig;
  now?: () => Date;
};

/**
 * Exports rows still carrying the sentinel value. An empty selection is a
 * normal 204 outcome; any fault becomes a 500 result instead of a throw.
 */
export const queryCandidates = async (
  deps: QueryCandidatesDeps,
  input: { durationHours: number }
): Promise<QueryStageResult> => {
  const { store, storage, config } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const since = config.lookbackHours !== undefined ? new Date(now.getTime() - config.lookbackHours * HOUR_MS) : undefined;

  try {
    const table = await store.findCandidates({
      sentinelValue: config.sentinelValue,
      parameter: config.parameter,
      since
    });

    if (table.rows.length === 0) {
      logEvent("info", "query.no_records", { durationHours: input.durationHours, parameter: config.parameter ?? null });
      return { statusCode: 204, records: 0, fileLocation: null, durationHours: input.durationHours };
    }

    const key = queryExportKey(config.prefixes, formatRunTimestamp(now));
    await storage.writeObject(key, encodeRecordTable(table), "text/csv");

    logEvent("info", "query.completed", { records: table.rows.length, key, durationHours: input.durationHours });
    return { statusCode: 200, records: table.rows.length, fileLocation: key, durationHours: input.durationHours };
  } catch (err) {
    const message = `Error fetching candidate records: ${toErrorMessage(err)}`;
    logEvent("error", "query.failed", { message });
    return { statusCode: 500, errorCode: "QueryFailed", message };
  }
};
