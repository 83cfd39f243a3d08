import type { JobMetadata } from "../../core/jobs/JobMetadata";
import { isSuccessfulJob, normalizeJobStatus } from "../../core/jobs/jobStatus";
import { formatRunTimestamp, predictedOutputKey, toObjectUri } from "../../core/jobs/objectKeys";
import { decodePredictions, decodeRecordTable, encodeRecordTable } from "../../core/records/csvCodec";
import { positionalJoin } from "../../core/reconciliation/positionalJoin";
import type { JobOutcome } from "../../core/workflow/workflow.types";
import type { JobMetadataStore } from "../../ports/JobMetadataStore";
import type { ObjectStorage } from "../../ports/ObjectStorage";
import type { PredictionService } from "../../ports/PredictionService";
import type { DeliveryReceipt, WorkflowResumer } from "../../ports/WorkflowResumer";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { failureOutcome } from "../pipeline/pipeline.error-handler";

export type JobStatusEvent = {
  jobId: string;
  status?: string;
};

export type CompletionResult = {
  statusCode: 200 | 400 | 404 | 500;
  message: string;
  jobStatus?: string;
  receipt?: DeliveryReceipt["status"];
};

export type HandleCompletionDeps = {
  storage: ObjectStorage;
  metadata: JobMetadataStore;
  prediction: PredictionService;
  resumer: WorkflowResumer;
  config: PipelineConfig;
};

const DIAGNOSTIC_LIST_LIMIT = 10;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const nonEmptyString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

/**
 * Accepts `{ jobId, status }` or an envelope carrying the same fields under
 * `detail`. Returns undefined when no job id can be found.
 */
export const parseJobStatusEvent = (raw: unknown): JobStatusEvent | undefined => {
  if (!isRecord(raw)) return undefined;
  const source = isRecord(raw.detail) ? raw.detail : raw;

  const jobId = nonEmptyString(source.jobId);
  if (!jobId) return undefined;

  const status = nonEmptyString(source.status);
  return status ? { jobId, status } : { jobId };
};

const parentPrefix = (key: string) => {
  const slash = key.lastIndexOf("/");
  return slash < 0 ? "" : key.slice(0, slash);
};

const missingOutputError = async (storage: ObjectStorage, outputLocation: string): Promise<Error> => {
  const base = `Output file not found: ${toObjectUri(storage.bucket, outputLocation)}`;
  const prefix = parentPrefix(outputLocation);
  try {
    const available = await storage.listObjects(prefix, DIAGNOSTIC_LIST_LIMIT);
    return new Error(
      available.length > 0
        ? `${base}. Available files in prefix: ${available.join(", ")}`
        : `${base}. No files found in prefix: ${prefix}`
    );
  } catch (err) {
    logEvent("warn", "completion.list_failed", { prefix, message: toErrorMessage(err) });
    return new Error(base);
  }
};

/**
 * Reads the original rows and the raw job output, joins them by position and
 * writes the merged file. Nothing is written when reconciliation fails.
 */
export const reconcileJobOutput = async (
  deps: Pick<HandleCompletionDeps, "storage" | "config">,
  meta: JobMetadata
): Promise<{ recordCount: number; outputFileLocation: string }> => {
  const { storage, config } = deps;

  const original = decodeRecordTable(await storage.readObject(meta.sourceLocation), config.idColumn);
  if (original.rows.length === 0) {
    throw new Error(`Original input data is empty: ${meta.sourceLocation}`);
  }
  if (original.rows.length !== meta.expectedRecordCount) {
    logEvent("warn", "completion.input_count_changed", {
      jobId: meta.jobId,
      expected: meta.expectedRecordCount,
      actual: original.rows.length
    });
  }

  if (!(await storage.objectExists(meta.outputLocation))) {
    throw await missingOutputError(storage, meta.outputLocation);
  }
  const predictions = decodePredictions(await storage.readObject(meta.outputLocation));

  const { table, truncatedPredictions } = positionalJoin(original, predictions, {
    originalColumns: meta.originalColumns,
    predictionColumn: config.predictionColumn,
    predictedFlagColumn: config.predictedFlagColumn
  });
  if (truncatedPredictions > 0) {
    logEvent("warn", "completion.predictions_truncated", {
      jobId: meta.jobId,
      from: predictions.length,
      to: original.rows.length
    });
  }

  const outputFileLocation = predictedOutputKey(config.prefixes, formatRunTimestamp(meta.createdAt));
  await storage.writeObject(outputFileLocation, encodeRecordTable(table), "text/csv");

  logEvent("info", "completion.reconciled", { jobId: meta.jobId, records: table.rows.length, outputFileLocation });
  return { recordCount: table.rows.length, outputFileLocation };
};

const resolveStatus = async (prediction: PredictionService, event: JobStatusEvent): Promise<string> => {
  if (event.status) return event.status;
  try {
    const description = await prediction.describeJob(event.jobId);
    if (description.failureReason) {
      logEvent("warn", "completion.job_failure_reason", { jobId: event.jobId, reason: description.failureReason });
    }
    return description.rawStatus;
  } catch (err) {
    logEvent("error", "completion.describe_failed", { jobId: event.jobId, message: toErrorMessage(err) });
    return "Unknown";
  }
};

export const handleCompletion = async (deps: HandleCompletionDeps, event: JobStatusEvent): Promise<CompletionResult> => {
  const { metadata, prediction, resumer } = deps;
  const { jobId } = event;

  let meta: JobMetadata | null;
  try {
    meta = await metadata.get(jobId);
  } catch (err) {
    const message = `Failed to retrieve job metadata: ${toErrorMessage(err)}`;
    logEvent("error", "completion.metadata_read_failed", { jobId, message });
    return { statusCode: 500, message };
  }

  if (!meta) {
    // Nothing to resume: either an unknown job or one already handled.
    logEvent("warn", "completion.metadata_missing", { jobId, status: event.status ?? null });
    return { statusCode: 404, message: `No job metadata found for ${jobId}` };
  }

  const rawStatus = await resolveStatus(prediction, event);
  const status = normalizeJobStatus(rawStatus);
  logEvent("info", "completion.received", { jobId, status: rawStatus, batchId: meta.batchId });

  let outcome: JobOutcome;
  if (!isSuccessfulJob(status)) {
    outcome = { kind: "failure", error: "BatchTransformFailed", cause: rawStatus };
  } else {
    try {
      outcome = { kind: "success", ...(await reconcileJobOutput(deps, meta)) };
    } catch (err) {
      logEvent("error", "completion.processing_failed", { jobId, message: toErrorMessage(err) });
      outcome = failureOutcome("BatchResultProcessingFailed", err);
    }
  }

  let receipt: DeliveryReceipt;
  try {
    receipt = await resumer.deliverOutcome(meta.resumption.token, outcome);
  } catch (err) {
    // Metadata stays so a redelivered event can try again.
    const message = `Failed to signal workflow: ${toErrorMessage(err)}`;
    logEvent("error", "completion.signal_failed", { jobId, message });
    return { statusCode: 500, message, jobStatus: rawStatus };
  }
  logEvent("info", "completion.signaled", { jobId, outcome: outcome.kind, receipt: receipt.status });

  try {
    await metadata.delete(jobId);
  } catch (err) {
    logEvent("warn", "completion.cleanup_failed", { jobId, message: toErrorMessage(err) });
  }

  return { statusCode: 200, message: `Callback processed for job ${jobId}`, jobStatus: rawStatus, receipt: receipt.status };
};
