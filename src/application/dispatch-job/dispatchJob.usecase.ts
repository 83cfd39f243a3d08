import { randomUUID } from "crypto";
import type { JobMetadata } from "../../core/jobs/JobMetadata";
import {
  formatRunTimestamp,
  inputBatchKey,
  outputBatchKey,
  toObjectUri
} from "../../core/jobs/objectKeys";
import type { ResumptionHandle } from "../../core/jobs/ResumptionHandle";
import { decodeRecordTable, encodeRecordTable } from "../../core/records/csvCodec";
import { projectFeatures } from "../../core/records/featureProjection";
import type { DispatchStageResult, JobOutcome, QueryStageResult } from "../../core/workflow/workflow.types";
import type { JobMetadataStore } from "../../ports/JobMetadataStore";
import type { ObjectStorage } from "../../ports/ObjectStorage";
import type { PredictionService } from "../../ports/PredictionService";
import type { WorkflowResumer } from "../../ports/WorkflowResumer";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import type { PipelineConfig } from "../pipeline/pipeline.config";
import { classifyDispatchFailure, failureOutcome, PipelineError } from "../pipeline/pipeline.error-handler";

export type DispatchJobDeps = {
  storage: ObjectStorage;
  metadata: JobMetadataStore;
  prediction: PredictionService;
  resumer: WorkflowResumer;
  config: PipelineConfig;
  now?: () => Date;
  newBatchId?: () => string;
};

export type DispatchJobInput = {
  queryResult?: QueryStageResult;
  resumption?: ResumptionHandle;
  durationHours: number;
};

const newShortId = () => randomUUID().slice(0, 8);

/**
 * Prepares the feature file, submits the batch job and records what the
 * completion handler needs to resume the workflow. It never reports success
 * for a submitted job; that signal belongs to the completion handler. Every
 * failure path signals the orchestrator before returning.
 */
export const dispatchJob = async (deps: DispatchJobDeps, input: DispatchJobInput): Promise<DispatchStageResult> => {
  const { storage, metadata, prediction, resumer, config } = deps;
  const resumption = input.resumption;

  if (!resumption || resumption.token.trim() === "") {
    logEvent("error", "dispatch.missing_token");
    return { statusCode: 400, errorCode: "MissingResumptionToken", message: "No resumption token provided" };
  }

  const signal = async (outcome: JobOutcome): Promise<void> => {
    try {
      const receipt = await resumer.deliverOutcome(resumption.token, outcome);
      logEvent("info", "dispatch.signaled", { outcome: outcome.kind, receipt: receipt.status });
    } catch (err) {
      logEvent("error", "dispatch.signal_failed", { outcome: outcome.kind, message: toErrorMessage(err) });
    }
  };

  const fail = async (error: PipelineError): Promise<DispatchStageResult> => {
    logEvent("error", "dispatch.failed", { code: error.code, message: error.message, ...error.context });
    await signal(failureOutcome(error.code, error));
    return { statusCode: error.status, errorCode: error.code, message: error.message };
  };

  const succeedWithoutJob = async (message: string): Promise<DispatchStageResult> => {
    logEvent("info", "dispatch.no_records", { message });
    await signal({ kind: "success", recordCount: 0, outputFileLocation: null });
    return { statusCode: 200, message };
  };

  const query = input.queryResult;
  if (!query || query.statusCode === 500) {
    return fail(new PipelineError({ code: "MissingFileKey", status: 400, message: "No export file provided by the query stage" }));
  }
  if (query.statusCode === 204 || query.records === 0) {
    return succeedWithoutJob("No records found");
  }

  const modelId = config.modelId;
  if (!modelId) {
    return fail(
      new PipelineError({
        code: "MissingModelId",
        message: "Model id not configured. Set MODEL_ID to a model known to the prediction service."
      })
    );
  }

  const sourceLocation = query.fileLocation;
  try {
    const source = decodeRecordTable(await storage.readObject(sourceLocation), config.idColumn);
    if (source.rows.length === 0) {
      return await succeedWithoutJob("Export file contains no records");
    }

    const features = projectFeatures(source, config.featureColumns);
    const now = (deps.now ?? (() => new Date()))();
    const batchId = (deps.newBatchId ?? newShortId)();
    const inputLocation = inputBatchKey(config.prefixes, batchId, formatRunTimestamp(now));
    await storage.writeObject(inputLocation, encodeRecordTable(features, { header: false }), "text/csv");

    if (!(await prediction.modelExists(modelId))) {
      throw new PipelineError({
        code: "ModelNotFound",
        message: `Model ${modelId} not found. Provide a model known to the prediction service.`,
        context: { batchId }
      });
    }

    const job = await prediction.submitJob({
      modelId,
      inputUri: toObjectUri(storage.bucket, inputLocation),
      outputUri: toObjectUri(storage.bucket, config.prefixes.outputBatch),
      instanceType: config.instanceType,
      instanceCount: config.instanceCount,
      contentType: "text/csv"
    });

    const jobMetadata: JobMetadata = {
      jobId: job.jobId,
      batchId,
      createdAt: now,
      resumption,
      inputLocation,
      outputLocation: outputBatchKey(config.prefixes, inputLocation),
      sourceLocation,
      expectedRecordCount: features.rows.length,
      originalColumns: source.columns,
      bucket: storage.bucket,
      modelId,
      durationHours: input.durationHours
    };
    await metadata.put(jobMetadata);

    logEvent("info", "dispatch.submitted", {
      jobId: job.jobId,
      batchId,
      records: features.rows.length,
      inputLocation,
      instanceType: config.instanceType,
      instanceCount: config.instanceCount
    });
    return { statusCode: 202, message: "Batch job submitted", jobId: job.jobId, batchId };
  } catch (err) {
    return fail(classifyDispatchFailure(err, { key: sourceLocation }));
  }
};
