import { dispatchJob } from "../application/dispatch-job/dispatchJob.usecase";
import {
  handleCompletion,
  type CompletionResult,
  type JobStatusEvent
} from "../application/handle-completion/handleCompletion.usecase";
import { queryCandidates } from "../application/query-candidates/queryCandidates.usecase";
import { WorkflowOrchestrator } from "../application/workflow/WorkflowOrchestrator";
import { writePredictions } from "../application/write-predictions/writePredictions.usecase";
import type { WorkflowExecution } from "../core/workflow/workflow.types";
import { createMongoClient } from "../infrastructure/mongo/MongoClientFactory";
import { MongoJobMetadataStore } from "../infrastructure/mongo/MongoJobMetadataStore";
import { MongoWorkflowExecutionStore } from "../infrastructure/mongo/MongoWorkflowExecutionStore";
import {
  createPostgresPool,
  PostgresCandidateRecordStore
} from "../infrastructure/postgres/PostgresCandidateRecordStore";
import { PredictionServiceHttpClient } from "../infrastructure/prediction/PredictionServiceHttpClient";
import { createS3Client, S3ObjectStorage } from "../infrastructure/s3/S3ObjectStorage";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type PipelineApp = {
  orchestrator: WorkflowOrchestrator;
  handleJobEvent: (event: JobStatusEvent) => Promise<CompletionResult>;
  close: () => Promise<void>;
};

/**
 * Builds every adapter once per process. Configuration is read here and
 * nowhere else.
 */
export const createPipelineApp = async (env: NodeJS.ProcessEnv = process.env): Promise<PipelineApp> => {
  const connection = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);
  const config = runtime.pipeline;

  const mongo = await createMongoClient(connection.MONGO_URI);
  const pool = createPostgresPool(connection.DATABASE_URL);
  const s3 = createS3Client({ region: connection.AWS_REGION, endpoint: connection.S3_ENDPOINT });

  const storage = new S3ObjectStorage(s3, connection.S3_BUCKET);
  const store = new PostgresCandidateRecordStore(pool, config);
  const metadata = new MongoJobMetadataStore(mongo, connection.MONGO_DB_NAME);
  const executions = new MongoWorkflowExecutionStore(mongo, connection.MONGO_DB_NAME);
  const prediction = new PredictionServiceHttpClient(connection.PREDICTION_BASE_URL, connection.PREDICTION_API_KEY, {
    timeoutMs: runtime.httpTimeoutMs
  });

  // The dispatcher signals the orchestrator that invokes it.
  const orchestrator: WorkflowOrchestrator = new WorkflowOrchestrator({
    executions,
    timeouts: config.timeouts,
    stages: {
      query: (input) => queryCandidates({ store, storage, config }, input),
      dispatch: (input) => dispatchJob({ storage, metadata, prediction, resumer: orchestrator, config }, input),
      write: (input) => writePredictions({ store, storage, config }, input)
    }
  });

  return {
    orchestrator,
    handleJobEvent: (event) => handleCompletion({ storage, metadata, prediction, resumer: orchestrator, config }, event),
    close: async () => {
      s3.destroy();
      await Promise.all([mongo.close(), pool.end()]);
    }
  };
};

/**
 * One trigger: fail whatever is overdue, then start a fresh execution.
 */
export const runPipeline = async (
  durationHours: number,
  env: NodeJS.ProcessEnv = process.env
): Promise<WorkflowExecution> => {
  const app = await createPipelineApp(env);
  try {
    await app.orchestrator.expireOverdue();
    return await app.orchestrator.start({ durationHours });
  } finally {
    await app.close();
  }
};
