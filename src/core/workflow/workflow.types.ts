import type { ResumptionHandle } from "../jobs/ResumptionHandle";

export type WorkflowStage =
  | "Querying"
  | "NoRecords"
  | "QueryFailed"
  | "HasRecords"
  | "Dispatching"
  | "DispatchFailed"
  | "AwaitingCompletion"
  | "Completed"
  | "JobFailed"
  | "Writing"
  | "WriteFailed"
  | "Done";

export const terminalStages: readonly WorkflowStage[] = [
  "NoRecords",
  "QueryFailed",
  "DispatchFailed",
  "JobFailed",
  "WriteFailed",
  "Done"
];

export const isTerminalStage = (stage: WorkflowStage): boolean => terminalStages.includes(stage);

export type PipelineErrorCode =
  | "QueryFailed"
  | "QueryTimeout"
  | "MissingResumptionToken"
  | "MissingFileKey"
  | "MissingModelId"
  | "MissingColumns"
  | "ModelNotFound"
  | "BatchTransformInitiationFailed"
  | "DispatchFailed"
  | "DispatchTimeout"
  | "BatchTransformFailed"
  | "BatchResultProcessingFailed"
  | "WriteFailed"
  | "WriteTimeout"
  | "ExecutionTimeout";

/** What a resumption token is redeemed with. */
export type JobOutcome =
  | { kind: "success"; recordCount: number; outputFileLocation: string | null }
  | { kind: "failure"; error: PipelineErrorCode; cause: string };

export type QueryStageResult =
  | { statusCode: 200; records: number; fileLocation: string; durationHours: number }
  | { statusCode: 204; records: 0; fileLocation: null; durationHours: number }
  | { statusCode: 500; errorCode: "QueryFailed"; message: string };

export type DispatchStageResult = {
  statusCode: 200 | 202 | 400 | 500;
  message: string;
  errorCode?: PipelineErrorCode;
  jobId?: string;
  batchId?: string;
};

export type WriteStageResult = {
  statusCode: 200;
  totalRecords: number;
  updatedRecords: number;
};

export type ExecutionOutcome = {
  statusCode: number;
  errorCode?: PipelineErrorCode;
  errorDetail?: string;
};

export type WorkflowExecution = {
  executionId: string;
  stage: WorkflowStage;
  durationHours: number;
  startedAt: Date;
  updatedAt: Date;
  deadlineAt: Date;
  query?: QueryStageResult;
  resumption?: ResumptionHandle & { claimedAt?: Date };
  delivered?: JobOutcome;
  write?: WriteStageResult;
  outcome?: ExecutionOutcome;
};
