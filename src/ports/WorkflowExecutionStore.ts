import type { JobOutcome, WorkflowExecution, WorkflowStage } from "../core/workflow/workflow.types";

export type ExecutionPatch = Partial<Omit<WorkflowExecution, "executionId" | "startedAt">> & {
  stage: WorkflowStage;
  updatedAt: Date;
};

/**
 * Durable state of parked and finished executions. `transition` and
 * `claimResumption` must be atomic; they are what guarantees a single resume.
 */
export interface WorkflowExecutionStore {
  create(execution: WorkflowExecution): Promise<void>;
  get(executionId: string): Promise<WorkflowExecution | null>;
  findByToken(token: string): Promise<WorkflowExecution | null>;
  /** Compare-and-set on the stage; null when the stage is no longer one of `from`. */
  transition(executionId: string, from: readonly WorkflowStage[], patch: ExecutionPatch): Promise<WorkflowExecution | null>;
  /** Marks the token used and records the outcome; null when unknown or already claimed. */
  claimResumption(token: string, outcome: JobOutcome, claimedAt: Date): Promise<WorkflowExecution | null>;
  findOverdue(now: Date): Promise<WorkflowExecution[]>;
}
