import { randomUUID } from "crypto";
import { isExpired, type ResumptionHandle } from "../../core/jobs/ResumptionHandle";
import type {
  DispatchStageResult,
  ExecutionOutcome,
  JobOutcome,
  PipelineErrorCode,
  QueryStageResult,
  WorkflowExecution,
  WorkflowStage,
  WriteStageResult
} from "../../core/workflow/workflow.types";
import type { ExecutionPatch, WorkflowExecutionStore } from "../../ports/WorkflowExecutionStore";
import type { DeliveryReceipt, WorkflowResumer } from "../../ports/WorkflowResumer";
import { logEvent, toErrorMessage } from "../../shared/logging/log";
import { withTimeout } from "../../shared/timeout/withTimeout";
import type { DispatchJobInput } from "../dispatch-job/dispatchJob.usecase";
import type { StageTimeouts } from "../pipeline/pipeline.config";
import { stageFailureCode } from "../pipeline/pipeline.error-handler";
import type { WritePredictionsInput } from "../write-predictions/writePredictions.usecase";

export type WorkflowStages = {
  query: (input: { durationHours: number }) => Promise<QueryStageResult>;
  dispatch: (input: DispatchJobInput) => Promise<DispatchStageResult>;
  write: (input: WritePredictionsInput) => Promise<WriteStageResult>;
};

export type WorkflowOrchestratorDeps = {
  executions: WorkflowExecutionStore;
  stages: WorkflowStages;
  timeouts: StageTimeouts;
  now?: () => Date;
  newId?: () => string;
};

export type WorkflowTrigger = {
  durationHours: number;
};

type SuccessOutcome = Extract<JobOutcome, { kind: "success" }>;
type RecordsFound = Extract<QueryStageResult, { statusCode: 200 }>;

type StageBudget = { ms: number; timeoutCode: PipelineErrorCode };

/** Where an execution ends up when it overruns the whole-execution ceiling. */
const failureStageFor: Partial<Record<WorkflowStage, WorkflowStage>> = {
  Querying: "QueryFailed",
  HasRecords: "QueryFailed",
  Dispatching: "DispatchFailed",
  AwaitingCompletion: "DispatchFailed",
  Completed: "WriteFailed",
  Writing: "WriteFailed"
};

/**
 * Drives one linear run: Querying → Dispatching → (parked) AwaitingCompletion
 * → Writing. Parking holds nothing in memory; the execution lives in the
 * store and any later invocation holding the resumption token continues it
 * through `deliverOutcome`. Every stage change is a compare-and-set on the
 * stored stage, so concurrent invocations cannot both move an execution.
 */
export class WorkflowOrchestrator implements WorkflowResumer {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: WorkflowOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  async start(trigger: WorkflowTrigger): Promise<WorkflowExecution> {
    const { executions, stages, timeouts } = this.deps;
    const startedAt = this.now();
    const execution: WorkflowExecution = {
      executionId: this.newId(),
      stage: "Querying",
      durationHours: trigger.durationHours,
      startedAt,
      updatedAt: startedAt,
      deadlineAt: new Date(startedAt.getTime() + timeouts.executionMs)
    };
    await executions.create(execution);
    logEvent("info", "workflow.started", { executionId: execution.executionId, durationHours: trigger.durationHours });

    const id = execution.executionId;
    const budget = this.stageBudget(timeouts.queryMs, execution.deadlineAt, "QueryTimeout");
    let query: QueryStageResult;
    try {
      query = await withTimeout(() => stages.query({ durationHours: trigger.durationHours }), budget.ms, "Query stage");
    } catch (err) {
      return this.finish(id, ["Querying"], "QueryFailed", {
        statusCode: 500,
        errorCode: stageFailureCode(err, { failed: "QueryFailed", timeout: budget.timeoutCode }),
        errorDetail: toErrorMessage(err)
      });
    }

    if (query.statusCode === 204) {
      return this.finish(id, ["Querying"], "NoRecords", { statusCode: 204 }, { query });
    }
    if (query.statusCode === 500) {
      return this.finish(
        id,
        ["Querying"],
        "QueryFailed",
        { statusCode: 500, errorCode: query.errorCode, errorDetail: query.message },
        { query }
      );
    }

    const hasRecords = await this.move(id, ["Querying"], { stage: "HasRecords", query });
    if (!hasRecords) return this.current(id);
    return this.dispatch(hasRecords, query);
  }

  /**
   * Redeems a resumption token. Safe to call more than once: only the first
   * call for a token takes effect, later ones are reported as ignored.
   */
  async deliverOutcome(token: string, outcome: JobOutcome): Promise<DeliveryReceipt> {
    const { executions } = this.deps;
    const now = this.now();

    const known = await executions.findByToken(token);
    if (!known?.resumption) {
      logEvent("warn", "workflow.unknown_token", { outcome: outcome.kind });
      return { status: "ignored", reason: "unknown_token" };
    }
    const executionId = known.executionId;
    if (known.resumption.claimedAt) {
      logEvent("warn", "workflow.duplicate_delivery", { executionId, outcome: outcome.kind });
      return { status: "ignored", reason: "already_delivered", executionId };
    }

    if (isExpired(known.resumption, now)) {
      const revoked = await executions.claimResumption(token, this.tokenExpiredOutcome(known.resumption), now);
      if (!revoked) return { status: "ignored", reason: "already_delivered", executionId };
      await this.finish(executionId, ["Dispatching", "AwaitingCompletion"], "DispatchFailed", {
        statusCode: 500,
        errorCode: "DispatchTimeout",
        errorDetail: `Outcome arrived after the resumption token expired at ${known.resumption.expiresAt.toISOString()}`
      });
      return { status: "expired", executionId };
    }

    const claimed = await executions.claimResumption(token, outcome, now);
    if (!claimed) {
      logEvent("warn", "workflow.duplicate_delivery", { executionId, outcome: outcome.kind });
      return { status: "ignored", reason: "already_delivered", executionId };
    }

    if (claimed.stage === "Dispatching") {
      return { status: "pending", executionId };
    }
    if (claimed.stage !== "AwaitingCompletion") {
      return { status: "ignored", reason: "not_resumable", executionId };
    }

    const settled = await this.resume(claimed, outcome);
    return { status: "resumed", executionId, stage: settled.stage };
  }

  /**
   * Fails executions nobody will resume: parked ones whose token expired and
   * any non-terminal one past the execution deadline.
   */
  async expireOverdue(now: Date = this.now()): Promise<WorkflowExecution[]> {
    const { executions } = this.deps;
    const settled: WorkflowExecution[] = [];

    for (const execution of await executions.findOverdue(now)) {
      const id = execution.executionId;
      const resumption = execution.resumption;
      const pastDeadline = execution.deadlineAt.getTime() <= now.getTime();
      const waitExpired =
        execution.stage === "AwaitingCompletion" && resumption !== undefined && isExpired(resumption, now);
      const claimed = resumption?.claimedAt !== undefined;

      // A claimed token means a delivery is already moving this execution.
      if (!pastDeadline && (!waitExpired || claimed)) continue;
      const target = failureStageFor[execution.stage];
      if (!target) continue;

      if (resumption && !claimed && (execution.stage === "Dispatching" || execution.stage === "AwaitingCompletion")) {
        const revoked = await executions.claimResumption(resumption.token, this.tokenExpiredOutcome(resumption), now);
        if (!revoked) continue;
      }

      const errorCode: PipelineErrorCode = waitExpired && !claimed ? "DispatchTimeout" : "ExecutionTimeout";
      const result = await this.finish(id, [execution.stage], target, {
        statusCode: 500,
        errorCode,
        errorDetail:
          errorCode === "ExecutionTimeout"
            ? `Execution exceeded its deadline ${execution.deadlineAt.toISOString()}`
            : "No completion signal before the resumption token expired"
      });
      settled.push(result);
    }

    return settled;
  }

  private async dispatch(execution: WorkflowExecution, query: RecordsFound): Promise<WorkflowExecution> {
    const { stages, timeouts } = this.deps;
    const id = execution.executionId;
    const budget = this.stageBudget(timeouts.dispatchMs, execution.deadlineAt, "DispatchTimeout");
    const resumption: ResumptionHandle = {
      token: this.newId(),
      expiresAt: new Date(this.now().getTime() + Math.max(0, budget.ms))
    };

    const dispatching = await this.move(id, ["HasRecords"], { stage: "Dispatching", resumption });
    if (!dispatching) return this.current(id);

    let result: DispatchStageResult;
    try {
      result = await withTimeout(
        () => stages.dispatch({ queryResult: query, resumption, durationHours: execution.durationHours }),
        budget.ms,
        "Dispatch stage"
      );
    } catch (err) {
      return this.failDispatch(id, resumption, {
        statusCode: 500,
        errorCode: stageFailureCode(err, { failed: "DispatchFailed", timeout: budget.timeoutCode }),
        errorDetail: toErrorMessage(err)
      });
    }

    // The dispatcher signals synchronously on failure and on "nothing to submit".
    const latest = await this.current(id);
    if (latest.stage === "Dispatching" && latest.delivered) {
      return this.settleDuringDispatch(id, latest.delivered, result);
    }
    if (result.statusCode >= 400) {
      return this.failDispatch(id, resumption, {
        statusCode: result.statusCode,
        errorCode: result.errorCode ?? "DispatchFailed",
        errorDetail: result.message
      });
    }

    const parked = await this.move(id, ["Dispatching"], { stage: "AwaitingCompletion" });
    if (!parked) return this.current(id);
    if (parked.delivered) {
      // Claimed between the read above and parking; whoever wins the stage swap resumes.
      return this.resume(parked, parked.delivered);
    }

    logEvent("info", "workflow.parked", {
      executionId: id,
      jobId: result.jobId ?? null,
      expiresAt: resumption.expiresAt.toISOString()
    });
    return parked;
  }

  private async settleDuringDispatch(
    id: string,
    delivered: JobOutcome,
    result: DispatchStageResult
  ): Promise<WorkflowExecution> {
    if (delivered.kind === "failure") {
      return this.finish(id, ["Dispatching"], "DispatchFailed", {
        statusCode: result.statusCode >= 400 ? result.statusCode : 500,
        errorCode: delivered.error,
        errorDetail: delivered.cause
      });
    }

    const completed = await this.move(id, ["Dispatching"], { stage: "Completed" });
    if (!completed) return this.current(id);
    return this.write(completed, delivered);
  }

  private async failDispatch(id: string, resumption: ResumptionHandle, outcome: ExecutionOutcome): Promise<WorkflowExecution> {
    // Revoke the token so a late completion event cannot resume a failed run.
    await this.deps.executions.claimResumption(
      resumption.token,
      { kind: "failure", error: outcome.errorCode ?? "DispatchFailed", cause: outcome.errorDetail ?? "" },
      this.now()
    );
    return this.finish(id, ["Dispatching"], "DispatchFailed", outcome);
  }

  private async resume(execution: WorkflowExecution, outcome: JobOutcome): Promise<WorkflowExecution> {
    const id = execution.executionId;
    if (outcome.kind === "failure") {
      return this.finish(id, ["AwaitingCompletion"], "JobFailed", {
        statusCode: 500,
        errorCode: outcome.error,
        errorDetail: outcome.cause
      });
    }

    const completed = await this.move(id, ["AwaitingCompletion"], { stage: "Completed" });
    if (!completed) return this.current(id);
    logEvent("info", "workflow.resumed", { executionId: id, records: outcome.recordCount });
    return this.write(completed, outcome);
  }

  private async write(execution: WorkflowExecution, outcome: SuccessOutcome): Promise<WorkflowExecution> {
    const { stages, timeouts } = this.deps;
    const id = execution.executionId;

    const writing = await this.move(id, ["Completed"], { stage: "Writing" });
    if (!writing) return this.current(id);

    const budget = this.stageBudget(timeouts.writeMs, execution.deadlineAt, "WriteTimeout");
    let result: WriteStageResult;
    try {
      result = await withTimeout(
        () => stages.write({ fileLocation: outcome.outputFileLocation, expectedRecords: outcome.recordCount }),
        budget.ms,
        "Write stage"
      );
    } catch (err) {
      return this.finish(id, ["Writing"], "WriteFailed", {
        statusCode: 500,
        errorCode: stageFailureCode(err, { failed: "WriteFailed", timeout: budget.timeoutCode }),
        errorDetail: toErrorMessage(err)
      });
    }

    return this.finish(id, ["Writing"], "Done", { statusCode: 200 }, { write: result });
  }

  private stageBudget(stageMs: number, deadlineAt: Date, timeoutCode: PipelineErrorCode): StageBudget {
    const remaining = deadlineAt.getTime() - this.now().getTime();
    return remaining < stageMs ? { ms: remaining, timeoutCode: "ExecutionTimeout" } : { ms: stageMs, timeoutCode };
  }

  private tokenExpiredOutcome(resumption: ResumptionHandle): JobOutcome {
    return {
      kind: "failure",
      error: "DispatchTimeout",
      cause: `Resumption token expired at ${resumption.expiresAt.toISOString()}`
    };
  }

  private move(
    id: string,
    from: readonly WorkflowStage[],
    patch: Omit<ExecutionPatch, "updatedAt">
  ): Promise<WorkflowExecution | null> {
    return this.deps.executions.transition(id, from, { ...patch, updatedAt: this.now() });
  }

  private async finish(
    id: string,
    from: readonly WorkflowStage[],
    stage: WorkflowStage,
    outcome: ExecutionOutcome,
    extra: Pick<ExecutionPatch, "query" | "write"> = {}
  ): Promise<WorkflowExecution> {
    const finished = await this.move(id, from, { ...extra, stage, outcome });
    if (!finished) return this.current(id);

    logEvent(outcome.errorCode ? "error" : "info", "workflow.finished", {
      executionId: id,
      stage,
      statusCode: outcome.statusCode,
      errorCode: outcome.errorCode ?? null,
      errorDetail: outcome.errorDetail ?? null,
      ...(finished.write ? { totalRecords: finished.write.totalRecords, updatedRecords: finished.write.updatedRecords } : {})
    });
    return finished;
  }

  private async current(id: string): Promise<WorkflowExecution> {
    const execution = await this.deps.executions.get(id);
    if (!execution) {
      throw new Error(`Workflow execution ${id} not found`);
    }
    return execution;
  }
}
