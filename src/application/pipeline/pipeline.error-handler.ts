import { MissingColumnsError } from "../../core/records/featureProjection";
import type { JobOutcome, PipelineErrorCode } from "../../core/workflow/workflow.types";
import { toErrorMessage } from "../../shared/logging/log";
import { StageTimeoutError } from "../../shared/timeout/withTimeout";

export type PipelineErrorContext = Partial<{
  executionId: string;
  jobId: string;
  batchId: string;
  key: string;
  records: number;
}>;

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly status: 400 | 500;
  readonly context: PipelineErrorContext;
  readonly cause?: unknown;

  constructor(args: {
    code: PipelineErrorCode;
    message: string;
    status?: 400 | 500;
    context?: PipelineErrorContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "PipelineError";
    this.code = args.code;
    this.status = args.status ?? 500;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const rootCause = (reason: unknown): unknown =>
  reason instanceof Error && "cause" in reason && reason.cause !== undefined ? reason.cause : reason;

/**
 * Maps anything thrown while preparing or submitting a job to the code the
 * orchestrator will record. Unrecognized faults become `fallback`.
 */
export const classifyDispatchFailure = (
  reason: unknown,
  context: PipelineErrorContext = {},
  fallback: PipelineErrorCode = "BatchTransformInitiationFailed"
): PipelineError => {
  if (reason instanceof PipelineError) return reason;

  if (reason instanceof MissingColumnsError) {
    return new PipelineError({
      code: "MissingColumns",
      status: 400,
      message: reason.message,
      context,
      cause: reason
    });
  }

  return new PipelineError({
    code: fallback,
    status: 500,
    message: toErrorMessage(reason),
    context,
    cause: rootCause(reason)
  });
};

export const failureOutcome = (error: PipelineErrorCode, reason: unknown): JobOutcome => ({
  kind: "failure",
  error,
  cause: toErrorMessage(reason)
});

/**
 * Stage timeouts get their own code so a stage that never answered can be
 * told apart from one that answered with an error.
 */
export const stageFailureCode = (
  reason: unknown,
  codes: { failed: PipelineErrorCode; timeout: PipelineErrorCode }
): PipelineErrorCode => (reason instanceof StageTimeoutError ? codes.timeout : codes.failed);
