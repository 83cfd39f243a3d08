import type { JobOutcome, WorkflowStage } from "../core/workflow/workflow.types";

export type DeliveryReceipt =
  | { status: "resumed"; executionId: string; stage: WorkflowStage }
  | { status: "pending"; executionId: string } // picked up by the invocation still dispatching
  | { status: "expired"; executionId: string }
  | { status: "ignored"; reason: "unknown_token" | "already_delivered" | "not_resumable"; executionId?: string };

export interface WorkflowResumer {
  deliverOutcome(token: string, outcome: JobOutcome): Promise<DeliveryReceipt>;
}
