import type { Collection, MongoClient, WithId } from "mongodb";
import { terminalStages, type JobOutcome, type WorkflowExecution, type WorkflowStage } from "../../core/workflow/workflow.types";
import type { ExecutionPatch, WorkflowExecutionStore } from "../../ports/WorkflowExecutionStore";
import { mongoIndexes } from "./mongo.indexes";

export type WorkflowExecutionDoc = Omit<WorkflowExecution, "executionId"> & { _id: string };

export const toExecution = ({ _id, ...rest }: WithId<WorkflowExecutionDoc>): WorkflowExecution => ({
  executionId: _id,
  ...rest
});

/**
 * Executions keyed by id. Atomicity comes from single-document
 * `findOneAndUpdate` calls whose filter carries the expected state.
 */
export class MongoWorkflowExecutionStore implements WorkflowExecutionStore {
  private collection?: Collection<WorkflowExecutionDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "predictions",
    private readonly collectionName = "workflow_executions"
  ) {}

  private async getCollection(): Promise<Collection<WorkflowExecutionDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<WorkflowExecutionDoc>(this.collectionName);
    for (const idx of mongoIndexes.executionCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async create(execution: WorkflowExecution): Promise<void> {
    const col = await this.getCollection();
    const { executionId, ...rest } = execution;
    await col.insertOne({ _id: executionId, ...rest });
  }

  async get(executionId: string): Promise<WorkflowExecution | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: executionId });
    return doc ? toExecution(doc) : null;
  }

  async findByToken(token: string): Promise<WorkflowExecution | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ "resumption.token": token });
    return doc ? toExecution(doc) : null;
  }

  async transition(
    executionId: string,
    from: readonly WorkflowStage[],
    patch: ExecutionPatch
  ): Promise<WorkflowExecution | null> {
    const col = await this.getCollection();
    const doc = await col.findOneAndUpdate(
      { _id: executionId, stage: { $in: [...from] } },
      { $set: patch },
      { returnDocument: "after" }
    );
    return doc ? toExecution(doc) : null;
  }

  async claimResumption(token: string, outcome: JobOutcome, claimedAt: Date): Promise<WorkflowExecution | null> {
    const col = await this.getCollection();
    const doc = await col.findOneAndUpdate(
      { "resumption.token": token, "resumption.claimedAt": { $exists: false } },
      { $set: { "resumption.claimedAt": claimedAt, delivered: outcome, updatedAt: claimedAt } },
      { returnDocument: "after" }
    );
    return doc ? toExecution(doc) : null;
  }

  async findOverdue(now: Date): Promise<WorkflowExecution[]> {
    const col = await this.getCollection();
    const docs = await col
      .find({
        stage: { $nin: [...terminalStages] },
        $or: [{ deadlineAt: { $lte: now } }, { stage: "AwaitingCompletion", "resumption.expiresAt": { $lte: now } }]
      })
      .sort({ deadlineAt: 1 })
      .toArray();
    return docs.map(toExecution);
  }
}
