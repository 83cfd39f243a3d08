import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

const DAY_SECONDS = 24 * 60 * 60;

/**
 * Index plan, applied lazily on first collection use:
 * - job metadata: TTL on `createdAt` so entries orphaned by a lost completion
 *   event do not accumulate
 * - executions: unique resumption token, and the sweep filter
 */
type IndexPlan = { keys: IndexSpecification; options: CreateIndexesOptions };

export const mongoIndexes: { jobMetadataCollection: IndexPlan[]; executionCollection: IndexPlan[] } = {
  jobMetadataCollection: [
    { keys: { createdAt: 1 }, options: { expireAfterSeconds: 7 * DAY_SECONDS } }
  ],
  executionCollection: [
    { keys: { "resumption.token": 1 }, options: { unique: true, sparse: true } },
    { keys: { stage: 1, deadlineAt: 1 }, options: {} }
  ]
};
