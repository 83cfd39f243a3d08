import type { Collection, MongoClient } from "mongodb";
import { InvalidJobMetadataError, parseJobMetadata, type JobMetadata } from "../../core/jobs/JobMetadata";
import type { JobMetadataStore } from "../../ports/JobMetadataStore";
import { logEvent } from "../../shared/logging/log";
import { mongoIndexes } from "./mongo.indexes";

export type JobMetadataDoc = Omit<JobMetadata, "jobId"> & { _id: string };

export const toJobMetadataDoc = ({ jobId, ...rest }: JobMetadata): JobMetadataDoc => ({ _id: jobId, ...rest });

/**
 * One document per submitted job, keyed by the external job id.
 */
export class MongoJobMetadataStore implements JobMetadataStore {
  private collection?: Collection<JobMetadataDoc>;

  constructor(
    private readonly client: MongoClient,
    private readonly dbName = "predictions",
    private readonly collectionName = "job_metadata"
  ) {}

  private async getCollection(): Promise<Collection<JobMetadataDoc>> {
    if (this.collection) return this.collection;

    const col = this.client.db(this.dbName).collection<JobMetadataDoc>(this.collectionName);
    for (const idx of mongoIndexes.jobMetadataCollection) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async put(metadata: JobMetadata): Promise<void> {
    const col = await this.getCollection();
    const { _id, ...fields } = toJobMetadataDoc(metadata);
    await col.replaceOne({ _id }, fields, { upsert: true });
  }

  async get(jobId: string): Promise<JobMetadata | null> {
    const col = await this.getCollection();
    const doc = await col.findOne({ _id: jobId });
    if (!doc) return null;

    const { _id, ...fields } = doc;
    try {
      return parseJobMetadata({ ...fields, jobId: _id });
    } catch (err) {
      if (err instanceof InvalidJobMetadataError) {
        logEvent("warn", "metadata.invalid", { jobId, message: err.message });
        return null;
      }
      throw err;
    }
  }

  async delete(jobId: string): Promise<void> {
    const col = await this.getCollection();
    await col.deleteOne({ _id: jobId });
  }
}
