import type { JobMetadata } from "../core/jobs/JobMetadata";

export interface JobMetadataStore {
  put(metadata: JobMetadata): Promise<void>;
  /** Resolves null for unknown ids and for entries that fail validation. */
  get(jobId: string): Promise<JobMetadata | null>;
  delete(jobId: string): Promise<void>;
}
