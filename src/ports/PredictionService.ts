import type { JobStatus } from "../core/jobs/jobStatus";

export type SubmitJobParams = {
  modelId: string;
  inputUri: string;
  outputUri: string;
  instanceType: string;
  instanceCount: number;
  contentType?: string;
};

export type SubmittedJob = {
  jobId: string;
};

export type JobDescription = {
  jobId: string;
  status: JobStatus;
  rawStatus: string;
  failureReason?: string;
};

export interface PredictionService {
  modelExists(modelId: string): Promise<boolean>;
  submitJob(params: SubmitJobParams): Promise<SubmittedJob>;
  describeJob(jobId: string): Promise<JobDescription>;
}
