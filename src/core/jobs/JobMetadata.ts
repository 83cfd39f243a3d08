import type { ResumptionHandle } from "./ResumptionHandle";

/**
 * Written by the dispatcher right after submission and removed by the
 * completion handler; the only bridge between the two invocations.
 */
export type JobMetadata = {
  jobId: string;
  batchId: string;
  createdAt: Date;
  resumption: ResumptionHandle;
  inputLocation: string;      // header-less feature file
  outputLocation: string;     // raw prediction output
  sourceLocation: string;     // query export with the original rows
  expectedRecordCount: number;
  originalColumns: string[];
  bucket: string;
  modelId: string;
  durationHours: number;
};

export class InvalidJobMetadataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidJobMetadataError";
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const readString = (raw: Record<string, unknown>, key: string): string => {
  const value = raw[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidJobMetadataError(`Job metadata field "${key}" must be a non-empty string`);
  }
  return value;
};

const readDate = (raw: Record<string, unknown>, key: string): Date => {
  const value = raw[key];
  const parsed = value instanceof Date ? value : typeof value === "string" ? new Date(value) : undefined;
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new InvalidJobMetadataError(`Job metadata field "${key}" must be a date`);
  }
  return parsed;
};

const readNonNegativeInteger = (raw: Record<string, unknown>, key: string): number => {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InvalidJobMetadataError(`Job metadata field "${key}" must be a non-negative integer`);
  }
  return value;
};

/**
 * Validates a stored document (Mongo or JSON) back into `JobMetadata`.
 */
export const parseJobMetadata = (raw: unknown): JobMetadata => {
  if (!isRecord(raw)) {
    throw new InvalidJobMetadataError("Job metadata must be an object");
  }

  const resumption = raw.resumption;
  if (!isRecord(resumption)) {
    throw new InvalidJobMetadataError("Job metadata has no resumption handle");
  }

  const originalColumns = raw.originalColumns;
  if (!Array.isArray(originalColumns) || !originalColumns.every((c): c is string => typeof c === "string")) {
    throw new InvalidJobMetadataError('Job metadata field "originalColumns" must be a list of names');
  }

  const durationHours = raw.durationHours;
  if (typeof durationHours !== "number" || !Number.isFinite(durationHours)) {
    throw new InvalidJobMetadataError('Job metadata field "durationHours" must be a number');
  }

  return {
    jobId: readString(raw, "jobId"),
    batchId: readString(raw, "batchId"),
    createdAt: readDate(raw, "createdAt"),
    resumption: {
      token: readString(resumption, "token"),
      expiresAt: readDate(resumption, "expiresAt")
    },
    inputLocation: readString(raw, "inputLocation"),
    outputLocation: readString(raw, "outputLocation"),
    sourceLocation: readString(raw, "sourceLocation"),
    expectedRecordCount: readNonNegativeInteger(raw, "expectedRecordCount"),
    originalColumns: [...originalColumns],
    bucket: readString(raw, "bucket"),
    modelId: readString(raw, "modelId"),
    durationHours
  };
};
