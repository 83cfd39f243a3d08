import { InvalidJobMetadataError, parseJobMetadata } from "../../src/core/jobs/JobMetadata";
import { isSuccessfulJob, normalizeJobStatus } from "../../src/core/jobs/jobStatus";
import {
  defaultObjectPrefixes,
  formatRunTimestamp,
  inputBatchKey,
  outputBatchKey,
  predictedOutputKey,
  queryExportKey,
  toObjectUri
} from "../../src/core/jobs/objectKeys";
import { isExpired } from "../../src/core/jobs/ResumptionHandle";

const storedMetadata = () => ({
  jobId: "job-1",
  batchId: "abcd1234",
  createdAt: "2024-03-05T07:08:09.000Z",
  resumption: { token: "token-1", expiresAt: "2024-03-05T13:08:09.000Z" },
  inputLocation: "input_batch/abcd1234_20240305_070809.csv",
  outputLocation: "output_batch/abcd1234_20240305_070809.csv.out",
  sourceLocation: "retrieved_from_db/query_results_20240305_070809.csv",
  expectedRecordCount: 2,
  originalColumns: ["id", "value"],
  bucket: "test-bucket",
  modelId: "test-model",
  durationHours: 24
});

describe("parseJobMetadata", () => {
  it("restores dates from stored strings", () => {
    const meta = parseJobMetadata(storedMetadata());

    expect(meta.createdAt).toEqual(new Date("2024-03-05T07:08:09.000Z"));
    expect(meta.resumption).toEqual({ token: "token-1", expiresAt: new Date("2024-03-05T13:08:09.000Z") });
    expect(meta.originalColumns).toEqual(["id", "value"]);
    expect(meta.expectedRecordCount).toBe(2);
  });

  it("accepts Date instances as stored by the document store", () => {
    const raw = { ...storedMetadata(), createdAt: new Date("2024-03-05T07:08:09.000Z") };
    expect(parseJobMetadata(raw).createdAt.toISOString()).toBe("2024-03-05T07:08:09.000Z");
  });

  it.each([
    { raw: null, message: "Job metadata must be an object" },
    { raw: { ...storedMetadata(), resumption: undefined }, message: "Job metadata has no resumption handle" },
    {
      raw: { ...storedMetadata(), originalColumns: "id,value" },
      message: 'Job metadata field "originalColumns" must be a list of names'
    },
    {
      raw: { ...storedMetadata(), expectedRecordCount: -1 },
      message: 'Job metadata field "expectedRecordCount" must be a non-negative integer'
    },
    { raw: { ...storedMetadata(), createdAt: "not a date" }, message: 'Job metadata field "createdAt" must be a date' },
    { raw: { ...storedMetadata(), jobId: " " }, message: 'Job metadata field "jobId" must be a non-empty string' }
  ])("rejects malformed entries: $message", ({ raw, message }) => {
    expect(() => parseJobMetadata(raw)).toThrow(new InvalidJobMetadataError(message));
  });
});

describe("object keys", () => {
  const timestamp = formatRunTimestamp(new Date("2024-03-05T07:08:09.123Z"));

  it("formats run timestamps in UTC", () => {
    expect(timestamp).toBe("20240305_070809");
  });

  it("builds every stage key under its prefix", () => {
    const inputKey = inputBatchKey(defaultObjectPrefixes, "abcd1234", timestamp);

    expect(queryExportKey(defaultObjectPrefixes, timestamp)).toBe("retrieved_from_db/query_results_20240305_070809.csv");
    expect(inputKey).toBe("input_batch/abcd1234_20240305_070809.csv");
    expect(outputBatchKey(defaultObjectPrefixes, inputKey)).toBe("output_batch/abcd1234_20240305_070809.csv.out");
    expect(predictedOutputKey(defaultObjectPrefixes, timestamp)).toBe(
      "predicted_values_output/output_results_20240305_070809.csv"
    );
  });

  it("tolerates trailing slashes on prefixes", () => {
    expect(queryExportKey({ ...defaultObjectPrefixes, retrieval: "exports//" }, timestamp)).toBe(
      "exports/query_results_20240305_070809.csv"
    );
  });

  it("builds object URIs", () => {
    expect(toObjectUri("test-bucket", "output_batch")).toBe("s3://test-bucket/output_batch");
  });
});

describe("job status", () => {
  it.each([
    [" completed ", "Completed"],
    ["FAILED", "Failed"],
    ["Stopped", "Stopped"],
    ["InProgress", "InProgress"],
    ["Exploded", "Unknown"],
    [42, "Unknown"]
  ])("normalizes %p to %s", (raw, expected) => {
    expect(normalizeJobStatus(raw)).toBe(expected);
  });

  it("treats only Completed as success", () => {
    expect(isSuccessfulJob("Completed")).toBe(true);
    expect(isSuccessfulJob("Stopped")).toBe(false);
    expect(isSuccessfulJob("Unknown")).toBe(false);
  });
});

describe("isExpired", () => {
  const handle = { token: "token-1", expiresAt: new Date("2024-03-05T13:00:00.000Z") };

  it("expires exactly at expiresAt", () => {
    expect(isExpired(handle, new Date("2024-03-05T12:59:59.999Z"))).toBe(false);
    expect(isExpired(handle, new Date("2024-03-05T13:00:00.000Z"))).toBe(true);
  });
});
