import {
  handleCompletion,
  parseJobStatusEvent,
  type HandleCompletionDeps
} from "../../src/application/handle-completion/handleCompletion.usecase";
import { resolvePipelineConfig } from "../../src/application/pipeline/pipeline.config";
import type { JobMetadata } from "../../src/core/jobs/JobMetadata";
import { exportCsv, measurementColumns, measurementLine } from "../support/fixtures";
import {
  FakePredictionService,
  InMemoryJobMetadataStore,
  InMemoryObjectStorage,
  RecordingResumer
} from "../support/inMemoryPorts";
import { eventNames, loggedEvents, silenceConsole, type ConsoleSpies } from "../support/logs";

const sourceLocation = "retrieved_from_db/query_results_20240305_070809.csv";
const outputLocation = "output_batch/abcd1234_20240305_080000.csv.out";
const predictedKey = "predicted_values_output/output_results_20240305_080000.csv";

const jobMetadata = (): JobMetadata => ({
  jobId: "job-1",
  batchId: "abcd1234",
  createdAt: new Date("2024-03-05T08:00:00.000Z"),
  resumption: { token: "token-1", expiresAt: new Date("2024-03-05T14:00:00.000Z") },
  inputLocation: "input_batch/abcd1234_20240305_080000.csv",
  outputLocation,
  sourceLocation,
  expectedRecordCount: 2,
  originalColumns: [...measurementColumns],
  bucket: "test-bucket",
  modelId: "test-model",
  durationHours: 24
});

const setup = (predictions: string | undefined = "0.123\n45.678") => {
  const storage = new InMemoryObjectStorage();
  storage.objects.set(sourceLocation, exportCsv([1, 2]));
  if (predictions !== undefined) storage.objects.set(outputLocation, predictions);

  const metadata = new InMemoryJobMetadataStore();
  metadata.entries.set("job-1", jobMetadata());
  const prediction = new FakePredictionService();
  const resumer = new RecordingResumer();
  const deps: HandleCompletionDeps = { storage, metadata, prediction, resumer, config: resolvePipelineConfig() };
  return { deps, storage, metadata, prediction, resumer };
};

describe("handleCompletion", () => {
  let spies: ConsoleSpies;

  beforeEach(() => {
    spies = silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("joins predictions onto the source rows, signals success and clears metadata", async () => {
    const { deps, storage, metadata, resumer } = setup();

    const result = await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(result).toEqual({
      statusCode: 200,
      message: "Callback processed for job job-1",
      jobStatus: "Completed",
      receipt: "resumed"
    });
    expect(storage.objects.get(predictedKey)).toBe(
      [
        [...measurementColumns, "predicted_value"].join(","),
        `${measurementLine(1, "65535", "TRUE")},0.123`,
        `${measurementLine(2, "65535", "TRUE")},45.678`
      ].join("\n")
    );
    expect(resumer.deliveries).toEqual([
      { token: "token-1", outcome: { kind: "success", recordCount: 2, outputFileLocation: predictedKey } }
    ]);
    expect(metadata.entries.has("job-1")).toBe(false);
  });

  it("drops surplus predictions with a warning", async () => {
    const { deps, resumer } = setup("0.1\n0.2\n0.3");

    await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(resumer.deliveries[0]?.outcome).toEqual({ kind: "success", recordCount: 2, outputFileLocation: predictedKey });
    expect(loggedEvents(spies.warn)).toEqual([
      { event: "completion.predictions_truncated", jobId: "job-1", from: 3, to: 2 }
    ]);
  });

  it("signals BatchTransformFailed for a failed job and writes nothing", async () => {
    const { deps, storage, resumer, metadata } = setup();

    const result = await handleCompletion(deps, { jobId: "job-1", status: "Failed" });

    expect(result).toMatchObject({ statusCode: 200, jobStatus: "Failed" });
    expect(resumer.deliveries).toEqual([
      { token: "token-1", outcome: { kind: "failure", error: "BatchTransformFailed", cause: "Failed" } }
    ]);
    expect(storage.writes).toEqual([]);
    expect(metadata.entries.has("job-1")).toBe(false);
  });

  it("signals BatchResultProcessingFailed when predictions are short and writes nothing", async () => {
    const { deps, storage, resumer, metadata } = setup("0.1");

    await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(resumer.deliveries[0]?.outcome).toEqual({
      kind: "failure",
      error: "BatchResultProcessingFailed",
      cause: "Insufficient predictions: got 1, expected 2"
    });
    expect(storage.writes).toEqual([]);
    expect(metadata.entries.has("job-1")).toBe(false);
  });

  it("lists the output prefix when the output file is missing", async () => {
    const { deps, storage, resumer } = setup(undefined);
    storage.objects.set("output_batch/other_20240304_080000.csv.out", "0.5");

    await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(resumer.deliveries[0]?.outcome).toEqual({
      kind: "failure",
      error: "BatchResultProcessingFailed",
      cause:
        `Output file not found: s3://test-bucket/${outputLocation}. ` +
        "Available files in prefix: output_batch/other_20240304_080000.csv.out"
    });
  });

  it("reports an empty output prefix", async () => {
    const { deps, resumer } = setup(undefined);

    await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(resumer.deliveries[0]?.outcome).toMatchObject({
      cause: `Output file not found: s3://test-bucket/${outputLocation}. No files found in prefix: output_batch`
    });
  });

  it("asks the prediction service when the event carries no status", async () => {
    const { deps, prediction, resumer } = setup();
    prediction.statuses.set("job-1", "Completed");

    const result = await handleCompletion(deps, { jobId: "job-1" });

    expect(result.jobStatus).toBe("Completed");
    expect(resumer.deliveries[0]?.outcome.kind).toBe("success");
  });

  it("treats an unreadable status as a failed job", async () => {
    const { deps, resumer } = setup();

    await handleCompletion(deps, { jobId: "job-1" });

    expect(resumer.deliveries[0]?.outcome).toEqual({ kind: "failure", error: "BatchTransformFailed", cause: "Unknown" });
    expect(eventNames(spies.error)).toEqual(["completion.describe_failed"]);
  });

  it("returns 404 for a job it has no metadata for", async () => {
    const { deps, resumer } = setup();

    const result = await handleCompletion(deps, { jobId: "job-9", status: "Completed" });

    expect(result).toEqual({ statusCode: 404, message: "No job metadata found for job-9" });
    expect(resumer.deliveries).toEqual([]);
  });

  it("returns 500 when metadata cannot be read", async () => {
    const { deps, metadata } = setup();
    jest.spyOn(metadata, "get").mockRejectedValue(new Error("mongo down"));

    const result = await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(result).toEqual({ statusCode: 500, message: "Failed to retrieve job metadata: mongo down" });
  });

  it("keeps metadata when the workflow cannot be signaled", async () => {
    const { deps, resumer, metadata } = setup();
    resumer.failWith = new Error("execution store unavailable");

    const result = await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(result).toEqual({
      statusCode: 500,
      message: "Failed to signal workflow: execution store unavailable",
      jobStatus: "Completed"
    });
    expect(metadata.entries.has("job-1")).toBe(true);
  });

  it("still answers 200 when metadata cleanup fails", async () => {
    const { deps, metadata } = setup();
    jest.spyOn(metadata, "delete").mockRejectedValue(new Error("mongo down"));

    const result = await handleCompletion(deps, { jobId: "job-1", status: "Completed" });

    expect(result.statusCode).toBe(200);
    expect(eventNames(spies.warn)).toEqual(["completion.cleanup_failed"]);
  });
});

describe("parseJobStatusEvent", () => {
  it.each([
    [{ jobId: "job-1", status: "Completed" }, { jobId: "job-1", status: "Completed" }],
    [{ detail: { jobId: " job-1 ", status: "Failed" } }, { jobId: "job-1", status: "Failed" }],
    [{ jobId: "job-1", status: "" }, { jobId: "job-1" }],
    [{ jobId: "" }, undefined],
    [{ status: "Completed" }, undefined],
    ["job-1", undefined],
    [null, undefined]
  ])("parses %p", (raw, expected) => {
    expect(parseJobStatusEvent(raw)).toEqual(expected);
  });
});
