import { defaultObjectPrefixes, type ObjectPrefixes } from "../../core/jobs/objectKeys";

const HOUR_MS = 60 * 60 * 1000;

export type StageTimeouts = {
  queryMs: number;
  dispatchMs: number; // submission plus the wait for the completion signal
  writeMs: number;
  executionMs: number;
};

export type PipelineConfig = {
  table: string;
  idColumn: string;
  valueColumn: string;
  predictedFlagColumn: string;
  parameterColumn: string;
  parameter?: string;
  sentinelValue: number;
  lookbackHours?: number;
  modelId?: string;
  featureColumns: string[];
  predictionColumn: string;
  instanceType: string;
  instanceCount: number;
  prefixes: ObjectPrefixes;
  timeouts: StageTimeouts;
};

export type PipelineConfigInput = Partial<Omit<PipelineConfig, "prefixes" | "timeouts">> & {
  prefixes?: Partial<ObjectPrefixes>;
  timeouts?: Partial<StageTimeouts>;
};

export const defaultPipelineConfig: PipelineConfig = {
  table: "measurements",
  idColumn: "id",
  valueColumn: "value",
  predictedFlagColumn: "predicted_label",
  parameterColumn: "parameter",
  sentinelValue: 65535,
  featureColumns: ["timestamp", "parameter", "device_id", "location_id", "deployment_date"],
  predictionColumn: "predicted_value",
  instanceType: "ml.m5.xlarge",
  instanceCount: 1,
  prefixes: defaultObjectPrefixes,
  timeouts: {
    queryMs: 2 * HOUR_MS,
    dispatchMs: 6 * HOUR_MS,
    writeMs: 2 * HOUR_MS,
    executionMs: 12 * HOUR_MS
  }
};

export const pipelineCaps = {
  instanceCount: { min: 1, max: 100 },
  lookbackHours: { min: 1, max: 8760 },
  timeoutMs: { min: 1, max: 7 * 24 * HOUR_MS }
} as const;

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

const assertIdentifier = (name: string, value: string) => {
  if (!identifierPattern.test(value)) {
    throw new Error(`${name}=${value} is not a valid SQL identifier`);
  }
};

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

const assertPrefix = (name: string, value: string) => {
  if (value.trim() === "" || value.startsWith("/")) {
    throw new Error(`${name} must be a non-empty relative prefix. Received: ${value}`);
  }
};

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
  assertIdentifier("table", config.table);
  assertIdentifier("idColumn", config.idColumn);
  assertIdentifier("valueColumn", config.valueColumn);
  assertIdentifier("predictedFlagColumn", config.predictedFlagColumn);
  assertIdentifier("parameterColumn", config.parameterColumn);

  if (!Number.isSafeInteger(config.sentinelValue)) {
    throw new Error(`sentinelValue=${String(config.sentinelValue)} must be an integer`);
  }
  if (config.lookbackHours !== undefined) {
    const { min, max } = pipelineCaps.lookbackHours;
    assertIntegerInRange("lookbackHours", config.lookbackHours, min, max);
  }
  if (config.featureColumns.length === 0) {
    throw new Error("featureColumns must name at least one column");
  }
  assertIntegerInRange(
    "instanceCount",
    config.instanceCount,
    pipelineCaps.instanceCount.min,
    pipelineCaps.instanceCount.max
  );

  assertPrefix("prefixes.retrieval", config.prefixes.retrieval);
  assertPrefix("prefixes.inputBatch", config.prefixes.inputBatch);
  assertPrefix("prefixes.outputBatch", config.prefixes.outputBatch);
  assertPrefix("prefixes.predicted", config.prefixes.predicted);

  const { min, max } = pipelineCaps.timeoutMs;
  for (const [name, value] of Object.entries(config.timeouts)) {
    assertIntegerInRange(`timeouts.${name}`, value, min, max);
  }
  if (config.timeouts.executionMs < config.timeouts.dispatchMs) {
    throw new Error("timeouts.executionMs must be at least timeouts.dispatchMs");
  }

  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolvePipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  validatePipelineConfig({
    ...defaultPipelineConfig,
    ...input,
    parameter: normalizeOptionalString(input.parameter),
    modelId: normalizeOptionalString(input.modelId),
    featureColumns: [...(input.featureColumns ?? defaultPipelineConfig.featureColumns)],
    prefixes: { ...defaultPipelineConfig.prefixes, ...input.prefixes },
    timeouts: { ...defaultPipelineConfig.timeouts, ...input.timeouts }
  });
