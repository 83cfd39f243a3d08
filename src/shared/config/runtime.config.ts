import {
  defaultPipelineConfig,
  type PipelineConfig,
  resolvePipelineConfig
} from "../../application/pipeline/pipeline.config";

const HOUR_MS = 60 * 60 * 1000;

export const runtimeCaps = {
  httpTimeoutMs: { min: 1000, max: 60000 },
  stageTimeoutHours: { min: 1, max: 48 },
  executionTimeoutHours: { min: 1, max: 168 },
  durationHours: { min: 1, max: 8760 }
} as const;

export type RuntimeConfig = {
  pipeline: PipelineConfig;
  httpTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalInteger = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`${name}=${raw} must be an integer`);
  }
  return value;
};

const optionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  return raw?.trim() ? raw.trim() : undefined;
};

const listFormats = `a JSON array (["a","b"]), a single-quoted list (['a', 'b']) or a comma separated list (a,b)`;

const unquote = (cell: string): string => {
  const trimmed = cell.trim();
  const quoted = /^(['"])(.*)\1$/.exec(trimmed);
  return quoted ? quoted[2] ?? "" : trimmed;
};

/**
 * Accepts a JSON array, a bracketed list with single-quoted names, or a bare
 * comma separated list.
 */
export const parseColumnList = (name: string, raw: string): string[] => {
  const trimmed = raw.trim();
  let columns: unknown;
  if (trimmed.startsWith("[")) {
    try {
      columns = JSON.parse(trimmed);
    } catch {
      if (!trimmed.endsWith("]")) {
        throw new Error(`${name} must be ${listFormats}`);
      }
      columns = trimmed.slice(1, -1).split(",").map(unquote);
    }
  } else {
    columns = trimmed.split(",");
  }

  if (!Array.isArray(columns) || !columns.every((c): c is string => typeof c === "string")) {
    throw new Error(`${name} must list column names as strings`);
  }
  const names = columns.map((c) => c.trim()).filter((c) => c !== "");
  if (names.length === 0) {
    throw new Error(`${name} must name at least one column`);
  }
  return names;
};

const hoursToMs = (hours: number | undefined): number | undefined =>
  hours === undefined ? undefined : hours * HOUR_MS;

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const featureColumnsRaw = optionalString(env, "ATTRIBUTES_FOR_PREDICTION");
  const defaults = defaultPipelineConfig;
  const stageHours = runtimeCaps.stageTimeoutHours;

  const pipeline = resolvePipelineConfig({
    table: optionalString(env, "DB_TABLE") ?? defaults.table,
    parameter: optionalString(env, "TARGET_PARAMETER"),
    sentinelValue: parseOptionalInteger(env, "SENTINEL_VALUE") ?? defaults.sentinelValue,
    lookbackHours: parseOptionalIntInRange(env, "QUERY_LOOKBACK_HOURS", { min: 1, max: 8760 }),
    modelId: optionalString(env, "MODEL_ID"),
    featureColumns: featureColumnsRaw
      ? parseColumnList("ATTRIBUTES_FOR_PREDICTION", featureColumnsRaw)
      : defaults.featureColumns,
    instanceType: optionalString(env, "BATCH_INSTANCE_TYPE") ?? defaults.instanceType,
    instanceCount: parseOptionalIntInRange(env, "BATCH_INSTANCE_COUNT", { min: 1, max: 100 }) ?? defaults.instanceCount,
    prefixes: {
      retrieval: optionalString(env, "RETRIEVAL_PREFIX") ?? defaults.prefixes.retrieval,
      inputBatch: optionalString(env, "INPUT_BATCH_PREFIX") ?? defaults.prefixes.inputBatch,
      outputBatch: optionalString(env, "OUTPUT_BATCH_PREFIX") ?? defaults.prefixes.outputBatch,
      predicted: optionalString(env, "PREDICTED_PREFIX") ?? defaults.prefixes.predicted
    },
    timeouts: {
      queryMs: hoursToMs(parseOptionalIntInRange(env, "QUERY_TIMEOUT_HOURS", stageHours)) ?? defaults.timeouts.queryMs,
      dispatchMs:
        hoursToMs(parseOptionalIntInRange(env, "DISPATCH_TIMEOUT_HOURS", stageHours)) ?? defaults.timeouts.dispatchMs,
      writeMs: hoursToMs(parseOptionalIntInRange(env, "WRITE_TIMEOUT_HOURS", stageHours)) ?? defaults.timeouts.writeMs,
      executionMs:
        hoursToMs(parseOptionalIntInRange(env, "EXECUTION_TIMEOUT_HOURS", runtimeCaps.executionTimeoutHours)) ??
        defaults.timeouts.executionMs
    }
  });

  const httpTimeoutMs =
    parseOptionalIntInRange(env, "PREDICTION_TIMEOUT_MS", {
      min: runtimeCaps.httpTimeoutMs.min,
      max: runtimeCaps.httpTimeoutMs.max
    }) ?? 10000;

  return { pipeline, httpTimeoutMs };
};

export const parseDurationHours = (raw: string | undefined, fallback = 24): number => {
  if (raw == null || raw.trim() === "") return fallback;

  const value = Number(raw);
  const { min, max } = runtimeCaps.durationHours;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`duration-hours=${raw} is out of allowed range [${min}..${max}]`);
  }
  return value;
};
