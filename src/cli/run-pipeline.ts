import { PipelineError } from "../application/pipeline/pipeline.error-handler";
import { runPipeline } from "../composition/root";
import { parseDurationHours } from "../shared/config/runtime.config";
import { logEvent } from "../shared/logging/log";

type ErrorContext = Partial<{
  executionId: string;
  jobId: string;
  batchId: string;
  key: string;
  records: number;
}>;

type CliErrorEnvelope = {
  event: "pipeline.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const stringContextKeys = ["executionId", "jobId", "batchId", "key"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const finiteNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

/** Keeps only the identifiers an operator needs; anything else on the error context is dropped. */
const pickContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const picked: ErrorContext = {};
  for (const key of stringContextKeys) {
    const raw = value[key];
    if (typeof raw === "string" && raw !== "") picked[key] = raw;
  }
  const records = finiteNumber(value.records);
  if (records !== undefined) picked.records = records;

  return Object.keys(picked).length > 0 ? picked : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean =>
  ["1", "true"].includes(env.DEBUG?.toLowerCase() ?? "");

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const fields = isRecord(err) ? err : {};
  const code = typeof fields.code === "string" ? fields.code : undefined;
  const context = pickContext(fields.context);
  const status = finiteNumber(fields.status);

  return {
    event: "pipeline.failed",
    name: error.name || "Error",
    message: error.message,
    ...(code !== undefined && { code }),
    ...(context !== undefined && { context }),
    ...(status !== undefined && { status }),
    ...(includeStack && typeof error.stack === "string" && { stack: error.stack })
  };
};

/**
 * Reads `--duration-hours <n>` or `--duration-hours=<n>`, then `DURATION_HOURS`.
 */
export const readDurationHours = (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): number => {
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--duration-hours") {
      const value = argv[i + 1];
      if (value === undefined) throw new Error("--duration-hours requires a value");
      return parseDurationHours(value);
    }
    if (arg?.startsWith("--duration-hours=")) return parseDurationHours(arg.slice("--duration-hours=".length));
  }
  return parseDurationHours(env.DURATION_HOURS);
};

export const executePipelineCli = async (argv: readonly string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const execution = await runPipeline(readDurationHours(argv));
    const outcome = execution.outcome;
    if (outcome?.errorCode) {
      throw new PipelineError({
        code: outcome.errorCode,
        message: outcome.errorDetail ?? `Execution ended in ${execution.stage}`,
        context: { executionId: execution.executionId }
      });
    }
    logEvent("info", "pipeline.finished", {
      executionId: execution.executionId,
      stage: execution.stage,
      statusCode: outcome?.statusCode ?? null
    });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executePipelineCli();
}
