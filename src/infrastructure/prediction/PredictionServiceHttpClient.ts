import { normalizeJobStatus } from "../../core/jobs/jobStatus";
import type {
  JobDescription,
  PredictionService,
  SubmitJobParams,
  SubmittedJob
} from "../../ports/PredictionService";
import { logEvent } from "../../shared/logging/log";
import { withRetry, type RetryPolicy, type RetryVerdict } from "../../shared/retry/retry";

export class PredictionRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(
    message: string,
    details: { requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }
  ) {
    super(message);
    this.name = "PredictionRequestError";
    this.requestUrl = details.requestUrl;
    this.status = details.status;
    this.isTimeout = details.isTimeout ?? false;
    this.retryDelayMs = details.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type PredictionHttpClientOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

type RequestOptions = {
  method: "GET" | "POST";
  body?: Record<string, unknown>;
  allowNotFound?: boolean;
  retryable: boolean;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Transport timeouts, 429 and 5xx are retried; other 4xx are final.
 */
export const classifyPredictionError = (err: unknown): RetryVerdict => {
  if (!(err instanceof PredictionRequestError)) return { retry: true };
  if (err.isTimeout) return { retry: true };

  const status = err.status;
  if (status === 429) return { retry: true, delayMs: err.retryDelayMs };
  if (typeof status === "number") return { retry: status >= 500 };
  return { retry: true };
};

const parseRetryAfterMs = (header: string | null): number | undefined =>
  header && /^\d+$/.test(header) ? Number(header) * 1000 : undefined;

/**
 * JSON client for the prediction service:
 * - `GET  /models/:id` (404 means unknown model)
 * - `POST /jobs`
 * - `GET  /jobs/:id`
 */
export class PredictionServiceHttpClient implements PredictionService {
  private readonly timeoutMs: number;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly options: PredictionHttpClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async modelExists(modelId: string): Promise<boolean> {
    const json = await this.request(["models", modelId], { method: "GET", allowNotFound: true, retryable: true });
    return json !== null;
  }

  async submitJob(params: SubmitJobParams): Promise<SubmittedJob> {
    // Not retried: a repeated POST could start a second job.
    const json = await this.request(["jobs"], {
      method: "POST",
      retryable: false,
      body: {
        modelId: params.modelId,
        inputUri: params.inputUri,
        outputUri: params.outputUri,
        instanceType: params.instanceType,
        instanceCount: params.instanceCount,
        contentType: params.contentType ?? "text/csv"
      }
    });
    if (!isRecord(json) || typeof json.jobId !== "string" || json.jobId === "") {
      throw new Error("Prediction service did not return a job id");
    }
    return { jobId: json.jobId };
  }

  async describeJob(jobId: string): Promise<JobDescription> {
    const json = await this.request(["jobs", jobId], { method: "GET", retryable: true });
    if (!isRecord(json) || typeof json.status !== "string") {
      throw new Error(`Prediction service returned no status for job ${jobId}`);
    }
    return {
      jobId,
      status: normalizeJobStatus(json.status),
      rawStatus: json.status,
      ...(typeof json.failureReason === "string" ? { failureReason: json.failureReason } : {})
    };
  }

  private buildUrl(segments: readonly string[]): URL {
    const url = new URL(this.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${base}${segments.map((segment) => encodeURIComponent(segment)).join("/")}`;
    return url;
  }

  private async request(segments: readonly string[], options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(segments);
    const safeRequestUrl = `${url.origin}${url.pathname}`;

    const doFetch = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          method: options.method,
          headers: {
            "X-API-Key": this.apiKey,
            Accept: "application/json",
            ...(options.body ? { "Content-Type": "application/json" } : {})
          },
          ...(options.body ? { body: JSON.stringify(options.body) } : {}),
          signal: controller.signal
        });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new PredictionRequestError(`Prediction request timeout after ${this.timeoutMs}ms`, {
            requestUrl: safeRequestUrl,
            isTimeout: true
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (res.status === 404 && options.allowNotFound) {
        await res.text().catch(() => "");
        return null;
      }

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new PredictionRequestError(`Prediction request failed: ${res.status}`, {
          requestUrl: safeRequestUrl,
          status: res.status,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
        });
      }

      const json: unknown = await res.json();
      return json;
    };

    const logAttempt = (event: string, info: { attempt: number; maxAttempts: number; error: unknown }) => {
      const error = info.error;
      logEvent("warn", event, {
        status: error instanceof PredictionRequestError ? error.status ?? null : null,
        url: error instanceof PredictionRequestError ? error.requestUrl : safeRequestUrl,
        attempt: info.attempt,
        maxAttempts: info.maxAttempts
      });
    };

    const policy: RetryPolicy = {
      maxAttempts: options.retryable ? this.options.maxAttempts ?? 4 : 1,
      baseDelayMs: this.options.baseDelayMs ?? 250,
      maxDelayMs: this.options.maxDelayMs ?? 5000,
      classify: classifyPredictionError,
      onRetry: (info) => logAttempt("http.retry", info),
      onGiveUp: (info) => logAttempt("http.give_up", info),
      ...(this.options.sleep ? { sleep: this.options.sleep } : {})
    };

    return withRetry(doFetch, policy);
  }
}
