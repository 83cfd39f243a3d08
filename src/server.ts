import http from "http";
import {
  parseJobStatusEvent,
  type CompletionResult,
  type JobStatusEvent
} from "./application/handle-completion/handleCompletion.usecase";
import { createPipelineApp } from "./composition/root";
import { logEvent, toErrorMessage } from "./shared/logging/log";

export type CompletionEndpointDeps = {
  handleJobEvent: (event: JobStatusEvent) => Promise<CompletionResult>;
};

const MAX_BODY_BYTES = 64 * 1024;

const sendJson = (res: http.ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(payload));
};

const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });

const handleJobEventRequest = async (
  deps: CompletionEndpointDeps,
  req: http.IncomingMessage,
  res: http.ServerResponse
): Promise<void> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readBody(req));
  } catch (err) {
    sendJson(res, 400, { message: `Invalid JSON body: ${toErrorMessage(err)}` });
    return;
  }

  const event = parseJobStatusEvent(raw);
  if (!event) {
    sendJson(res, 400, { message: "jobId is required" });
    return;
  }

  const result = await deps.handleJobEvent(event);
  sendJson(res, result.statusCode, result);
};

/**
 * `GET /health` and `POST /job-events`, the completion-event endpoint the
 * prediction service (or its event bus) calls.
 */
export const createServer = (deps: CompletionEndpointDeps) => {
  return http.createServer((req, res) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method === "GET" && path === "/health") {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (req.method === "POST" && path === "/job-events") {
      handleJobEventRequest(deps, req, res).catch((err: unknown) => {
        logEvent("error", "completion.request_failed", { message: toErrorMessage(err) });
        if (!res.headersSent) sendJson(res, 500, { message: "Completion handling failed" });
      });
      return;
    }

    sendJson(res, 404, { message: "Not found" });
  });
};

if (require.main === module) {
  const port = Number(process.env.PORT ?? 3000);

  createPipelineApp()
    .then((app) => {
      const server = createServer(app);
      server.listen(port, () => {
        logEvent("info", "server.listening", { url: `http://localhost:${port}` });
      });
      const shutdown = () => {
        server.close(() => {
          app.close().catch((err: unknown) => logEvent("error", "server.close_failed", { message: toErrorMessage(err) }));
        });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    })
    .catch((err: unknown) => {
      logEvent("error", "server.start_failed", { message: toErrorMessage(err) });
      process.exit(1);
    });
}
