import http from "http";
import { pollScaling } from "./application/poll-scaling/pollScaling.usecase";
import { toHttpErrorResponse } from "./application/poll-scaling/scaling.error-handler";
import { submitTask, type SubmitTaskConfig } from "./application/submit-task/submitTask.usecase";
import { createScalerApp } from "./composition/root";
import type { QueueIntrospector } from "./ports/QueueIntrospector";
import type { TaskSubmitter } from "./ports/TaskRepository";

export type ServerDeps = {
  introspector: QueueIntrospector;
  submitter: TaskSubmitter;
  submitConfig: SubmitTaskConfig;
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  // the client may have gone away mid-poll
  if (res.destroyed || res.writableEnded) return;
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

const ENQUEUE_ROUTE = /^\/enqueue\/([^/]+)$/;

/**
 * Routes:
 * - GET /metrics            scaling signal for the autoscaler
 * - GET /enqueue/:duration  submit one sleep task (optional ?queue=name)
 * - GET /healthz            liveness
 */
export const createRequestHandler = (deps: ServerDeps) => {
  const handleMetrics = async (res: http.ServerResponse) => {
    // An abandoned scrape cancels its outbound backend queries.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const decision = await pollScaling({ introspector: deps.introspector, signal: controller.signal });
      sendJson(res, 200, { expectedWorkers: decision.expectedWorkers });
    } catch (err) {
      const { status, body } = toHttpErrorResponse(err, "Error computing metrics");
      sendJson(res, status, body);
    }
  };

  const handleEnqueue = async (res: http.ServerResponse, durationParam: string, queueName: string | undefined) => {
    try {
      const task = await submitTask({
        submitter: deps.submitter,
        config: deps.submitConfig,
        durationParam,
        queueName
      });
      sendJson(res, 200, { message: "Task enqueued successfully", ...task });
    } catch (err) {
      const { status, body } = toHttpErrorResponse(err, "Error enqueuing task");
      sendJson(res, status, body);
    }
  };

  return async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const enqueueMatch = ENQUEUE_ROUTE.exec(url.pathname);
    const known = url.pathname === "/metrics" || url.pathname === "/healthz" || enqueueMatch != null;

    if (!known) return sendJson(res, 404, { error: "Not found" });
    if (req.method !== "GET") return sendJson(res, 405, { error: "Method not allowed" });

    if (url.pathname === "/healthz") return sendJson(res, 200, { status: "ok" });
    if (url.pathname === "/metrics") return handleMetrics(res);

    const durationParam = enqueueMatch?.[1] ?? "";
    return handleEnqueue(res, durationParam, url.searchParams.get("queue") ?? undefined);
  };
};

export const createServer = (deps: ServerDeps) => {
  const handler = createRequestHandler(deps);
  return http.createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      console.error(JSON.stringify({ event: "server.request_failed", message: String(err) }));
      if (!res.headersSent) sendJson(res, 500, { error: "Internal server error" });
    });
  });
};

export const startServer = async (): Promise<http.Server> => {
  const app = createScalerApp();
  const server = createServer({
    introspector: app.introspector,
    submitter: app.submitter,
    submitConfig: app.runtime.submitTask
  });

  await new Promise<void>((resolve) => {
    server.listen(app.runtime.port, () => resolve());
  });
  console.log(JSON.stringify({ event: "server.listening", port: app.runtime.port }));

  const shutdown = () => {
    server.close(() => {
      app
        .close()
        .then(() => console.log(JSON.stringify({ event: "server.closed" })))
        .catch((err: unknown) => console.error(JSON.stringify({ event: "server.close_failed", message: String(err) })));
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  return server;
};

if (require.main === module) {
  startServer().catch((err: unknown) => {
    console.error(JSON.stringify({ event: "server.start_failed", message: err instanceof Error ? err.message : String(err) }));
    process.exit(1);
  });
}
