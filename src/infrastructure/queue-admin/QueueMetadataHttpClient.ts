import type { QueueDescriptor } from "../../core/scaling/scaling.types";
import { BackendUnavailableError, MalformedResponseError } from "../../core/scaling/scaling.errors";
import type { QueueMetadataSource, RequestOptions } from "../../ports/QueueMetadataSource";
import { parseQueueMetadata } from "./queueMetadata.parser";

export const DEFAULT_QUEUE_METADATA_PATH = "/dbos-workflow-queues-metadata";

/**
 * Reads registered queues from the workflow engine's admin server.
 * One request per call: failures surface to the caller without retries.
 */
export class QueueMetadataHttpClient implements QueueMetadataSource {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 5000,
    private readonly metadataPath = DEFAULT_QUEUE_METADATA_PATH
  ) {}

  async listQueues(options: RequestOptions = {}): Promise<QueueDescriptor[]> {
    const url = new URL(this.baseUrl);
    const relativePath = this.metadataPath.replace(/^\/+/, "");
    url.pathname = url.pathname.endsWith("/")
      ? `${url.pathname}${relativePath}`
      : `${url.pathname}/${relativePath}`;
    const safeRequestUrl = `${url.origin}${url.pathname}`;
    const context = { source: "queue_metadata" as const, requestUrl: safeRequestUrl };

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const abortFromCaller = () => controller.abort();
    options.signal?.addEventListener("abort", abortFromCaller, { once: true });
    if (options.signal?.aborted) controller.abort();

    let body = "";
    try {
      const res = await fetch(url.toString(), {
        headers: { accept: "application/json" },
        signal: controller.signal
      });
      body = await res.text();

      if (!res.ok) {
        logRequestFailure(safeRequestUrl, res.status);
        throw new BackendUnavailableError(`Queue metadata request failed: ${res.status}`, context, {
          status: res.status
        });
      }
    } catch (err) {
      if (err instanceof BackendUnavailableError) throw err;

      const message = timedOut
        ? `Queue metadata request timeout after ${this.timeoutMs}ms`
        : controller.signal.aborted
          ? "Queue metadata request aborted"
          : `Queue metadata request failed: ${err instanceof Error ? err.message : String(err)}`;
      logRequestFailure(safeRequestUrl, null);
      throw new BackendUnavailableError(message, context, { cause: err });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", abortFromCaller);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new MalformedResponseError("Queue metadata response is not valid JSON", context, err);
    }

    return parseQueueMetadata(json);
  }
}

const logRequestFailure = (url: string, status: number | null) => {
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify({ event: "backend.request_failed", source: "queue_metadata", status, url }));
};
