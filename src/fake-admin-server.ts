import http from "http";
import { URL } from "url";
import { DEFAULT_QUEUE_METADATA_PATH } from "./infrastructure/queue-admin/QueueMetadataHttpClient";

/**
 * Minimal fake workflow admin server for local runs.
 * - GET /dbos-workflow-queues-metadata (or FAKE_METADATA_PATH)
 *
 * Queues come from FAKE_QUEUES as `name:concurrency` pairs, e.g. `queue1:1,reports:5,bulk`.
 * A queue without `:concurrency` is uncapped.
 */
const port = Number(process.env.FAKE_ADMIN_PORT ?? 3001);

export const parseFakeQueues = (raw: string): Array<{ name: string; workerConcurrency?: number }> =>
  raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map((part) => {
      const [name, concurrency] = part.split(":");
      if (concurrency == null) return { name };
      if (!/^-?\d+$/.test(concurrency.trim())) {
        throw new Error(`FAKE_QUEUES entry "${part}" must use an integer concurrency`);
      }
      return { name, workerConcurrency: Number.parseInt(concurrency, 10) };
    });

export const createFakeAdminServer = (
  queues: Array<{ name: string; workerConcurrency?: number }>,
  metadataPath = DEFAULT_QUEUE_METADATA_PATH
) =>
  http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://localhost:${port}`);
    if (url.pathname !== metadataPath) {
      res.writeHead(404);
      return res.end();
    }

    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify(queues));
  });

if (require.main === module) {
  const server = createFakeAdminServer(
    parseFakeQueues(process.env.FAKE_QUEUES ?? "queue1:1"),
    process.env.FAKE_METADATA_PATH ?? DEFAULT_QUEUE_METADATA_PATH
  );
  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake admin server on http://localhost:${port}`);
  });
}
