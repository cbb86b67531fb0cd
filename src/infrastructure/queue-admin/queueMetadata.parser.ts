import type { QueueDescriptor } from "../../core/scaling/scaling.types";
import { MalformedResponseError } from "../../core/scaling/scaling.errors";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseWorkerConcurrency = (value: unknown, queueName: string): number => {
  // absent means the queue has no per-worker cap
  if (value == null) return 0;

  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new MalformedResponseError(
      `Queue metadata entry "${queueName}" has a non-integer workerConcurrency`,
      { source: "queue_metadata", queueName }
    );
  }
  // Negative values are kept so the estimator can reject them as invalid input.
  return value;
};

/**
 * Parses the admin endpoint payload: an array of `{ name, workerConcurrency? }`.
 */
export const parseQueueMetadata = (payload: unknown): QueueDescriptor[] => {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError("Queue metadata response is not an array", { source: "queue_metadata" });
  }

  const seen = new Set<string>();
  return payload.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new MalformedResponseError(`Queue metadata entry #${index} is not an object`, { source: "queue_metadata" });
    }

    const name = entry.name;
    if (typeof name !== "string" || name.trim() === "") {
      throw new MalformedResponseError(`Queue metadata entry #${index} has no queue name`, { source: "queue_metadata" });
    }
    if (seen.has(name)) {
      throw new MalformedResponseError(`Queue metadata lists queue "${name}" more than once`, {
        source: "queue_metadata",
        queueName: name
      });
    }
    seen.add(name);

    return { name, workerConcurrency: parseWorkerConcurrency(entry.workerConcurrency, name) };
  });
};
