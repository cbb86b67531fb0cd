import { InvalidInputError } from "./scaling.errors";
import type { BacklogByQueue, ConcurrencyByQueue, QueueState, ScalingDecision } from "./scaling.types";

export const MIN_EXPECTED_WORKERS = 1;

const assertNonNegativeCount = (kind: "concurrency" | "backlog", queueName: string, value: number) => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(
      `Invalid ${kind} for queue "${queueName}": expected a non-negative integer, got ${String(value)}`,
      { queueName, value }
    );
  }
};

/**
 * Replicas needed so that the busiest queue, relative to its own per-worker
 * concurrency, can be drained without exceeding that limit.
 *
 * Queues with concurrency 0 are uncapped and never drive the result. Workers
 * are assumed to serve every queue, so the per-queue demands are combined
 * with max rather than sum. The result is never below one.
 */
export const estimateExpectedWorkers = (
  concurrencyByQueue: ConcurrencyByQueue,
  backlogByQueue: BacklogByQueue
): number => {
  for (const [queueName, concurrency] of concurrencyByQueue) {
    assertNonNegativeCount("concurrency", queueName, concurrency);
  }
  for (const [queueName, backlog] of backlogByQueue) {
    assertNonNegativeCount("backlog", queueName, backlog);
  }

  let expectedWorkers = 0;
  for (const [queueName, concurrency] of concurrencyByQueue) {
    if (concurrency === 0) continue;

    const backlog = backlogByQueue.get(queueName) ?? 0;
    const demand = Math.ceil(backlog / concurrency);
    if (demand > expectedWorkers) expectedWorkers = demand;
  }

  return Math.max(MIN_EXPECTED_WORKERS, expectedWorkers);
};

export const countCandidateQueues = (concurrencyByQueue: ConcurrencyByQueue): number => {
  let candidates = 0;
  for (const concurrency of concurrencyByQueue.values()) {
    if (concurrency > 0) candidates += 1;
  }
  return candidates;
};

export const decideScaling = (state: QueueState): ScalingDecision => ({
  expectedWorkers: estimateExpectedWorkers(state.concurrencyByQueue, state.backlogByQueue)
});
