import { countCandidateQueues, decideScaling } from "../../core/scaling/estimateWorkers";
import type { ScalingDecision } from "../../core/scaling/scaling.types";
import type { QueueIntrospector } from "../../ports/QueueIntrospector";
import { toErrorLog } from "./scaling.error-handler";

/**
 * One poll: fresh queue snapshot, then the replica estimate. Nothing is shared between polls.
 */
export const pollScaling = async (deps: {
  introspector: QueueIntrospector;
  signal?: AbortSignal;
  now?: () => number;
}): Promise<ScalingDecision> => {
  const now = deps.now ?? Date.now;
  const startedAt = now();

  try {
    const state = await deps.introspector.fetchQueueState({ signal: deps.signal });
    const decision = decideScaling(state);

    console.log(
      JSON.stringify({
        event: "scaling.polled",
        expectedWorkers: decision.expectedWorkers,
        queues: state.concurrencyByQueue.size,
        candidateQueues: countCandidateQueues(state.concurrencyByQueue),
        durationMs: now() - startedAt
      })
    );
    return decision;
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "scaling.poll_failed", ...toErrorLog(err), durationMs: now() - startedAt }));
    throw err;
  }
};
