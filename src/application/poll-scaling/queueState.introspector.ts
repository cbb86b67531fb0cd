import type { QueueBacklogCount, QueueDescriptor, QueueState } from "../../core/scaling/scaling.types";
import { MalformedResponseError } from "../../core/scaling/scaling.errors";
import type { QueueIntrospector } from "../../ports/QueueIntrospector";
import type { QueueMetadataSource, RequestOptions } from "../../ports/QueueMetadataSource";
import type { TaskBacklogSource } from "../../ports/TaskRepository";

export const toConcurrencyByQueue = (queues: QueueDescriptor[]): Map<string, number> =>
  new Map(queues.map((queue) => [queue.name, queue.workerConcurrency]));

/**
 * Queues without non-terminal tasks are simply missing from the result.
 */
export const toBacklogByQueue = (counts: QueueBacklogCount[]): Map<string, number> => {
  const backlogByQueue = new Map<string, number>();
  for (const { name, count } of counts) {
    if (backlogByQueue.has(name)) {
      throw new MalformedResponseError(`Backlog lists queue "${name}" more than once`, {
        source: "task_backlog",
        queueName: name
      });
    }
    backlogByQueue.set(name, count);
  }
  return backlogByQueue;
};

/**
 * Snapshot of queue configuration and backlog, read from two independent sources.
 */
export const createQueueStateIntrospector = (deps: {
  metadata: QueueMetadataSource;
  backlog: TaskBacklogSource;
}): QueueIntrospector => ({
  fetchQueueState: async (options: RequestOptions = {}): Promise<QueueState> => {
    const [queues, counts] = await Promise.all([
      deps.metadata.listQueues(options),
      deps.backlog.countNonTerminalByQueue(options)
    ]);

    return {
      concurrencyByQueue: toConcurrencyByQueue(queues),
      backlogByQueue: toBacklogByQueue(counts)
    };
  }
});
