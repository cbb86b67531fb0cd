import { randomUUID } from "crypto";
import { InvalidTaskRequestError } from "../../core/scaling/scaling.errors";
import type { TaskDoc } from "../../core/tasks/task.types";
import type { TaskSubmitter } from "../../ports/TaskRepository";

export const SLEEP_TASK_NAME = "sleep";

export type SubmitTaskConfig = {
  defaultQueueName: string;
  maxDurationSeconds: number;
};

export type SubmittedTask = {
  taskId: string;
  queueName: string;
  durationSeconds: number;
};

export const parseDurationSeconds = (raw: string, maxDurationSeconds: number): number => {
  const normalized = raw.trim();
  if (!/^\d+$/.test(normalized)) {
    throw new InvalidTaskRequestError(`Invalid duration: "${raw}" is not a non-negative integer`);
  }

  const value = Number.parseInt(normalized, 10);
  if (value > maxDurationSeconds) {
    throw new InvalidTaskRequestError(`Invalid duration: ${value} exceeds ${maxDurationSeconds} seconds`, { value });
  }
  return value;
};

/**
 * Enqueues one sleep task. Used to generate backlog; workers are out of process.
 */
export const submitTask = async (deps: {
  submitter: TaskSubmitter;
  config: SubmitTaskConfig;
  durationParam: string;
  queueName?: string;
  now?: () => Date;
  newId?: () => string;
}): Promise<SubmittedTask> => {
  const durationSeconds = parseDurationSeconds(deps.durationParam, deps.config.maxDurationSeconds);
  const queueName = deps.queueName?.trim() || deps.config.defaultQueueName;

  const createdAt = (deps.now ?? (() => new Date()))();
  const doc: TaskDoc = {
    _id: (deps.newId ?? randomUUID)(),
    queueName,
    name: SLEEP_TASK_NAME,
    status: "ENQUEUED",
    input: { durationSeconds },
    createdAt,
    updatedAt: createdAt
  };

  await deps.submitter.enqueue(doc);

  console.log(JSON.stringify({ event: "task.enqueued", taskId: doc._id, queueName, durationSeconds }));
  return { taskId: doc._id, queueName, durationSeconds };
};
