export const taskStatuses = [
  "ENQUEUED",
  "PENDING",
  "SUCCESS",
  "ERROR",
  "CANCELLED",
  "MAX_RECOVERY_ATTEMPTS_EXCEEDED"
] as const;

export type TaskStatus = (typeof taskStatuses)[number];

// Enqueued or picked up by a worker, but not finished yet.
export const nonTerminalTaskStatuses: readonly TaskStatus[] = ["ENQUEUED", "PENDING"];

export const isNonTerminalStatus = (status: TaskStatus): boolean => nonTerminalTaskStatuses.includes(status);

export type SleepTaskInput = {
  durationSeconds: number;
};

export type TaskDoc = {
  _id: string; // UUIDv4
  queueName: string;
  name: string;
  status: TaskStatus;
  input: SleepTaskInput;
  createdAt: Date;
  updatedAt: Date;
};
