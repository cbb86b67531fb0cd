export type QueueDescriptor = {
  name: string;
  workerConcurrency: number; // 0 means uncapped
};

export type QueueBacklogCount = {
  name: string;
  count: number; // enqueued + in-flight, not yet terminal
};

export type ConcurrencyByQueue = ReadonlyMap<string, number>;
export type BacklogByQueue = ReadonlyMap<string, number>;

export type QueueState = {
  concurrencyByQueue: ConcurrencyByQueue;
  backlogByQueue: BacklogByQueue;
};

export type ScalingDecision = {
  expectedWorkers: number;
};
