import { createQueueStateIntrospector } from "../application/poll-scaling/queueState.introspector";
import { pollScaling } from "../application/poll-scaling/pollScaling.usecase";
import type { ScalingDecision } from "../core/scaling/scaling.types";
import { MongoTaskRepository } from "../infrastructure/mongo/MongoTaskRepository";
import { QueueMetadataHttpClient } from "../infrastructure/queue-admin/QueueMetadataHttpClient";
import type { QueueIntrospector } from "../ports/QueueIntrospector";
import type { TaskSubmitter } from "../ports/TaskRepository";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export type ScalerApp = {
  runtime: RuntimeConfig;
  introspector: QueueIntrospector;
  submitter: TaskSubmitter;
  close: () => Promise<void>;
};

/**
 * Builds the adapters from env. `close` is the teardown boundary for the backend connection.
 */
export const createScalerApp = (env: NodeJS.ProcessEnv = process.env): ScalerApp => {
  const { MONGO_URI, QUEUE_ADMIN_URL, QUEUE_METADATA_PATH } = loadEnv(env);
  const runtime = loadRuntimeConfigFromEnv(env);

  const metadata = new QueueMetadataHttpClient(QUEUE_ADMIN_URL, runtime.adminTimeoutMs, QUEUE_METADATA_PATH);
  const tasks = new MongoTaskRepository(MONGO_URI, runtime.backlogTimeoutMs);

  return {
    runtime,
    introspector: createQueueStateIntrospector({ metadata, backlog: tasks }),
    submitter: tasks,
    close: () => tasks.close()
  };
};

export const runPoll = async (): Promise<ScalingDecision> => {
  const app = createScalerApp();
  try {
    return await pollScaling({ introspector: app.introspector });
  } finally {
    await app.close();
  }
};
