import type { SubmitTaskConfig } from "../../application/submit-task/submitTask.usecase";

export const runtimeCaps = {
  port: { min: 1, max: 65535 },
  timeoutMs: { min: 100, max: 30000 },
  maxDurationSeconds: { min: 1, max: 86400 }
} as const;

export type RuntimeConfig = {
  port: number;
  adminTimeoutMs: number;
  backlogTimeoutMs: number;
  submitTask: SubmitTaskConfig;
};

export const defaultRuntimeConfig: RuntimeConfig = {
  port: 8000,
  adminTimeoutMs: 5000,
  backlogTimeoutMs: 5000,
  submitTask: {
    defaultQueueName: "queue1",
    maxDurationSeconds: 3600
  }
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const port = parseOptionalIntInRange(env, "PORT", runtimeCaps.port) ?? defaultRuntimeConfig.port;
  const adminTimeoutMs =
    parseOptionalIntInRange(env, "ADMIN_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultRuntimeConfig.adminTimeoutMs;
  const backlogTimeoutMs =
    parseOptionalIntInRange(env, "BACKLOG_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultRuntimeConfig.backlogTimeoutMs;
  const maxDurationSeconds =
    parseOptionalIntInRange(env, "SUBMIT_MAX_DURATION_SECONDS", runtimeCaps.maxDurationSeconds) ??
    defaultRuntimeConfig.submitTask.maxDurationSeconds;
  const defaultQueueName = env.SUBMIT_QUEUE_NAME?.trim() || defaultRuntimeConfig.submitTask.defaultQueueName;

  return {
    port,
    adminTimeoutMs,
    backlogTimeoutMs,
    submitTask: { defaultQueueName, maxDurationSeconds }
  };
};
