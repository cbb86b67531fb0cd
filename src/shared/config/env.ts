export type Env = {
  MONGO_URI: string;
  QUEUE_ADMIN_URL: string;
  QUEUE_METADATA_PATH: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validatePath = (name: string, value: string): string => {
  const normalized = value.trim();
  if (normalized === "/" || !/^\/?[A-Za-z0-9._~\-/]+$/.test(normalized)) {
    throw new Error(`${name} must be a non-empty URL path. Received: ${value}`);
  }
  return normalized.startsWith("/") ? normalized : `/${normalized}`;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = env.MONGO_URI ?? "mongodb://localhost:27017/scaler";
  const QUEUE_ADMIN_URL = validateHttpUrl("QUEUE_ADMIN_URL", env.QUEUE_ADMIN_URL ?? "http://localhost:3001");

  const QUEUE_METADATA_PATH = validatePath(
    "QUEUE_METADATA_PATH",
    env.QUEUE_METADATA_PATH ?? "/dbos-workflow-queues-metadata"
  );

  return { MONGO_URI, QUEUE_ADMIN_URL, QUEUE_METADATA_PATH };
};
