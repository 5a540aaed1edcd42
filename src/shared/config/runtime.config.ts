import {
  defaultRefreshConfig,
  type RefreshConfig,
  refreshCaps,
  validateRefreshConfig
} from "../../application/build-timeouts/refresh.config";
import {
  defaultWriteRetryOptions,
  type MongoWriteRetryOptions
} from "../../infrastructure/mongo/mongo.retry";

export const runtimeCaps = {
  serverSelectionTimeoutMs: { min: 1000, max: 30000 },
  writeRetries: { min: 0, max: 10 }
} as const;

export type RuntimeConfig = {
  refreshConfig: RefreshConfig;
  writeRetry: MongoWriteRetryOptions;
  serverSelectionTimeoutMs: number;
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
  const refreshConfig = validateRefreshConfig({
    ...defaultRefreshConfig,
    concurrency:
      parseOptionalIntInRange(env, "REFRESH_CONCURRENCY", refreshCaps.concurrency) ?? defaultRefreshConfig.concurrency
  });

  const writeRetry: MongoWriteRetryOptions = {
    ...defaultWriteRetryOptions,
    retries: parseOptionalIntInRange(env, "DB_WRITE_RETRIES", runtimeCaps.writeRetries) ?? defaultWriteRetryOptions.retries
  };

  const serverSelectionTimeoutMs =
    parseOptionalIntInRange(env, "MONGO_SERVER_SELECTION_TIMEOUT_MS", runtimeCaps.serverSelectionTimeoutMs) ?? 5000;

  return { refreshConfig, writeRetry, serverSelectionTimeoutMs };
};
