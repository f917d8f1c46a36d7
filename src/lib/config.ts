import { type Env, getEnv } from "./env/env";
import type { LogLevel } from "./logger/schema";

export interface PacewireConfig {
  runtime: {
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
  };
  pipeline: {
    maxRetries: number;
    requestTimeoutMs: number;
  };
  timeSync: {
    maxRoundTripMs: number;
  };
}

const defaultLogLevel = (nodeEnv: Env["NODE_ENV"]): LogLevel => {
  switch (nodeEnv) {
    case "production":
      return "info";
    case "test":
      return "warn";
    case "development":
      return "debug";
  }
};

export const buildConfig = (env: Env): PacewireConfig => ({
  runtime: {
    nodeEnv: env.NODE_ENV,
  },
  logging: {
    level: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
  },
  pipeline: {
    maxRetries: env.PACEWIRE_MAX_RETRIES ?? 3,
    requestTimeoutMs: env.PACEWIRE_REQUEST_TIMEOUT_MS ?? 10_000,
  },
  timeSync: {
    maxRoundTripMs: env.PACEWIRE_MAX_SYNC_ROUND_TRIP_MS ?? 5_000,
  },
});

let cachedConfig: PacewireConfig | undefined;

export const getConfig = (): PacewireConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig(getEnv());
  }
  return cachedConfig;
};
