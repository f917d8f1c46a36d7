import * as v from "valibot";

import { ConfigurationError } from "../errors";

import { type Env, envSchema } from "./schema";

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const result = v.safeParse(envSchema, source);
  if (!result.success) {
    const issues = result.issues.map(
      (issue) => `${issue.path?.map((item) => String(item.key)).join(".") ?? "env"}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Environment variable validation failed:\n  - ${issues.join("\n  - ")}`,
      issues,
    );
  }
  return result.output;
};

// Lazy initialization to allow tests to set process.env before parsing
let cachedEnv: Env | undefined;

export const getEnv = (): Env => {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
};

const isEnvKey = (key: string | symbol, source: Env): key is keyof Env =>
  typeof key === "string" && key in source;

/**
 * Property access to the parsed environment, e.g. `env.LOG_LEVEL`. The first
 * read parses `process.env`.
 */
export const env: Env = new Proxy<Env>(
  { NODE_ENV: "development" },
  {
    get(_target, prop) {
      const current = getEnv();
      return isEnvKey(prop, current) ? current[prop] : undefined;
    },
  },
);

/** Drops the cached environment so the next `getEnv()` re-reads `process.env`. */
export const resetEnvCache = (): void => {
  cachedEnv = undefined;
};

export type { Env } from "./schema";
