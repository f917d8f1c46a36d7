import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const positiveIntegerString = v.pipe(
  v.string(),
  v.regex(/^\d+$/, "Expected a non-negative integer"),
  v.transform(Number),
  v.number(),
);

export const envSchema = v.object({
  // Runtime
  NODE_ENV: v.optional(v.picklist(["development", "production", "test"]), "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Pipeline defaults
  PACEWIRE_MAX_RETRIES: v.optional(positiveIntegerString),
  PACEWIRE_REQUEST_TIMEOUT_MS: v.optional(v.pipe(positiveIntegerString, v.minValue(1))),

  // Time synchronization
  PACEWIRE_MAX_SYNC_ROUND_TRIP_MS: v.optional(v.pipe(positiveIntegerString, v.minValue(1))),
});

export type Env = v.InferOutput<typeof envSchema>;
