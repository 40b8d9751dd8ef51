// ============================================================================
// REGISTRY CONFIGURATION
// Environment variable overrides with defaults
// ============================================================================

import * as v from "valibot";

const logLevelSchema = v.picklist([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const REGISTRY_CONFIG = {
  // Collection-level metadata served by name() / symbol()
  name: process.env.REGISTRY_NAME || "Ownership Registry",
  symbol: process.env.REGISTRY_SYMBOL || "OWN",
} as const;

export const LOG_CONFIG = {
  level: v.parse(logLevelSchema, process.env.LOG_LEVEL || "info"),
  pretty: process.env.LOG_PRETTY === "true",
} as const;
