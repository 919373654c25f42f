/**
 * Configuration validation and manager factory.
 */
import { z } from "zod";

import { ConfigError } from "./core/exceptions.js";
import { DEFAULT_EXTRACTION_TIMEOUT_MS, ExtractorManager } from "./core/manager.js";
import { createDefaultRegistry } from "./extractors/registry.js";
import { setLogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

export const ConfigSchema = z.object({
  /** Task types that are dispatched to no extractor at all. */
  disabledTaskTypes: z.array(z.string().min(1)).default([]),
  /** Extra task type name → registered extractor name. */
  aliases: z.record(z.string().min(1)).default({}),
  extractionTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_EXTRACTION_TIMEOUT_MS),
  logLevel: z
    .enum(["error", "warn", "info", "verbose", "debug", "silly"])
    .default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

const ALIAS_PREFIX = "LINEAGE_EXTRACTOR_";

/**
 * Read configuration from environment variables:
 *
 *   LINEAGE_DISABLED_TASK_TYPES=PythonOperator;BashOperator
 *   LINEAGE_EXTRACTOR_MyBigQueryOperator=BigQueryExtractor
 *   LINEAGE_EXTRACTION_TIMEOUT_MS=5000
 *   LOG_LEVEL=debug
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): Config {
  const raw: Record<string, unknown> = {};

  const disabled = env.LINEAGE_DISABLED_TASK_TYPES;
  if (disabled) {
    raw.disabledTaskTypes = disabled
      .split(/[;,]/)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  const aliases: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith(ALIAS_PREFIX) && value) {
      aliases[key.slice(ALIAS_PREFIX.length)] = value.trim();
    }
  }
  raw.aliases = aliases;

  const timeout = env.LINEAGE_EXTRACTION_TIMEOUT_MS;
  if (timeout) {
    const ms = Number(timeout);
    raw.extractionTimeoutMs = Number.isNaN(ms) ? timeout : ms;
  }

  if (env.LOG_LEVEL) raw.logLevel = env.LOG_LEVEL;

  return parseConfig(raw);
}

// ---------------------------------------------------------------------------
// Top-level config → manager
// ---------------------------------------------------------------------------

export function buildManager(config: Config): ExtractorManager {
  setLogLevel(config.logLevel);
  const registry = createDefaultRegistry(config.aliases);
  return new ExtractorManager(registry, {
    disabledTaskTypes: config.disabledTaskTypes,
    extractionTimeoutMs: config.extractionTimeoutMs,
  });
}
