/**
 * @lpvault/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Locator specs may be overridden from a JSON file (LOCATORS_FILE).
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_TABLE_SELECTOR } from "@lpvault/collector";
import type { LocatorSpec } from "@lpvault/collector";
import { METRIC_NAMES, isMetricName } from "@lpvault/types";
import type { MetricName } from "@lpvault/types";
import { ConfigError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const ConfigSchema = z.object({
  // Vault
  VAULT_URL: z.string().url().default("https://ox.fun/en/vaults/profile/110428"),
  VAULT_NAME: z.string().min(1).default("OX.FUN LP Vault"),
  HISTORY_ROOT: z.string().min(1).default("data"),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Browser session
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
  READY_SELECTOR: z.string().min(1).default(DEFAULT_TABLE_SELECTOR),
  CONSENT_SELECTOR: z.string().min(1).optional(),
  SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  SESSION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(2),
  SESSION_RETRY_BASE_MS: z.coerce.number().int().min(0).default(2000),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  BROWSER_HEADLESS: booleanFlag.default("true"),

  // Extraction
  CRITICAL_METRICS: z.string().default("balance"),
  LOCATORS_FILE: z.string().min(1).optional(),

  // Analytics and report
  VALUE_BASIS: z.enum(["balance", "sharePrice"]).default("balance"),
  UNIT_LABEL: z.string().min(1).default("OX"),
  ROLLING_WINDOW: z.coerce.number().int().min(2).default(7),

  // Table backfill
  TABLE_SELECTOR: z.string().min(1).default(DEFAULT_TABLE_SELECTOR),
  PAGINATION_NEXT_SELECTOR: z.string().min(1).default("#__next ul div.oxfun-pagination-next"),
  PAGINATION_DISABLED_CLASS: z.string().min(1).default("oxfun-pagination-disabled"),
  BACKFILL_MAX_PAGES: z.coerce.number().int().min(1).default(100),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Metric Lists
// =============================================================================

/**
 * Parse a comma-separated list of metric names ("balance,sharePrice").
 *
 * @throws {ConfigError} INVALID_CONFIG on an unknown name
 */
export function parseMetricList(raw: string): readonly MetricName[] {
  const metrics: MetricName[] = [];

  for (const entry of raw.split(",")) {
    const name = entry.trim();
    if (name === "") continue;
    if (!isMetricName(name)) {
      throw new ConfigError(
        "INVALID_CONFIG",
        `Unknown metric "${name}". Must be one of: ${METRIC_NAMES.join(", ")}`,
      );
    }
    if (!metrics.includes(name)) metrics.push(name);
  }

  return metrics;
}

// =============================================================================
// Locator File
// =============================================================================

const MetricNameSchema = z.enum(["balance", "totalPnl", "dailyPnl", "sharePrice", "valueUsd", "perpsVolume", "fees"]);

const LocatorSpecSchema = z.discriminatedUnion("strategy", [
  z.object({ metric: MetricNameSchema, strategy: z.literal("selector"), selector: z.string().min(1) }),
  z.object({ metric: MetricNameSchema, strategy: z.literal("label"), label: z.string().min(1) }),
  z.object({
    metric: MetricNameSchema,
    strategy: z.literal("table-column"),
    table: z.string().min(1),
    header: z.string().min(1),
  }),
]);

export const LocatorFileSchema = z.array(LocatorSpecSchema).min(1);

/**
 * Read and validate a JSON list of locator specs.
 *
 * @throws {ConfigError} INVALID_LOCATORS when the file is unreadable or invalid
 */
export function loadLocatorSpecs(path: string): readonly LocatorSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new ConfigError(
      "INVALID_LOCATORS",
      `Cannot read locator file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const parsed = LocatorFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("INVALID_LOCATORS", `Invalid locator file ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} INVALID_CONFIG if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("INVALID_CONFIG", `Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  // Fail on a bad metric list before any browser work starts
  parseMetricList(parsed.data.CRITICAL_METRICS);
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
