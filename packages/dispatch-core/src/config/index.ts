/**
 * Bus configuration.
 *
 * Loads and validates settings from environment variables using Zod, and
 * merges programmatic overrides onto the defaults.
 *
 * | Variable                          | Values             | Default |
 * |-----------------------------------|--------------------|---------|
 * | `GATEHOUSE_LOG_LEVEL`             | DEBUG … ERROR      | INFO    |
 * | `GATEHOUSE_DISPATCH_TIMEOUT_MS`   | 1–2147483647       | none    |
 * | `GATEHOUSE_MAX_FOLLOW_UP_DEPTH`   | integer 0–100      | 10      |
 */
import { z } from "zod";
import { ConfigurationError } from "../errors/DispatchError.js";
import { toFieldErrors } from "../schema/SyntaxValidator.js";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from "../logging/types.js";

export const DEFAULT_MAX_FOLLOW_UP_DEPTH = 10;
export const MAX_FOLLOW_UP_DEPTH_LIMIT = 100;
/** Largest delay a timer accepts; longer ones fire immediately */
export const MAX_DISPATCH_TIMEOUT_MS = 2_147_483_647;

// =============================================================================
// Schema
// =============================================================================

export const BusConfigEnvSchema = z.object({
  GATEHOUSE_LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
  GATEHOUSE_DISPATCH_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_DISPATCH_TIMEOUT_MS)
    .optional(),
  GATEHOUSE_MAX_FOLLOW_UP_DEPTH: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_FOLLOW_UP_DEPTH_LIMIT)
    .default(DEFAULT_MAX_FOLLOW_UP_DEPTH),
});

export interface BusConfig {
  readonly logLevel: LogLevel;
  /** Abandon a dispatch, follow-ups included, after this many milliseconds */
  readonly dispatchTimeoutMs?: number;
  /** How many generations of follow-up events one dispatch may raise */
  readonly maxFollowUpDepth: number;
}

export type BusConfigOverrides = {
  logLevel?: LogLevel;
  dispatchTimeoutMs?: number;
  maxFollowUpDepth?: number;
};

export const DEFAULT_BUS_CONFIG: BusConfig = Object.freeze({
  logLevel: DEFAULT_LOG_LEVEL,
  maxFollowUpDepth: DEFAULT_MAX_FOLLOW_UP_DEPTH,
});

// =============================================================================
// Loader
// =============================================================================

function invalidConfiguration(error: z.ZodError): ConfigurationError {
  const issues = toFieldErrors(error.issues);
  return new ConfigurationError(
    "INVALID_CONFIGURATION",
    `Invalid bus configuration: ${issues.map((issue) => `${issue.field}: ${issue.reason}`).join("; ")}`,
    { issues }
  );
}

function withoutEmptyValues(
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
}

/**
 * Load and validate bus configuration from environment variables.
 *
 * Empty values count as unset.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadBusConfig(env: Record<string, string | undefined> = process.env): BusConfig {
  const parsed = BusConfigEnvSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    throw invalidConfiguration(parsed.error);
  }

  const { GATEHOUSE_LOG_LEVEL, GATEHOUSE_DISPATCH_TIMEOUT_MS, GATEHOUSE_MAX_FOLLOW_UP_DEPTH } =
    parsed.data;
  return resolveBusConfig({
    logLevel: GATEHOUSE_LOG_LEVEL,
    maxFollowUpDepth: GATEHOUSE_MAX_FOLLOW_UP_DEPTH,
    ...(GATEHOUSE_DISPATCH_TIMEOUT_MS !== undefined && {
      dispatchTimeoutMs: GATEHOUSE_DISPATCH_TIMEOUT_MS,
    }),
  });
}

const OverridesSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  dispatchTimeoutMs: z.number().int().positive().max(MAX_DISPATCH_TIMEOUT_MS).optional(),
  maxFollowUpDepth: z.number().int().min(0).max(MAX_FOLLOW_UP_DEPTH_LIMIT).optional(),
});

/**
 * Merge programmatic overrides onto the defaults.
 *
 * @throws ConfigurationError if an override is out of range
 */
export function resolveBusConfig(
  overrides: BusConfigOverrides = {},
  base: BusConfig = DEFAULT_BUS_CONFIG
): BusConfig {
  const parsed = OverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw invalidConfiguration(parsed.error);
  }

  const { logLevel, dispatchTimeoutMs, maxFollowUpDepth } = parsed.data;
  const timeout = dispatchTimeoutMs ?? base.dispatchTimeoutMs;
  return Object.freeze({
    logLevel: logLevel ?? base.logLevel,
    maxFollowUpDepth: maxFollowUpDepth ?? base.maxFollowUpDepth,
    ...(timeout !== undefined && { dispatchTimeoutMs: timeout }),
  });
}
