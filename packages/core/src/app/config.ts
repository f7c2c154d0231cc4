/**
 * Application configuration: schema, defaults and environment loading.
 */

import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { LOG_LEVEL_NAMES } from "~/app/logger.ts";
import type { FaultlineSettings } from "~/app/types.ts";
import type { ValidationIssue } from "~/errors/types.ts";

export const FaultlineConfigSchema = t.Object({
  prefix: t.Optional(t.String({ pattern: "^/" })),
  debug: t.Optional(t.Boolean()),
  fallback: t.Optional(
    t.Union([
      t.Literal("auto"),
      t.Literal("html"),
      t.Literal("text"),
      t.Literal("json"),
    ]),
  ),
  noisyExceptions: t.Optional(t.Boolean()),
  lookup: t.Optional(t.Union([t.Literal("route"), t.Literal("global")])),
  logLevel: t.Optional(
    t.Union(LOG_LEVEL_NAMES.map((level) => t.Literal(level))),
  ),
  logJson: t.Optional(t.Boolean()),
});

export const DEFAULT_SETTINGS: Required<FaultlineSettings> = {
  prefix: "/",
  debug: false,
  fallback: "auto",
  noisyExceptions: false,
  lookup: "route",
  logLevel: "info",
  logJson: false,
};

/**
 * Thrown when application settings fail validation.
 */
export class ConfigError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join(", ");
    super(`Invalid configuration: ${summary}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Check raw settings against `FaultlineConfigSchema`.
 *
 * @throws {ConfigError} Listing every violation
 */
export function validateSettings(input: unknown): FaultlineSettings {
  if (Value.Check(FaultlineConfigSchema, input)) {
    return input;
  }

  const issues = [...Value.Errors(FaultlineConfigSchema, input)].map((err) => ({
    field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
    message: err.message,
    code: err.type.toString(),
  }));
  throw new ConfigError(issues);
}

/**
 * Validate settings and fill in defaults.
 */
export function resolveSettings(input: unknown): Required<FaultlineSettings> {
  const settings = validateSettings(input);
  return {
    prefix: settings.prefix ?? DEFAULT_SETTINGS.prefix,
    debug: settings.debug ?? DEFAULT_SETTINGS.debug,
    fallback: settings.fallback ?? DEFAULT_SETTINGS.fallback,
    noisyExceptions: settings.noisyExceptions ??
      DEFAULT_SETTINGS.noisyExceptions,
    lookup: settings.lookup ?? DEFAULT_SETTINGS.lookup,
    logLevel: settings.logLevel ?? DEFAULT_SETTINGS.logLevel,
    logJson: settings.logJson ?? DEFAULT_SETTINGS.logJson,
  };
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

// Unrecognized values are passed through so validation reports them.
function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return value;
}

const ENV_KEYS = {
  prefix: "FAULTLINE_PREFIX",
  debug: "FAULTLINE_DEBUG",
  fallback: "FAULTLINE_FALLBACK_ERROR_FORMAT",
  noisyExceptions: "FAULTLINE_NOISY_EXCEPTIONS",
  logLevel: "FAULTLINE_LOG_LEVEL",
  logJson: "FAULTLINE_LOG_JSON",
} as const;

const BOOLEAN_KEYS = new Set<string>(["debug", "noisyExceptions", "logJson"]);

/**
 * Read settings from `FAULTLINE_*` environment variables.
 *
 * Unset variables are left out so defaults (or explicit config) apply.
 *
 * @example
 * ```typescript
 * // FAULTLINE_DEBUG=1 FAULTLINE_FALLBACK_ERROR_FORMAT=json
 * const app = new Faultline({ ...configFromEnv(), prefix: "/api" });
 * ```
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): FaultlineSettings {
  const raw: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    raw[key] = BOOLEAN_KEYS.has(key) ? parseBoolean(value) : value;
  }
  return validateSettings(raw);
}
