/**
 * Runtime options
 *
 * Options accepted by the registry, the builder and the reference runtime,
 * validated with zod. `loadRuntimeOptions` layers environment variables
 * under explicit overrides.
 */

import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { LOG_LEVELS } from "../core/logger.js";

export const logLevelSchema = z.enum(LOG_LEVELS);

export const runtimeOptionsSchema = z
  .object({
    /** Throw a RoutingError on a mismatched envelope instead of dropping it */
    strictRouting: z.boolean().default(false),
    logLevel: logLevelSchema.default("warn"),
  })
  .strict();

export type RuntimeOptions = z.output<typeof runtimeOptionsSchema>;
export type RuntimeOptionsInput = z.input<typeof runtimeOptionsSchema>;

const flagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  SWITCHBOARD_LOG_LEVEL: logLevelSchema.optional(),
  SWITCHBOARD_STRICT_ROUTING: flagSchema.optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function parseRuntimeOptions(input: RuntimeOptionsInput = {}): RuntimeOptions {
  const result = runtimeOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid runtime options: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Read options from the environment. Explicit overrides win over
 * environment values, which win over defaults.
 */
export function loadRuntimeOptions(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RuntimeOptionsInput = {},
): RuntimeOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`, issues);
  }

  const fromEnv: RuntimeOptionsInput = {};
  if (parsed.data.SWITCHBOARD_LOG_LEVEL !== undefined) {
    fromEnv.logLevel = parsed.data.SWITCHBOARD_LOG_LEVEL;
  }
  if (parsed.data.SWITCHBOARD_STRICT_ROUTING !== undefined) {
    fromEnv.strictRouting = parsed.data.SWITCHBOARD_STRICT_ROUTING;
  }

  return parseRuntimeOptions({ ...fromEnv, ...overrides });
}
