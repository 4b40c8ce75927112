/**
 * Manifest and plugin shape validation (zod).
 */

import { z } from "zod";
import { InvalidPluginError } from "../core/errors.js";

export const pluginNameSchema = z
  .string({ required_error: "Manifest must have a 'name'", invalid_type_error: "Manifest 'name' must be a string" })
  .regex(
    /^[a-z][a-z0-9_-]*$/,
    "Manifest 'name' must start with a lowercase letter and contain only lowercase letters, digits, '-' or '_'",
  );

const manifestShape = {
  name: pluginNameSchema,
  version: z.string().optional(),
  description: z.string().optional(),
};

export const pluginManifestSchema = z.object(manifestShape);

const method = (name: string) =>
  z.custom<(...args: never[]) => unknown>((value) => typeof value === "function", {
    message: `Plugin must implement ${name}()`,
  });

const pluginShapeSchema = z.object({
  manifest: z.object(manifestShape, { required_error: "Plugin must have a manifest" }),
  init: method("init"),
  update: method("update"),
  subscribe: method("subscribe"),
});

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate a plugin before installation */
export function validatePlugin(plugin: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = pluginShapeSchema.safeParse(plugin);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push(issue.message);
    }
    return { valid: false, errors, warnings };
  }

  const { version } = parsed.data.manifest;
  if (!version) {
    warnings.push("Manifest should declare a 'version'");
  } else if (!/^\d+\.\d+\.\d+/.test(version)) {
    warnings.push("Manifest 'version' should follow semver (e.g., '1.0.0')");
  }

  return { valid: true, errors, warnings };
}

/** Throw an InvalidPluginError unless `plugin` validates */
export function assertValidPlugin(plugin: unknown): void {
  const result = validatePlugin(plugin);
  if (!result.valid) {
    throw new InvalidPluginError(nameOf(plugin), result.errors);
  }
}

function nameOf(plugin: unknown): string {
  const parsed = z.object({ manifest: z.object({ name: z.string() }) }).safeParse(plugin);
  return parsed.success ? parsed.data.manifest.name : "<unnamed>";
}
