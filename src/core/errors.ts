/**
 * Runtime error types. Every error carries a stable `code` so hosts can
 * branch on it without matching message text.
 */

export class PluginRuntimeError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "PluginRuntimeError";
    this.code = code;
    this.details = details;
  }
}

/** The plugin's manifest or shape failed validation */
export class InvalidPluginError extends PluginRuntimeError {
  readonly errors: readonly string[];

  constructor(name: string, errors: readonly string[]) {
    super("E_PLUGIN_INVALID", `Plugin "${name}" is invalid: ${errors.join("; ")}`, { name });
    this.name = "InvalidPluginError";
    this.errors = errors;
  }
}

export class DuplicatePluginError extends PluginRuntimeError {
  constructor(name: string, existingSlot: number) {
    super("E_PLUGIN_DUPLICATE", `Plugin "${name}" is already installed at slot ${existingSlot}.`, {
      name,
      existingSlot,
    });
    this.name = "DuplicatePluginError";
  }
}

/** Raised instead of a silent drop when strict routing is enabled */
export class RoutingError extends PluginRuntimeError {
  constructor(message: string, details: Record<string, unknown>) {
    super("E_ROUTING_MISMATCH", message, details);
    this.name = "RoutingError";
  }
}

export class BuilderConsumedError extends PluginRuntimeError {
  constructor() {
    super("E_BUILDER_CONSUMED", "RegistryBuilder.build() has already been called.");
    this.name = "BuilderConsumedError";
  }
}

export class RuntimeStoppedError extends PluginRuntimeError {
  constructor(status: string) {
    super("E_RUNTIME_STOPPED", `Runtime is ${status} and no longer accepts messages.`, { status });
    this.name = "RuntimeStoppedError";
  }
}

export class ConfigError extends PluginRuntimeError {
  constructor(message: string, issues: readonly string[]) {
    super("E_CONFIG_INVALID", message, { issues });
    this.name = "ConfigError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
