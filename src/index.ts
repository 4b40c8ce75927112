/**
 * Switchboard: typed plugin routing for event-loop hosts
 *
 * Public API surface. This is the only entry point for consumers.
 */

// Core
export { PluginRegistry } from "./core/registry.js";
export { RegistryBuilder } from "./core/builder.js";
export { PluginHandle } from "./core/handle.js";
export { OutputFanout } from "./core/output-fanout.js";
export { Effect } from "./core/effect.js";
export { EventSource } from "./core/event-source.js";
export { Envelope, OutputEnvelope, openEnvelope, wrapMessage, wrapOutput } from "./core/envelope.js";
export { TypeTag, describeTag } from "./core/type-tag.js";
export { createChannel } from "./core/channel.js";
export { functionIdentity } from "./core/identity.js";
export { createLogger, LOG_LEVELS } from "./core/logger.js";
export {
  PluginRuntimeError,
  InvalidPluginError,
  DuplicatePluginError,
  RoutingError,
  BuilderConsumedError,
  RuntimeStoppedError,
  ConfigError,
} from "./core/errors.js";

// Types
export type { RouteResult, Installed, SlotInfo } from "./core/registry.js";
export type { BuiltRegistry } from "./core/builder.js";
export type { Listener, ListenerRegistration } from "./core/output-fanout.js";
export type { Emit, Result, AbortHandle } from "./core/effect.js";
export type { Recipe } from "./core/event-source.js";
export type { TagIdentity, Sealed } from "./core/type-tag.js";
export type { Sender, Receiver } from "./core/channel.js";
export type { LogLevel } from "./core/logger.js";
export { PLUGIN_API_VERSION } from "./plugins/api.js";
export type {
  Plugin,
  PluginManifest,
  PluginName,
  SemVer,
  Init,
  Update,
  MessageOf,
  StateOf,
  OutputOf,
  Logger,
} from "./plugins/api.js";

// Config
export {
  parseRuntimeOptions,
  loadRuntimeOptions,
  runtimeOptionsSchema,
  logLevelSchema,
} from "./config/options.js";
export type { RuntimeOptions, RuntimeOptionsInput } from "./config/options.js";

// Runtime
export { Runtime, pluginApp } from "./runtime/runtime.js";
export type { Application, RuntimeStatus, RuntimeStats } from "./runtime/runtime.js";

// Plugin SDK
export { BasePlugin, ManifestBuilder, validatePlugin } from "./sdk/plugin-sdk.js";
export type { ValidationResult } from "./sdk/plugin-sdk.js";
export { pluginManifestSchema, pluginNameSchema, assertValidPlugin } from "./plugins/manifest.js";
