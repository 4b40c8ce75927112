/**
 * Switchboard Plugin API v1
 *
 * A plugin owns a private message type, a private state type and a private
 * output type. The registry stores the state, routes messages to `update`,
 * forwards outputs to listeners and merges every plugin's subscription into
 * one. Plugins never touch each other and never run I/O inline: anything
 * asynchronous is returned as an Effect.
 */

import type { Effect } from "../core/effect.js";
import type { EventSource } from "../core/event-source.js";

export const PLUGIN_API_VERSION = "1.0";

// ─── Plugin Identity ────────────────────────────────────────────────

/** Semantic version string (e.g. "1.0.0") */
export type SemVer = string;

/** Process-unique plugin name (e.g. "counter", "pref-store") */
export type PluginName = string;

/** Metadata every plugin must declare */
export interface PluginManifest {
  /** Unique name, used for diagnostics and lookup by name */
  readonly name: PluginName;
  readonly version?: SemVer;
  readonly description?: string;
}

// ─── Plugin Contract ────────────────────────────────────────────────

/** Initial state plus an optional startup effect */
export interface Init<S, M> {
  readonly state: S;
  readonly effect?: Effect<M>;
}

/**
 * What one `update` call produced. An `output` is published to every
 * listener of the plugin; `undefined` means no output.
 */
export interface Update<M, O> {
  readonly effect?: Effect<M>;
  readonly output?: O;
}

/**
 * The contract every plugin implements.
 *
 * - `init` must be deterministic; startup I/O goes in the returned effect.
 * - `update` is the only place state changes. It mutates `state` in place
 *   and must return without blocking.
 * - `subscribe` is called on every host tick and must return an equivalent
 *   source (same recipe identities) for equivalent state.
 *
 * Errors thrown from any of these propagate to the host.
 */
export interface Plugin<M, S extends object, O = never> {
  readonly manifest: PluginManifest;
  init(): Init<S, M>;
  update(state: S, message: M): Update<M, O>;
  subscribe(state: Readonly<S>): EventSource<M>;
}

export type MessageOf<P> = P extends Plugin<infer M, infer _S extends object, infer _O> ? M : never;
export type StateOf<P> = P extends Plugin<infer _M, infer S extends object, infer _O> ? S : never;
export type OutputOf<P> = P extends Plugin<infer _M, infer _S extends object, infer O> ? O : never;

// ─── Logger ─────────────────────────────────────────────────────────

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}
