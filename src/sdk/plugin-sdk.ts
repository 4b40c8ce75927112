/**
 * Plugin SDK
 *
 * Base class, manifest builder and validator for writing plugins. Plugin
 * authors can implement the `Plugin` interface directly; the SDK only
 * removes boilerplate.
 */

import { Effect } from "../core/effect.js";
import { EventSource } from "../core/event-source.js";
import type { Init, Plugin, PluginManifest, Update } from "../plugins/api.js";

export { validatePlugin, type ValidationResult } from "../plugins/manifest.js";

// ─── Base Plugin ────────────────────────────────────────────────────

/**
 * Abstract base class for plugins. Subscribes to nothing by default and
 * provides shorthands for building `update` results.
 */
export abstract class BasePlugin<M, S extends object, O = never> implements Plugin<M, S, O> {
  abstract readonly manifest: PluginManifest;

  abstract init(): Init<S, M>;

  abstract update(state: S, message: M): Update<M, O>;

  subscribe(_state: Readonly<S>): EventSource<M> {
    return EventSource.none();
  }

  // ── Result Shorthands ───────────────────────────────────────────

  /** Nothing further to do */
  protected none(): Update<M, O> {
    return {};
  }

  /** Publish `output`, optionally with follow-up work */
  protected emit(output: O, effect?: Effect<M>): Update<M, O> {
    return effect ? { output, effect } : { output };
  }

  /** Follow-up work without an output */
  protected then(effect: Effect<M>): Update<M, O> {
    return { effect };
  }

  /** Feed `message` back into this plugin on the next turn */
  protected send(message: M): Update<M, O> {
    return { effect: Effect.done(message) };
  }
}

// ─── Manifest Builder ───────────────────────────────────────────────

/**
 * Fluent builder for plugin manifests.
 *
 * @example
 * ```ts
 * const manifest = ManifestBuilder.create("pref-store")
 *   .version("1.0.0")
 *   .description("Grouped key-value preferences")
 *   .build();
 * ```
 */
export class ManifestBuilder {
  private readonly _name: string;
  private _version: string | undefined;
  private _description: string | undefined;

  private constructor(name: string) {
    this._name = name;
  }

  static create(name: string): ManifestBuilder {
    return new ManifestBuilder(name);
  }

  version(version: string): this {
    this._version = version;
    return this;
  }

  description(desc: string): this {
    this._description = desc;
    return this;
  }

  build(): PluginManifest {
    return {
      name: this._name,
      ...(this._version !== undefined ? { version: this._version } : {}),
      ...(this._description !== undefined ? { description: this._description } : {}),
    };
  }
}
