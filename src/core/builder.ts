/**
 * Registry Builder
 *
 * Collects plugins during setup and installs them, in order, when `build`
 * is called. Handles returned by `install` are usable right away: their
 * slot indices are reserved and they share the fanout the finished
 * registry will publish to.
 *
 * @example
 * ```ts
 * const builder = new RegistryBuilder();
 * const counter = builder.install(createCounterPlugin());
 * builder.withPlugin(createTickerPlugin());
 * const { registry, startup } = builder.build();
 * ```
 */

import { parseRuntimeOptions, type RuntimeOptions, type RuntimeOptionsInput } from "../config/options.js";
import type { Plugin } from "../plugins/api.js";
import { Effect } from "./effect.js";
import type { Envelope } from "./envelope.js";
import { BuilderConsumedError } from "./errors.js";
import { PluginHandle } from "./handle.js";
import { createLogger } from "./logger.js";
import { OutputFanout } from "./output-fanout.js";
import { PluginRegistry } from "./registry.js";

type PendingInstall = (registry: PluginRegistry) => Effect<Envelope>;

export interface BuiltRegistry {
  readonly registry: PluginRegistry;
  /** Every plugin's startup effect, batched */
  readonly startup: Effect<Envelope>;
}

export class RegistryBuilder {
  private readonly pending: PendingInstall[] = [];
  private readonly options: RuntimeOptions;
  private readonly fanout: OutputFanout;
  private consumed = false;

  constructor(options: RuntimeOptionsInput = {}) {
    this.options = parseRuntimeOptions(options);
    this.fanout = new OutputFanout(createLogger("fanout", this.options.logLevel));
  }

  /** Queue a plugin whose handle the caller does not need */
  withPlugin<M, S extends object, O>(plugin: Plugin<M, S, O>): this {
    this.install(plugin);
    return this;
  }

  /** Queue a plugin and return its handle */
  install<M, S extends object, O>(plugin: Plugin<M, S, O>): PluginHandle<M, O, S> {
    this.assertOpen();
    const handle = PluginHandle.create<M, O, S>(this.pending.length, plugin.manifest.name, this.fanout);
    this.pending.push((registry) => registry.attach(plugin, handle));
    return handle;
  }

  /** Number of queued plugins */
  get size(): number {
    return this.pending.length;
  }

  /** Install every queued plugin. A builder builds once. */
  build(): BuiltRegistry {
    this.assertOpen();
    this.consumed = true;

    const registry = new PluginRegistry(this.options, this.fanout);
    const startup = Effect.batch(this.pending.map((install) => install(registry)));
    return { registry, startup };
  }

  private assertOpen(): void {
    if (this.consumed) throw new BuilderConsumedError();
  }
}
