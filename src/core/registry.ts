/**
 * Plugin Registry
 *
 * Ordered collection of installed plugin slots. Each slot keeps its plugin's
 * state behind closures created at install time, where the concrete
 * message, state and output types are still known; everything outside the
 * slot sees only envelopes.
 *
 * Properties:
 * - Slot indices are assigned once, in install order, and never reused
 * - A message reaches a plugin only if its envelope was sealed with that
 *   slot's message tag; anything else is dropped (or rejected when
 *   `strictRouting` is on)
 * - Outputs are published to the fanout inside `update`, in emission order
 * - `route` is synchronous and must be called one envelope at a time
 */

import type { RuntimeOptions, RuntimeOptionsInput } from "../config/options.js";
import { parseRuntimeOptions } from "../config/options.js";
import { assertValidPlugin } from "../plugins/manifest.js";
import type { Logger, Plugin } from "../plugins/api.js";
import { Effect } from "./effect.js";
import { openEnvelope, wrapOutput, type Envelope, type OutputEnvelope } from "./envelope.js";
import { DuplicatePluginError, PluginRuntimeError, RoutingError } from "./errors.js";
import { EventSource } from "./event-source.js";
import { PluginHandle } from "./handle.js";
import { createLogger } from "./logger.js";
import { OutputFanout } from "./output-fanout.js";
import { describeTag, type TagIdentity } from "./type-tag.js";

// ─── Types ──────────────────────────────────────────────────────────

/** What routing one envelope produced */
export interface RouteResult {
  /** Follow-up work; its messages are already addressed to the same slot */
  readonly effect: Effect<Envelope>;
  /** The plugin's output, if it produced one */
  readonly output?: OutputEnvelope;
}

/** Result of installing a plugin */
export interface Installed<M, O, S extends object> {
  readonly handle: PluginHandle<M, O, S>;
  /** The plugin's startup effect, addressed to its slot */
  readonly startup: Effect<Envelope>;
}

/** Introspection row for one slot */
export interface SlotInfo {
  readonly index: number;
  readonly name: string;
  readonly messageTag: string;
  readonly outputTag: string;
}

interface PluginSlot {
  readonly index: number;
  readonly name: string;
  readonly messageTag: TagIdentity;
  readonly outputTag: TagIdentity;
  /** Carrier sealed with the plugin's state tag */
  readonly stateCell: object;
  /** Update thunk. Undefined when the payload cannot be opened. */
  route(envelope: Envelope): RouteResult | undefined;
  /** Subscribe thunk, addressed to this slot */
  subscribe(): EventSource<Envelope>;
  /** Erased state, for lookup by name */
  readState(): unknown;
}

// ─── Implementation ─────────────────────────────────────────────────

export class PluginRegistry {
  private readonly slots: PluginSlot[] = [];
  private readonly options: RuntimeOptions;
  private readonly log: Logger;
  readonly fanout: OutputFanout;

  constructor(options: RuntimeOptionsInput = {}, fanout?: OutputFanout) {
    this.options = parseRuntimeOptions(options);
    this.log = createLogger("registry", this.options.logLevel);
    this.fanout = fanout ?? new OutputFanout(createLogger("fanout", this.options.logLevel));
  }

  // ── Installation ────────────────────────────────────────────────

  /**
   * Install a plugin at the next slot. Calls `init` immediately; the
   * returned startup effect must be executed by the host.
   */
  install<M, S extends object, O>(plugin: Plugin<M, S, O>): Installed<M, O, S> {
    const handle = PluginHandle.create<M, O, S>(this.slots.length, plugin.manifest.name, this.fanout);
    const startup = this.attach(plugin, handle);
    return { handle, startup };
  }

  /**
   * Install a plugin under a handle created ahead of time. The handle must
   * address the next free slot and share this registry's fanout.
   * Used by RegistryBuilder.
   */
  attach<M, S extends object, O>(plugin: Plugin<M, S, O>, handle: PluginHandle<M, O, S>): Effect<Envelope> {
    assertValidPlugin(plugin);
    const { name } = plugin.manifest;

    if (handle.index !== this.slots.length) {
      throw new PluginRuntimeError(
        "E_SLOT_ORDER",
        `Handle for "${name}" addresses slot ${handle.index}, but the next free slot is ${this.slots.length}.`,
        { name, expected: this.slots.length, actual: handle.index },
      );
    }

    if (!handle.publishesTo(this.fanout)) {
      throw new PluginRuntimeError(
        "E_FANOUT_MISMATCH",
        `Handle for "${name}" listens on a different output fanout than this registry.`,
        { name },
      );
    }

    const existing = this.slots.find((slot) => slot.name === name);
    if (existing) {
      throw new DuplicatePluginError(name, existing.index);
    }

    const index = handle.index;
    const { state, effect } = plugin.init();
    const address = (message: M) => handle.message(message);

    this.slots.push({
      index,
      name,
      messageTag: handle.messageTag,
      outputTag: handle.outputTag,
      stateCell: handle.stateTag.seal({}, state),
      route: (envelope) => {
        const opened = openEnvelope(handle.messageTag, envelope);
        if (!opened) return undefined;

        const result = plugin.update(state, opened.value);
        const output = result.output;
        return {
          effect: result.effect ? result.effect.map(address) : Effect.none(),
          output: output !== undefined ? wrapOutput(handle.outputTag, index, output) : undefined,
        };
      },
      subscribe: () => plugin.subscribe(state).map(address, `slot:${index}`),
      readState: () => state,
    });

    this.log.info(`Installed plugin: ${name} at slot ${index}`);
    return effect ? effect.map(address) : Effect.none();
  }

  // ── Routing ─────────────────────────────────────────────────────

  /**
   * Deliver one envelope to its slot. Mismatched or unaddressable
   * envelopes produce a no-op result.
   */
  route(envelope: Envelope): RouteResult {
    const slot = Number.isInteger(envelope.slot) ? this.slots[envelope.slot] : undefined;
    if (!slot) {
      return this.drop(envelope, `no plugin is installed at slot ${envelope.slot}`);
    }

    if (envelope.tag !== slot.messageTag) {
      return this.drop(
        envelope,
        `tag ${describeTag(envelope.tag)} does not match ${describeTag(slot.messageTag)} of "${slot.name}"`,
      );
    }

    const result = slot.route(envelope);
    if (!result) {
      return this.drop(envelope, `payload is not sealed by ${describeTag(slot.messageTag)}`);
    }
    return result;
  }

  /**
   * Route an envelope and publish its output to the fanout. This is the
   * single entry point a host forwards plugin envelopes into.
   */
  update(envelope: Envelope): Effect<Envelope> {
    const { effect, output } = this.route(envelope);
    if (output) {
      this.fanout.publish(output.slot, output);
    }
    return effect;
  }

  /**
   * Every slot's subscription, addressed to its slot and merged. The slot
   * index is part of each recipe's identity, so calling this again with
   * unchanged state yields the same identities.
   */
  subscriptions(): EventSource<Envelope> {
    return EventSource.batch(this.slots.map((slot) => slot.subscribe()));
  }

  // ── Lookup ──────────────────────────────────────────────────────

  /** Current state of the plugin behind `handle` */
  state<M, O, S extends object>(handle: PluginHandle<M, O, S>): Readonly<S> | undefined {
    return this.openState(handle);
  }

  /**
   * Run `fn` with exclusive access to the state behind `handle`, outside
   * the message path. Returns undefined if the handle belongs elsewhere.
   */
  withState<M, O, S extends object, R>(handle: PluginHandle<M, O, S>, fn: (state: S) => R): R | undefined {
    const state = this.openState(handle);
    return state === undefined ? undefined : fn(state);
  }

  /** Erased state of the plugin called `name` */
  stateByName(name: string): unknown {
    return this.slots.find((slot) => slot.name === name)?.readState();
  }

  has(name: string): boolean {
    return this.slots.some((slot) => slot.name === name);
  }

  pluginCount(): number {
    return this.slots.length;
  }

  /** Installed plugin names in slot order */
  pluginNames(): readonly string[] {
    return this.slots.map((slot) => slot.name);
  }

  slotInfo(): readonly SlotInfo[] {
    return this.slots.map((slot) => ({
      index: slot.index,
      name: slot.name,
      messageTag: describeTag(slot.messageTag),
      outputTag: describeTag(slot.outputTag),
    }));
  }

  // ── Internal ────────────────────────────────────────────────────

  private openState<M, O, S extends object>(handle: PluginHandle<M, O, S>): S | undefined {
    const slot = this.slots[handle.index];
    return slot ? handle.stateTag.open(slot.stateCell)?.value : undefined;
  }

  private drop(envelope: Envelope, reason: string): RouteResult {
    if (this.options.strictRouting) {
      throw new RoutingError(`Cannot route ${envelope.describe()}: ${reason}`, {
        slot: envelope.slot,
        tag: describeTag(envelope.tag),
      });
    }
    this.log.debug(`Dropped ${envelope.describe()}: ${reason}`);
    return { effect: Effect.none() };
  }
}
