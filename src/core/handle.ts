/**
 * Plugin Handle
 *
 * Typed capability bound to one plugin slot. A handle builds envelopes
 * addressed to its slot and opens subscriptions to the slot's outputs. It
 * never holds plugin state: state changes only through the registry.
 */

import { Effect } from "./effect.js";
import { openEnvelope, wrapMessage, type Envelope } from "./envelope.js";
import { EventSource } from "./event-source.js";
import { functionIdentity } from "./identity.js";
import type { OutputFanout } from "./output-fanout.js";
import { TypeTag } from "./type-tag.js";

export class PluginHandle<M, O, S extends object> {
  private constructor(
    /** Slot index, fixed at install time */
    readonly index: number,
    readonly name: string,
    readonly messageTag: TypeTag<M>,
    readonly outputTag: TypeTag<O>,
    readonly stateTag: TypeTag<S>,
    private readonly fanout: OutputFanout,
  ) {}

  /** Mint fresh tags for a new slot */
  static create<M, O, S extends object>(index: number, name: string, fanout: OutputFanout): PluginHandle<M, O, S> {
    return new PluginHandle<M, O, S>(
      index,
      name,
      new TypeTag<M>(`${name}.message`),
      new TypeTag<O>(`${name}.output`),
      new TypeTag<S>(`${name}.state`),
      fanout,
    );
  }

  /** True when this handle's listeners register with `fanout` */
  publishesTo(fanout: OutputFanout): boolean {
    return this.fanout === fanout;
  }

  /** Wrap `message` in an envelope addressed to this slot */
  message(message: M): Envelope {
    return wrapMessage(this.messageTag, this.index, message);
  }

  /** An effect that immediately yields the envelope for `message` */
  dispatch(message: M): Effect<Envelope> {
    return Effect.done(this.message(message));
  }

  /** Every output this plugin emits, for as long as the source is live */
  listen(): EventSource<O> {
    return this.subscribe(`fanout:${this.index}:all`, (output) => output);
  }

  /**
   * Outputs passed through `filter`; only results other than `undefined`
   * are forwarded. The filter must be a pure function of its argument.
   * Its identity comes from `key` when given, else from its source text.
   */
  listenWith<R>(filter: (output: O) => R | undefined, key?: string): EventSource<R> {
    return this.subscribe(`fanout:${this.index}:${key ?? functionIdentity(filter)}`, filter);
  }

  private subscribe<R>(id: string, filter: (output: O) => R | undefined): EventSource<R> {
    return EventSource.run(id, (signal) => this.outputs(filter, signal));
  }

  private async *outputs<R>(filter: (output: O) => R | undefined, signal: AbortSignal): AsyncGenerator<R> {
    const { receiver } = this.fanout.register(this.index);
    const close = () => receiver.close();
    signal.addEventListener("abort", close, { once: true });

    try {
      for await (const envelope of receiver) {
        if (envelope.slot !== this.index) continue;
        const opened = openEnvelope(this.outputTag, envelope);
        if (!opened) continue;

        const mapped = filter(opened.value);
        if (mapped !== undefined) yield mapped;
      }
    } finally {
      signal.removeEventListener("abort", close);
      receiver.close();
    }
  }
}
