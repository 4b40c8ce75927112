/**
 * Output Fanout
 *
 * Shared registry of listener channels keyed by plugin slot. The registry
 * publishes each output a plugin emits; every live channel registered under
 * that slot receives it. A registration is dropped the first time a send to
 * it fails, so cancelling a listener only requires closing its receiver.
 *
 * All calls arrive on the event loop, which gives the single-writer
 * guarantee the listener map needs.
 */

import type { Logger } from "../plugins/api.js";
import { createChannel, type Receiver, type Sender } from "./channel.js";
import type { OutputEnvelope } from "./envelope.js";
import { createLogger } from "./logger.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface ListenerRegistration {
  readonly id: number;
  readonly slot: number;
  readonly sender: Sender<OutputEnvelope>;
}

export interface Listener {
  readonly id: number;
  readonly receiver: Receiver<OutputEnvelope>;
}

// ─── Implementation ─────────────────────────────────────────────────

export class OutputFanout {
  private readonly listeners = new Map<number, ListenerRegistration[]>();
  private nextId = 0;

  constructor(private readonly log: Logger = createLogger("fanout", "warn")) {}

  /** Open a new channel for outputs of `slot` */
  register(slot: number): Listener {
    const { sender, receiver } = createChannel<OutputEnvelope>();
    const registration: ListenerRegistration = { id: ++this.nextId, slot, sender };

    const list = this.listeners.get(slot);
    if (list) list.push(registration);
    else this.listeners.set(slot, [registration]);

    this.log.debug(`Listener ${registration.id} registered on slot ${slot}`);
    return { id: registration.id, receiver };
  }

  /**
   * Deliver `output` to every live listener of `slot`, pruning the ones
   * whose receiver is gone. Returns the number of listeners reached.
   */
  publish(slot: number, output: OutputEnvelope): number {
    const list = this.listeners.get(slot);
    if (!list) return 0;

    const live = list.filter((registration) => {
      if (registration.sender.send(output)) return true;
      this.log.debug(`Pruned listener ${registration.id} on slot ${slot}`);
      return false;
    });

    if (live.length > 0) this.listeners.set(slot, live);
    else this.listeners.delete(slot);

    return live.length;
  }

  /** Registered listeners for one slot, or for every slot */
  listenerCount(slot?: number): number {
    if (slot !== undefined) return this.listeners.get(slot)?.length ?? 0;
    let total = 0;
    for (const list of this.listeners.values()) total += list.length;
    return total;
  }
}
