/**
 * Envelopes
 *
 * Type-erased, slot-addressed wrappers. An inbound `Envelope` carries a
 * message to the plugin at `slot`; an `OutputEnvelope` carries an output the
 * plugin at `slot` emitted. Payloads are sealed by the tag named in `tag`
 * and are immutable, so one envelope can be handed to any number of
 * listeners.
 */

import { describeTag, type Sealed, type TagIdentity, type TypeTag } from "./type-tag.js";

abstract class SlotEnvelope {
  abstract readonly kind: "message" | "output";

  constructor(
    /** Index of the addressed (or emitting) plugin slot */
    readonly slot: number,
    /** Tag of the payload type */
    readonly tag: TagIdentity,
  ) {}

  describe(): string {
    return `${this.kind} envelope for slot ${this.slot} (${describeTag(this.tag)})`;
  }
}

export class Envelope extends SlotEnvelope {
  readonly kind = "message" as const;
}

export class OutputEnvelope extends SlotEnvelope {
  readonly kind = "output" as const;
}

export function wrapMessage<M>(tag: TypeTag<M>, slot: number, message: M): Envelope {
  return tag.seal(new Envelope(slot, tag), message);
}

export function wrapOutput<O>(tag: TypeTag<O>, slot: number, output: O): OutputEnvelope {
  return tag.seal(new OutputEnvelope(slot, tag), output);
}

/**
 * Open an envelope with the given tag. Returns undefined when the envelope
 * was sealed by a different tag.
 */
export function openEnvelope<T>(tag: TypeTag<T>, envelope: Envelope | OutputEnvelope): Sealed<T> | undefined {
  if (envelope.tag !== tag) return undefined;
  return tag.open(envelope);
}
