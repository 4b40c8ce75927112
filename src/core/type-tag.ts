/**
 * Runtime type tags
 *
 * Types do not survive compilation, so every plugin slot mints its own tags
 * at install time. A tag seals values into carrier objects and only the tag
 * that sealed a carrier can open it again: the tag check and the typed read
 * are the same operation, and no cast is ever needed to restore a type.
 */

/** The erased view of a tag, used for comparisons and diagnostics */
export interface TagIdentity {
  readonly id: number;
  readonly label: string;
}

/** A value recovered from a carrier */
export interface Sealed<T> {
  readonly value: T;
}

let nextTagId = 0;

export class TypeTag<T> implements TagIdentity {
  readonly id = ++nextTagId;
  private readonly sealed = new WeakMap<object, Sealed<T>>();

  constructor(readonly label: string) {}

  /** Attach `value` to `carrier`. Returns the carrier for chaining. */
  seal<C extends object>(carrier: C, value: T): C {
    this.sealed.set(carrier, { value });
    return carrier;
  }

  /** Recover the value this tag sealed into `carrier`, if any */
  open(carrier: object): Sealed<T> | undefined {
    return this.sealed.get(carrier);
  }

  toString(): string {
    return describeTag(this);
  }
}

export function describeTag(tag: TagIdentity): string {
  return `${tag.label}#${tag.id}`;
}
