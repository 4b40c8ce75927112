/**
 * Effects
 *
 * An Effect describes asynchronous work and how its results become
 * messages. Plugins return effects from `init` and `update`; nothing runs
 * until the host calls `execute`. Every unit of an effect runs concurrently
 * and reports back only through `emit`.
 *
 * Cancellation is cooperative: units receive an AbortSignal, and once the
 * signal aborts no further message is emitted.
 */

import { toError } from "./errors.js";
import { linkSignals, pump } from "./signals.js";

// ─── Types ──────────────────────────────────────────────────────────

export type Emit<M> = (message: M) => void;

type EffectUnit<M> = (emit: Emit<M>, signal: AbortSignal) => Promise<void>;

/** Outcome of fallible work, delivered as ordinary data */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

/** Cancels the effect returned alongside it by `Effect.abortable` */
export interface AbortHandle {
  abort(): void;
  readonly aborted: boolean;
}

// ─── Implementation ─────────────────────────────────────────────────

export class Effect<M> {
  private constructor(private readonly units: readonly EffectUnit<M>[]) {}

  /** An effect that does nothing */
  static none<M>(): Effect<M> {
    return new Effect<M>([]);
  }

  /** Emit `message` as soon as the effect runs */
  static done<M>(message: M): Effect<M> {
    return new Effect<M>([
      async (emit) => {
        emit(message);
      },
    ]);
  }

  /**
   * Run `work` and turn its value into a message. A rejection propagates
   * to whoever executes the effect; use `attempt` for work that may fail.
   */
  static perform<T, M>(
    work: (signal: AbortSignal) => Promise<T>,
    toMessage: (value: T) => M,
  ): Effect<M> {
    return new Effect<M>([
      (emit, signal) =>
        work(signal).then((value) => {
          if (!signal.aborted) emit(toMessage(value));
        }),
    ]);
  }

  /** Run `work` and deliver its success or failure as a Result */
  static attempt<T, M>(
    work: (signal: AbortSignal) => Promise<T>,
    toMessage: (result: Result<T>) => M,
  ): Effect<M> {
    return Effect.perform(
      (signal) =>
        work(signal).then(
          (value): Result<T> => ({ ok: true, value }),
          (error: unknown): Result<T> => ({ ok: false, error: toError(error) }),
        ),
      toMessage,
    );
  }

  /** Emit one message per value the source yields */
  static stream<T, M>(
    source: (signal: AbortSignal) => AsyncIterable<T>,
    toMessage: (value: T) => M,
  ): Effect<M> {
    return new Effect<M>([(emit, signal) => pump(source(signal), (value) => emit(toMessage(value)), signal)]);
  }

  /** Run every effect concurrently */
  static batch<M>(effects: Iterable<Effect<M>>): Effect<M> {
    const units: EffectUnit<M>[] = [];
    for (const effect of effects) {
      units.push(...effect.units);
    }
    return new Effect<M>(units);
  }

  /** Translate every message this effect emits */
  map<N>(fn: (message: M) => N): Effect<N> {
    return new Effect<N>(
      this.units.map((unit): EffectUnit<N> => (emit, signal) => unit((message) => emit(fn(message)), signal)),
    );
  }

  /**
   * Make this effect cancellable. Aborting the handle aborts the signal
   * every unit sees and suppresses any message produced afterwards.
   */
  abortable(): [Effect<M>, AbortHandle] {
    const controller = new AbortController();
    const effect = new Effect<M>(
      this.units.map((unit): EffectUnit<M> => (emit, signal) => {
        const linked = linkSignals(signal, controller.signal);
        return unit((message) => {
          if (!linked.signal.aborted) emit(message);
        }, linked.signal).finally(linked.dispose);
      }),
    );

    const handle: AbortHandle = {
      abort: () => controller.abort(),
      get aborted() {
        return controller.signal.aborted;
      },
    };
    return [effect, handle];
  }

  /** True when executing this effect would do nothing */
  get isNone(): boolean {
    return this.units.length === 0;
  }

  /** Number of concurrent units */
  get size(): number {
    return this.units.length;
  }

  /**
   * Run every unit. Resolves when all units settle; rejects with the first
   * failure.
   */
  async execute(emit: Emit<M>, signal: AbortSignal = new AbortController().signal): Promise<void> {
    const guarded: Emit<M> = (message) => {
      if (!signal.aborted) emit(message);
    };
    await Promise.all(this.units.map((unit) => unit(guarded, signal)));
  }
}
