/**
 * Event Sources
 *
 * An EventSource describes zero or more live streams of values. It is a
 * list of recipes, each with a string identity: the host keeps one running
 * instance per identity and compares the recipes it gets on every tick with
 * the ones already running, so re-subscribing with an equivalent source
 * does not restart anything.
 */

import type { Emit } from "./effect.js";
import { functionIdentity } from "./identity.js";
import { pump, untilAborted } from "./signals.js";

// ─── Types ──────────────────────────────────────────────────────────

/** One stream the host can start and stop */
export interface Recipe<T> {
  /** Stable identity used to de-duplicate across ticks */
  readonly id: string;
  /** Start producing values. Resolves once the stream ends or `signal` aborts. */
  spawn(emit: Emit<T>, signal: AbortSignal): Promise<void>;
}

// ─── Implementation ─────────────────────────────────────────────────

export class EventSource<T> {
  private constructor(private readonly entries: readonly Recipe<T>[]) {}

  static none<T>(): EventSource<T> {
    return new EventSource<T>([]);
  }

  /** Wrap a single recipe */
  static from<T>(recipe: Recipe<T>): EventSource<T> {
    return new EventSource<T>([recipe]);
  }

  /**
   * A stream driven by an async iterable. `id` must describe the stream
   * fully: two calls with the same id are treated as the same stream.
   */
  static run<T>(id: string, factory: (signal: AbortSignal) => AsyncIterable<T>): EventSource<T> {
    return EventSource.from({
      id,
      spawn: (emit, signal) => pump(factory(signal), emit, signal),
    });
  }

  /** Emit the current time every `intervalMs` milliseconds */
  static every(intervalMs: number): EventSource<Date> {
    return EventSource.from({
      id: `every:${intervalMs}`,
      spawn: (emit, signal) => {
        const timer = setInterval(() => emit(new Date()), intervalMs);
        return untilAborted(signal).then(() => clearInterval(timer));
      },
    });
  }

  /** Merge sources. Every recipe stays live concurrently. */
  static batch<T>(sources: Iterable<EventSource<T>>): EventSource<T> {
    const entries: Recipe<T>[] = [];
    for (const source of sources) {
      entries.push(...source.entries);
    }
    return new EventSource<T>(entries);
  }

  /**
   * Translate every value. The mapper becomes part of each recipe's
   * identity: `key` when given, otherwise the mapper's source text.
   */
  map<U>(fn: (value: T) => U, key?: string): EventSource<U> {
    const suffix = key ?? functionIdentity(fn);
    return new EventSource<U>(
      this.entries.map((recipe) => ({
        id: `${recipe.id}>${suffix}`,
        spawn: (emit: Emit<U>, signal: AbortSignal) => recipe.spawn((value) => emit(fn(value)), signal),
      })),
    );
  }

  recipes(): readonly Recipe<T>[] {
    return this.entries;
  }

  ids(): string[] {
    return this.entries.map((recipe) => recipe.id);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }
}
