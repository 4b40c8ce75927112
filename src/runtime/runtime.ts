/**
 * Switchboard Runtime
 *
 * Reference host event loop. It does what a GUI framework's runtime does
 * for an application built on the registry:
 *
 *   start → (send → update → run effects → refresh subscriptions)* → shutdown
 *
 * Properties:
 * - Serial: messages are applied one at a time, in arrival order
 * - Effects run concurrently and report back only through new messages
 * - Subscriptions are diffed by identity after every drained batch: new
 *   recipes are spawned, vanished ones aborted, unchanged ones left alone.
 *   Repeated ids within one batch get a positional suffix (`#1`, `#2`)
 * - Fail-stop: an exception from `update`, an effect or a subscription
 *   stops the runtime; there is no per-plugin isolation
 */

import { setImmediate as nextMacrotask } from "node:timers/promises";
import { parseRuntimeOptions, type RuntimeOptionsInput } from "../config/options.js";
import type { Logger } from "../plugins/api.js";
import { Effect } from "../core/effect.js";
import type { Envelope } from "../core/envelope.js";
import { RuntimeStoppedError, toError } from "../core/errors.js";
import type { EventSource, Recipe } from "../core/event-source.js";
import { createLogger } from "../core/logger.js";
import type { PluginRegistry } from "../core/registry.js";

// ─── Types ──────────────────────────────────────────────────────────

/** The two functions a host application supplies */
export interface Application<A> {
  update(message: A): Effect<A>;
  subscriptions(): EventSource<A>;
}

export type RuntimeStatus = "created" | "running" | "stopped" | "failed";

export interface RuntimeStats {
  readonly status: RuntimeStatus;
  readonly processed: number;
  readonly inflightEffects: number;
  readonly subscriptions: number;
}

interface ActiveSubscription {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

// ─── Implementation ─────────────────────────────────────────────────

export class Runtime<A> {
  private readonly queue: A[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private readonly active = new Map<string, ActiveSubscription>();
  private readonly lifetime = new AbortController();
  private readonly log: Logger;
  private status: RuntimeStatus = "created";
  private failure: Error | undefined;
  private draining = false;
  private processed = 0;

  constructor(
    private readonly app: Application<A>,
    options: Pick<RuntimeOptionsInput, "logLevel"> = {},
  ) {
    this.log = createLogger("runtime", parseRuntimeOptions(options).logLevel);
  }

  // ── Public API ──────────────────────────────────────────────────

  /** Run the initial effect and start the first set of subscriptions */
  start(initial: Effect<A> = Effect.none()): void {
    if (this.status !== "created") {
      throw new RuntimeStoppedError(this.status);
    }
    this.status = "running";
    this.log.info("Runtime started");

    this.runEffect(initial);
    this.refreshSubscriptions();
  }

  /** Queue a message and process the queue */
  send(message: A): void {
    if (this.status !== "running") {
      throw this.failure ?? new RuntimeStoppedError(this.status);
    }
    this.queue.push(message);
    this.drain();
  }

  /**
   * Resolves once the queue is empty and no effect is in flight. Rejects
   * with the failure that stopped the runtime, if any. Live subscriptions
   * do not keep the runtime busy.
   */
  async idle(): Promise<void> {
    for (;;) {
      if (this.failure) throw this.failure;

      if (this.inflight.size > 0) {
        await Promise.allSettled([...this.inflight]);
        continue;
      }

      await nextMacrotask();
      if (this.failure) throw this.failure;
      if (this.inflight.size === 0 && this.queue.length === 0) return;
    }
  }

  /** Abort every effect and subscription, then wait for them to settle */
  async shutdown(): Promise<void> {
    if (this.status === "running" || this.status === "created") {
      this.status = "stopped";
    }
    this.abortAll();

    const pending = [...this.inflight, ...[...this.active.values()].map((sub) => sub.done)];
    this.active.clear();
    await Promise.allSettled(pending);
    this.log.info("Runtime stopped");
  }

  /** Identities of the subscriptions currently running */
  activeSubscriptions(): string[] {
    return [...this.active.keys()];
  }

  stats(): RuntimeStats {
    return {
      status: this.status,
      processed: this.processed,
      inflightEffects: this.inflight.size,
      subscriptions: this.active.size,
    };
  }

  // ── Internal ────────────────────────────────────────────────────

  private enqueue(message: A): void {
    if (this.status !== "running") {
      this.log.debug("Dropped message delivered after stop");
      return;
    }
    this.queue.push(message);
    this.drain();
  }

  private drain(): void {
    if (this.draining) return;
    this.draining = true;

    try {
      while (this.queue.length > 0 && this.status === "running") {
        const batch = this.queue.splice(0);
        for (const message of batch) {
          const effect = this.app.update(message);
          this.processed++;
          this.runEffect(effect);
        }
      }
      if (this.status === "running") this.refreshSubscriptions();
    } catch (err) {
      this.fail(err);
    } finally {
      this.draining = false;
    }
  }

  private runEffect(effect: Effect<A>): void {
    if (effect.isNone) return;

    const task: Promise<void> = effect
      .execute((message) => this.enqueue(message), this.lifetime.signal)
      .catch((err: unknown) => this.fail(err))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private refreshSubscriptions(): void {
    const wanted = new Map<string, Recipe<A>>();
    for (const recipe of this.app.subscriptions().recipes()) {
      // Recipes sharing an id in one tick all run, told apart by position.
      let id = recipe.id;
      for (let n = 1; wanted.has(id); n++) id = `${recipe.id}#${n}`;
      wanted.set(id, recipe);
    }

    for (const [id, sub] of this.active) {
      if (wanted.has(id)) continue;
      sub.controller.abort();
      this.active.delete(id);
      this.log.debug(`Subscription stopped: ${id}`);
    }

    for (const [id, recipe] of wanted) {
      if (this.active.has(id)) continue;

      const controller = new AbortController();
      const done = recipe
        .spawn((message) => this.enqueue(message), controller.signal)
        .catch((err: unknown) => this.fail(err));
      this.active.set(id, { controller, done });
      this.log.debug(`Subscription started: ${id}`);
      if (id !== recipe.id) {
        this.log.warn(`Subscription id "${recipe.id}" is shared by several recipes; give each an explicit key`);
      }
    }
  }

  private fail(err: unknown): void {
    if (this.status === "failed") return;

    const error = toError(err);
    if (this.status === "running") {
      this.status = "failed";
      this.failure = error;
      this.log.error("Runtime failed", { error: error.message });
      this.abortAll();
    } else {
      this.log.debug("Error after stop", { error: error.message });
    }
  }

  private abortAll(): void {
    this.lifetime.abort();
    for (const sub of this.active.values()) {
      sub.controller.abort();
    }
  }
}

// ─── Registry Adapter ───────────────────────────────────────────────

/** An application made of nothing but the registry's plugins */
export function pluginApp(registry: PluginRegistry): Application<Envelope> {
  return {
    update: (envelope) => registry.update(envelope),
    subscriptions: () => registry.subscriptions(),
  };
}
