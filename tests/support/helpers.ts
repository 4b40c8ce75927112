import type { Envelope } from "../../src/core/envelope.js";
import type { EventSource } from "../../src/core/event-source.js";
import type { PluginRegistry } from "../../src/core/registry.js";

/** Let pending microtasks and I/O callbacks run */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/** Start every recipe of `source`; `stop` aborts them and waits */
export function spawnAll<T>(source: EventSource<T>, emit: (value: T) => void): { stop(): Promise<void> } {
  const controller = new AbortController();
  const running = source.recipes().map((recipe) => recipe.spawn(emit, controller.signal));
  return {
    async stop() {
      controller.abort();
      await Promise.all(running);
    },
  };
}

/** Route `envelope` and every envelope its effects produce, depth first */
export async function settle(registry: PluginRegistry, envelope: Envelope): Promise<void> {
  const follow: Envelope[] = [];
  await registry.update(envelope).execute((next) => follow.push(next));
  for (const next of follow) {
    await settle(registry, next);
  }
}
