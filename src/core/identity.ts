/**
 * Subscription identities
 *
 * Hosts compare subscriptions across ticks by identity string. Closures are
 * rebuilt on every call to `subscribe`, so a function's identity is derived
 * from its source text rather than its reference: the same mapper or filter
 * written at the same place yields the same identity on every tick.
 * Closures that differ only in captured values collide. The runtime still
 * runs each of them, telling them apart by position, so mappers and filters
 * that capture state should pass an explicit key to keep a stable identity.
 */

import { createHash } from "node:crypto";

const cache = new WeakMap<object, string>();

export function functionIdentity(fn: (...args: never[]) => unknown): string {
  const cached = cache.get(fn);
  if (cached !== undefined) return cached;

  const id = createHash("sha1").update(fn.toString()).digest("hex").slice(0, 12);
  cache.set(fn, id);
  return id;
}
