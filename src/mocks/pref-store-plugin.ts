/**
 * Mock: Preference Store Plugin
 *
 * Grouped key-value preferences held in memory and written through to a
 * pluggable backend. Backend calls run as effects and come back as
 * Result-carrying messages; failures surface as `error` outputs.
 *
 * Values are stored as JSON text. `decodePref` reads one back through a
 * zod schema.
 */

import type { z } from "zod";
import { Effect, type Result } from "../core/effect.js";
import { ManifestBuilder, BasePlugin } from "../sdk/plugin-sdk.js";
import type { Init, PluginManifest, Update } from "../plugins/api.js";

// ─── Types ──────────────────────────────────────────────────────────

export type PrefGroup = Record<string, string>;

/** Where groups are persisted */
export interface PrefBackend {
  load(group: string): Promise<PrefGroup>;
  /** Write one key; `undefined` removes it */
  write(group: string, key: string, value: string | undefined): Promise<void>;
}

export type PrefMessage =
  | { readonly type: "set"; readonly group: string; readonly key: string; readonly value: string }
  | { readonly type: "get"; readonly group: string; readonly key: string }
  | { readonly type: "delete"; readonly group: string; readonly key: string }
  | { readonly type: "loaded"; readonly group: string; readonly key: string; readonly result: Result<PrefGroup> }
  | {
      readonly type: "saved";
      readonly group: string;
      readonly key: string;
      readonly change: "set" | "delete";
      readonly result: Result<void>;
    };

export type PrefOutput =
  | { readonly type: "set"; readonly group: string; readonly key: string }
  | { readonly type: "value"; readonly group: string; readonly key: string; readonly value: string }
  | { readonly type: "not-found"; readonly group: string; readonly key: string }
  | { readonly type: "deleted"; readonly group: string; readonly key: string }
  | { readonly type: "error"; readonly message: string };

export interface PrefStoreState {
  readonly groups: Map<string, Map<string, string>>;
  /** Groups read from the backend during this session */
  readonly loaded: Set<string>;
  /** Keys deleted from groups whose load has not completed */
  readonly pendingDeletes: Map<string, Set<string>>;
  pendingWrites: number;
}

// ─── Message Helpers ────────────────────────────────────────────────

/** JSON text for `value`; an empty string when it has no JSON form */
export function encodePref(value: unknown): string {
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return "";
  }
}

export const PrefMessages = {
  set(group: string, key: string, value: unknown): PrefMessage {
    return { type: "set", group, key, value: encodePref(value) };
  },
  get(group: string, key: string): PrefMessage {
    return { type: "get", group, key };
  },
  delete(group: string, key: string): PrefMessage {
    return { type: "delete", group, key };
  },
};

/** Parse a `value` output with `schema`; undefined for any other output */
export function decodePref<T>(output: PrefOutput, schema: z.ZodType<T>): T | undefined {
  if (output.type !== "value") return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(output.value);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

// ─── Backend ────────────────────────────────────────────────────────

export class MemoryPrefBackend implements PrefBackend {
  readonly saved = new Map<string, PrefGroup>();

  async load(group: string): Promise<PrefGroup> {
    return { ...(this.saved.get(group) ?? {}) };
  }

  async write(group: string, key: string, value: string | undefined): Promise<void> {
    const entries = { ...(this.saved.get(group) ?? {}) };
    if (value === undefined) delete entries[key];
    else entries[key] = value;
    this.saved.set(group, entries);
  }
}

// ─── Plugin ─────────────────────────────────────────────────────────

export class PrefStorePlugin extends BasePlugin<PrefMessage, PrefStoreState, PrefOutput> {
  readonly manifest: PluginManifest = ManifestBuilder.create("pref-store")
    .version("0.1.0")
    .description("Grouped key-value preferences")
    .build();

  constructor(private readonly backend: PrefBackend = new MemoryPrefBackend()) {
    super();
  }

  init(): Init<PrefStoreState, PrefMessage> {
    return { state: { groups: new Map(), loaded: new Set(), pendingDeletes: new Map(), pendingWrites: 0 } };
  }

  update(state: PrefStoreState, message: PrefMessage): Update<PrefMessage, PrefOutput> {
    switch (message.type) {
      case "set": {
        this.group(state, message.group).set(message.key, message.value);
        state.pendingDeletes.get(message.group)?.delete(message.key);
        return this.then(this.persist(state, message.group, message.key, message.value));
      }

      case "delete": {
        const removed = state.groups.get(message.group)?.delete(message.key) ?? false;
        if (!removed && state.loaded.has(message.group)) {
          return this.emit({ type: "not-found", group: message.group, key: message.key });
        }
        if (!state.loaded.has(message.group)) {
          this.tombstones(state, message.group).add(message.key);
        }
        return this.then(this.persist(state, message.group, message.key, undefined));
      }

      case "get": {
        if (state.loaded.has(message.group)) {
          return this.emit(this.lookup(state, message.group, message.key));
        }
        const { group, key } = message;
        return this.then(
          Effect.attempt(
            () => this.backend.load(group),
            (result): PrefMessage => ({ type: "loaded", group, key, result }),
          ),
        );
      }

      case "loaded": {
        if (!message.result.ok) {
          return this.emit({ type: "error", message: `Failed to load "${message.group}": ${message.result.error.message}` });
        }
        // Only the first completed load merges; later ones are stale.
        if (!state.loaded.has(message.group)) {
          const group = this.group(state, message.group);
          const deleted = state.pendingDeletes.get(message.group);
          for (const [key, value] of Object.entries(message.result.value)) {
            // Writes and deletes made in memory before the load completed win.
            if (!group.has(key) && !deleted?.has(key)) group.set(key, value);
          }
          state.pendingDeletes.delete(message.group);
          state.loaded.add(message.group);
        }
        return this.emit(this.lookup(state, message.group, message.key));
      }

      case "saved": {
        state.pendingWrites -= 1;
        if (!message.result.ok) {
          return this.emit({ type: "error", message: `Failed to save "${message.group}": ${message.result.error.message}` });
        }
        return this.emit(
          message.change === "set"
            ? { type: "set", group: message.group, key: message.key }
            : { type: "deleted", group: message.group, key: message.key },
        );
      }
    }
  }

  private group(state: PrefStoreState, name: string): Map<string, string> {
    let group = state.groups.get(name);
    if (!group) {
      group = new Map();
      state.groups.set(name, group);
    }
    return group;
  }

  private tombstones(state: PrefStoreState, group: string): Set<string> {
    let keys = state.pendingDeletes.get(group);
    if (!keys) {
      keys = new Set();
      state.pendingDeletes.set(group, keys);
    }
    return keys;
  }

  private lookup(state: PrefStoreState, group: string, key: string): PrefOutput {
    const value = state.groups.get(group)?.get(key);
    return value === undefined ? { type: "not-found", group, key } : { type: "value", group, key, value };
  }

  private persist(state: PrefStoreState, group: string, key: string, value: string | undefined): Effect<PrefMessage> {
    const change = value === undefined ? "delete" : "set";
    state.pendingWrites += 1;
    return Effect.attempt(
      () => this.backend.write(group, key, value),
      (result): PrefMessage => ({ type: "saved", group, key, change, result }),
    );
  }
}

export const createPrefStorePlugin = (backend?: PrefBackend) => new PrefStorePlugin(backend);
