/**
 * Mock: Counter Plugin
 *
 * Integer counter. Emits a `changed` output after every message and keeps
 * the order in which it applied messages, for ordering checks.
 */

import { ManifestBuilder, BasePlugin } from "../sdk/plugin-sdk.js";
import type { Init, PluginManifest, Update } from "../plugins/api.js";

export type CounterMessage =
  | { readonly type: "increment" }
  | { readonly type: "decrement" }
  | { readonly type: "add"; readonly amount: number }
  | { readonly type: "reset" };

export interface CounterState {
  value: number;
  readonly applied: CounterMessage["type"][];
}

export type CounterOutput = { readonly type: "changed"; readonly value: number };

export class CounterPlugin extends BasePlugin<CounterMessage, CounterState, CounterOutput> {
  readonly manifest: PluginManifest;

  constructor(name = "counter") {
    super();
    this.manifest = ManifestBuilder.create(name).version("0.1.0").description("Integer counter").build();
  }

  init(): Init<CounterState, CounterMessage> {
    return { state: { value: 0, applied: [] } };
  }

  update(state: CounterState, message: CounterMessage): Update<CounterMessage, CounterOutput> {
    switch (message.type) {
      case "increment":
        state.value += 1;
        break;
      case "decrement":
        state.value -= 1;
        break;
      case "add":
        state.value += message.amount;
        break;
      case "reset":
        state.value = 0;
        break;
    }
    state.applied.push(message.type);
    return this.emit({ type: "changed", value: state.value });
  }
}

export const createCounterPlugin = (name?: string) => new CounterPlugin(name);
