/**
 * Mock: Ticker Plugin
 *
 * Counts timer ticks while running. Its subscription depends on state:
 * pausing removes the timer from the subscription set.
 */

import { EventSource } from "../core/event-source.js";
import { ManifestBuilder, BasePlugin } from "../sdk/plugin-sdk.js";
import type { Init, PluginManifest, Update } from "../plugins/api.js";

export type TickerMessage =
  | { readonly type: "tick" }
  | { readonly type: "pause" }
  | { readonly type: "resume" };

export interface TickerState {
  ticks: number;
  running: boolean;
}

export type TickerOutput = { readonly type: "ticked"; readonly ticks: number };

export class TickerPlugin extends BasePlugin<TickerMessage, TickerState, TickerOutput> {
  readonly manifest: PluginManifest = ManifestBuilder.create("ticker")
    .version("0.1.0")
    .description("Counts timer ticks")
    .build();

  constructor(private readonly intervalMs = 1000) {
    super();
  }

  init(): Init<TickerState, TickerMessage> {
    return { state: { ticks: 0, running: true } };
  }

  update(state: TickerState, message: TickerMessage): Update<TickerMessage, TickerOutput> {
    switch (message.type) {
      case "tick":
        state.ticks += 1;
        return this.emit({ type: "ticked", ticks: state.ticks });
      case "pause":
        state.running = false;
        return this.none();
      case "resume":
        state.running = true;
        return this.none();
    }
  }

  subscribe(state: Readonly<TickerState>): EventSource<TickerMessage> {
    if (!state.running) return EventSource.none();
    return EventSource.every(this.intervalMs).map((): TickerMessage => ({ type: "tick" }), "tick");
  }
}

export const createTickerPlugin = (intervalMs?: number) => new TickerPlugin(intervalMs);
