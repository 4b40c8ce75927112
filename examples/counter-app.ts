/**
 * Example Host: Counter + Ticker
 *
 * A complete host application built on the registry:
 * - one top-level message type with a single `plugin` variant
 * - a counter driven through its handle
 * - a ticker driven by its own timer subscription
 * - a filtered listener on the counter's outputs
 *
 * Usage:
 *   import { runCounterApp } from "./examples/counter-app.js";
 *   await runCounterApp();
 */

import {
  Effect,
  EventSource,
  RegistryBuilder,
  Runtime,
  createLogger,
  type Application,
  type Envelope,
} from "../src/index.js";
import { createCounterPlugin } from "../src/mocks/counter-plugin.js";
import { createTickerPlugin } from "../src/mocks/ticker-plugin.js";

type AppMessage =
  | { readonly type: "plugin"; readonly envelope: Envelope }
  | { readonly type: "milestone"; readonly value: number };

export async function runCounterApp(ticks = 3, intervalMs = 100): Promise<void> {
  const log = createLogger("counter-app");

  const builder = new RegistryBuilder({ logLevel: "info" });
  const counter = builder.install(createCounterPlugin());
  const ticker = builder.install(createTickerPlugin(intervalMs));
  const { registry, startup } = builder.build();

  const toApp = (envelope: Envelope): AppMessage => ({ type: "plugin", envelope });

  const app: Application<AppMessage> = {
    update(message) {
      switch (message.type) {
        case "plugin":
          return registry.update(message.envelope).map(toApp);
        case "milestone":
          log.info(`Counter reached ${message.value}`);
          return Effect.none();
      }
    },
    subscriptions() {
      return EventSource.batch([
        registry.subscriptions().map(toApp, "plugins"),
        counter
          .listenWith((output) => (output.value % 5 === 0 ? output.value : undefined), "multiples-of-five")
          .map((value): AppMessage => ({ type: "milestone", value }), "milestone"),
      ]);
    },
  };

  const runtime = new Runtime(app, { logLevel: "info" });
  runtime.start(startup.map(toApp));

  for (let i = 0; i < 10; i++) {
    runtime.send(toApp(counter.message({ type: "increment" })));
  }

  while ((registry.state(ticker)?.ticks ?? 0) < ticks) {
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }

  log.info(`Counter: ${registry.state(counter)?.value}, ticks: ${registry.state(ticker)?.ticks}`);
  log.info(`Installed plugins: ${registry.pluginNames().join(", ")}`);
  await runtime.shutdown();
}
