import { describe, it, expect } from "vitest";
import { RegistryBuilder } from "../src/core/builder.js";
import { BuilderConsumedError } from "../src/core/errors.js";
import { createCounterPlugin, type CounterOutput } from "../src/mocks/counter-plugin.js";
import { createGreeterPlugin, type GreeterOutput } from "../src/mocks/greeter-plugin.js";
import { createTickerPlugin } from "../src/mocks/ticker-plugin.js";
import { flush, spawnAll } from "./support/helpers.js";

describe("RegistryBuilder", () => {
  it("reserves slots in install order", () => {
    const builder = new RegistryBuilder();
    const counter = builder.install(createCounterPlugin());
    builder.withPlugin(createTickerPlugin());
    const greeter = builder.install(createGreeterPlugin());

    expect(counter.index).toBe(0);
    expect(greeter.index).toBe(2);
    expect(builder.size).toBe(3);
  });

  it("installs nothing until build", () => {
    const builder = new RegistryBuilder();
    builder.withPlugin(createCounterPlugin()).withPlugin(createTickerPlugin());

    const { registry } = builder.build();
    expect(registry.pluginNames()).toEqual(["counter", "ticker"]);
  });

  it("handles work against the built registry", () => {
    const builder = new RegistryBuilder();
    const counter = builder.install(createCounterPlugin());
    const { registry } = builder.build();

    registry.update(counter.message({ type: "add", amount: 2 }));
    expect(registry.state(counter)?.value).toBe(2);
  });

  it("handles share the registry's output fanout", async () => {
    const builder = new RegistryBuilder();
    const counter = builder.install(createCounterPlugin());
    const { registry } = builder.build();
    const outputs: CounterOutput[] = [];
    const listener = spawnAll(counter.listen(), (output) => outputs.push(output));

    registry.update(counter.message({ type: "increment" }));
    await flush();
    await listener.stop();

    expect(outputs).toEqual([{ type: "changed", value: 1 }]);
  });

  it("batches startup effects and their results reach the plugin", async () => {
    const builder = new RegistryBuilder();
    builder.withPlugin(createCounterPlugin());
    const greeter = builder.install(createGreeterPlugin(async () => "good morning"));
    const { registry, startup } = builder.build();

    expect(startup.size).toBe(1);
    expect(registry.state(greeter)).toEqual({ greeting: undefined, received: 0 });

    const outputs: GreeterOutput[] = [];
    const listener = spawnAll(greeter.listen(), (output) => outputs.push(output));
    await startup.execute((envelope) => registry.update(envelope));
    await flush();
    await listener.stop();

    expect(registry.state(greeter)).toEqual({ greeting: "good morning", received: 1 });
    expect(outputs).toEqual([{ type: "ready", greeting: "good morning" }]);
  });

  it("builds only once", () => {
    const builder = new RegistryBuilder();
    builder.withPlugin(createCounterPlugin());
    builder.build();

    expect(() => builder.build()).toThrow(BuilderConsumedError);
    expect(() => builder.install(createTickerPlugin())).toThrow("RegistryBuilder.build() has already been called.");
  });

  it("surfaces duplicate names at build time", () => {
    const builder = new RegistryBuilder();
    builder.withPlugin(createCounterPlugin()).withPlugin(createCounterPlugin());

    expect(() => builder.build()).toThrow(/already installed at slot 0/);
  });
});
