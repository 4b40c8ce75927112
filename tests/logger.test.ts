import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "../src/core/logger.js";
import {
  BuilderConsumedError,
  DuplicatePluginError,
  PluginRuntimeError,
  RoutingError,
  RuntimeStoppedError,
  toError,
} from "../src/core/errors.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    createLogger("registry").info("Installed plugin: counter at slot 0");

    expect(info).toHaveBeenCalledWith("[registry]", "Installed plugin: counter at slot 0");
  });

  it("passes structured data along", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("runtime").error("Runtime failed", { error: "boom" });

    expect(error).toHaveBeenCalledWith("[runtime]", "Runtime failed", { error: "boom" });
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = createLogger("fanout", "warn");

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("silent drops everything", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("quiet", "silent").error("hidden");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("errors", () => {
  it("carry stable codes", () => {
    expect(new DuplicatePluginError("counter", 0).code).toBe("E_PLUGIN_DUPLICATE");
    expect(new RoutingError("mismatch", { slot: 1 }).code).toBe("E_ROUTING_MISMATCH");
    expect(new BuilderConsumedError().code).toBe("E_BUILDER_CONSUMED");
    expect(new RuntimeStoppedError("failed").details).toEqual({ status: "failed" });
  });

  it("share a common base class", () => {
    const err = new DuplicatePluginError("counter", 2);
    expect(err).toBeInstanceOf(PluginRuntimeError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("DuplicatePluginError");
  });

  it("toError wraps thrown non-errors", () => {
    const original = new Error("kept");
    expect(toError(original)).toBe(original);
    expect(toError("text").message).toBe("text");
  });
});
