/**
 * Architecture Regression Tests
 *
 * Structural invariants of the package:
 * - Plugin API v1 is frozen (version constant exists)
 * - Core stays free of SDK, mocks and the reference runtime
 * - Plugins reach the registry only through the plugin contract
 * - The only production dependency is zod
 *
 * These tests prevent architectural drift.
 */

import { describe, it, expect } from "vitest";
import { readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const ROOT = fileURLToPath(new URL("..", import.meta.url));
const SRC = join(ROOT, "src");

/** Recursively collect all .ts files under a directory */
function collectFiles(dir: string, ext = ".ts"): string[] {
  const results: string[] = [];
  for (const entry of readdirSync(dir)) {
    const full = join(dir, entry);
    if (statSync(full).isDirectory()) {
      results.push(...collectFiles(full, ext));
    } else if (full.endsWith(ext)) {
      results.push(full);
    }
  }
  return results;
}

function importsOf(file: string): string[] {
  const src = readFileSync(file, "utf-8");
  return [...src.matchAll(/from\s+["']([^"']+)["']/g)].flatMap((match) => (match[1] ? [match[1]] : []));
}

// ─── 1. Plugin API Freeze ───────────────────────────────────────────

describe("Plugin API v1 Freeze", () => {
  it("exports PLUGIN_API_VERSION = 1.0", async () => {
    const api = await import("../src/plugins/api.js");
    expect(api.PLUGIN_API_VERSION).toBe("1.0");
  });

  it("Plugin interface has exactly the required operations", () => {
    const src = readFileSync(join(SRC, "plugins", "api.ts"), "utf-8");
    expect(src).toContain("readonly manifest: PluginManifest");
    expect(src).toContain("init(): Init<S, M>");
    expect(src).toContain("update(state: S, message: M): Update<M, O>");
    expect(src).toContain("subscribe(state: Readonly<S>): EventSource<M>");
  });
});

// ─── 2. Core Boundaries ─────────────────────────────────────────────

describe("Core Boundaries", () => {
  const ALLOWED_CORE_FILES = new Set([
    "builder.ts",
    "channel.ts",
    "effect.ts",
    "envelope.ts",
    "errors.ts",
    "event-source.ts",
    "handle.ts",
    "identity.ts",
    "logger.ts",
    "output-fanout.ts",
    "registry.ts",
    "signals.ts",
    "type-tag.ts",
  ]);

  it("core/ contains only the allowed files", () => {
    const files = readdirSync(join(SRC, "core")).filter((f) => f.endsWith(".ts"));
    expect(new Set(files)).toEqual(ALLOWED_CORE_FILES);
  });

  it("core files do not import from sdk/, mocks/ or runtime/", () => {
    for (const file of collectFiles(join(SRC, "core"))) {
      const rel = relative(SRC, file);
      for (const path of importsOf(file)) {
        expect(path, `${rel} imports ${path}`).not.toMatch(/\/(sdk|mocks|runtime)\//);
      }
    }
  });
});

// ─── 3. Plugin Isolation ────────────────────────────────────────────

describe("Plugin Isolation", () => {
  it("plugins never reach into the registry, builder, fanout or runtime", () => {
    for (const file of collectFiles(join(SRC, "mocks"))) {
      const rel = relative(SRC, file);
      for (const path of importsOf(file)) {
        expect(path, `${rel} imports ${path}`).not.toMatch(/core\/(registry|builder|handle|output-fanout)|runtime\//);
      }
    }
  });

  it("no plugin imports another plugin", () => {
    for (const file of collectFiles(join(SRC, "mocks"))) {
      const rel = relative(SRC, file);
      for (const path of importsOf(file)) {
        expect(path, `${rel} imports ${path}`).not.toMatch(/^\.\/.*-plugin\.js$/);
      }
    }
  });
});

// ─── 4. Dependencies ────────────────────────────────────────────────

describe("Dependencies", () => {
  const packageSchema = z.object({ dependencies: z.record(z.string()).default({}) });

  it("zod is the only production dependency", () => {
    const pkg = packageSchema.parse(JSON.parse(readFileSync(join(ROOT, "package.json"), "utf-8")));
    expect(Object.keys(pkg.dependencies)).toEqual(["zod"]);
  });

  it("no require() calls in source files", () => {
    for (const file of collectFiles(SRC)) {
      const src = readFileSync(file, "utf-8");
      expect(src, `${relative(SRC, file)} uses require()`).not.toMatch(/\brequire\s*\(/);
    }
  });

  it("only imports from node: builtins, zod or relative paths", () => {
    for (const file of collectFiles(SRC)) {
      const rel = relative(SRC, file);
      for (const path of importsOf(file)) {
        const allowed = path.startsWith(".") || path.startsWith("node:") || path === "zod";
        expect(allowed, `${rel} imports external package: ${path}`).toBe(true);
      }
    }
  });
});
