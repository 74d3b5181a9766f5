import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import type { ModuleContext } from "@sovereign/shared";
import { createMemoryModule, MemoryStore, MEMORY_MODULE_ID, resolveStoreOptions } from "../index.js";

function contextWith(config: Record<string, string>): ModuleContext {
  return {
    moduleId: MEMORY_MODULE_ID,
    getConfig: (key) => config[key],
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("sovereign-memory module", () => {
  let tmpDir: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    tmpDir = mkdtempSync(join(tmpdir(), "sovereign-memory-module-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("resolveStoreOptions", () => {
    it("reads the database path and numeric settings from config", () => {
      const options = resolveStoreOptions(
        contextWith({
          db_path: "/var/lib/memory/custom.db",
          max_memories: "50",
          busy_timeout_ms: "250",
          encryption_key: "test-secret",
        }),
      );

      expect(options).toEqual({
        dbPath: "/var/lib/memory/custom.db",
        maxEntries: 50,
        busyTimeoutMs: 250,
        encryptionKey: "test-secret",
        moduleId: MEMORY_MODULE_ID,
      });
    });

    it("falls back to defaults for missing or unparsable values", () => {
      const options = resolveStoreOptions(contextWith({ max_memories: "lots" }));

      expect(options.dbPath).toBe(resolve("./data/modules", MEMORY_MODULE_ID, "memory.db"));
      expect(options.maxEntries).toBe(200);
      expect(options.busyTimeoutMs).toBe(5000);
      expect(options.encryptionKey).toBeUndefined();
    });
  });

  it("declares its manifest and tools", () => {
    const definition = createMemoryModule();
    expect(definition.manifest.id).toBe("sovereign-memory");
    expect(definition.tools?.map((t) => t.name)).toEqual(["remember", "recall", "forget", "forget_all"]);
    expect(definition.configSchema?.db_path.type).toBe("string");
  });

  it("builds its store from config on load without touching disk", async () => {
    const dbPath = join(tmpDir, "memory.db");
    const ctx = contextWith({ db_path: dbPath });
    const definition = createMemoryModule();

    await definition.onLoad?.(ctx);
    expect(ctx.log).toHaveBeenCalledWith(`Memory database: ${dbPath} (max 200 entries)`);
    expect(existsSync(dbPath)).toBe(false);

    const remember = definition.tools?.find((t) => t.name === "remember");
    expect(await remember?.execute({ topic: "comm_style", content: "terse" }, ctx)).toBe(
      "Stored memory **[comm_style]**: terse",
    );
    expect(existsSync(dbPath)).toBe(true);

    await definition.onUnload?.(ctx);
  });

  it("shares an injected store between all tools", async () => {
    const store = new MemoryStore({ dbPath: join(tmpDir, "injected.db") });
    const ctx = contextWith({});
    const definition = createMemoryModule(store);
    const tool = (name: string) => definition.tools?.find((t) => t.name === name);

    await tool("remember")?.execute({ topic: "tech_stack", content: "Go, Postgres" }, ctx);
    await tool("remember")?.execute({ topic: "tech_stack", content: "Go, Postgres, Redis" }, ctx);

    expect(store.recall("tech").map((e) => e.content)).toEqual(["Go, Postgres, Redis"]);
    expect(await tool("forget")?.execute({ topic: "tech_stack" }, ctx)).toBe("Forgotten: **[tech_stack]**");
    expect(store.count()).toBe(0);

    await definition.onUnload?.(ctx);
  });
});
