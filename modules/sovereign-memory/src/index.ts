import { resolve } from "node:path";
import {
  defineModule,
  type ModuleContext,
  type ModuleDefinition,
} from "@sovereign/shared";
import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_MAX_ENTRIES,
  MemoryStore,
  type MemoryStoreOptions,
} from "./memory-store.js";
import { createMemoryTools, type StoreResolver } from "./tools.js";

export { MemoryStore, type MemoryStoreOptions } from "./memory-store.js";
export { MemoryStoreError } from "./errors.js";

export const MEMORY_MODULE_ID = "sovereign-memory";

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/** Build store options from the module's configuration. */
export function resolveStoreOptions(ctx: ModuleContext): MemoryStoreOptions {
  return {
    dbPath:
      ctx.getConfig("db_path") ||
      resolve("./data/modules", ctx.moduleId, "memory.db"),
    maxEntries: parseNumber(ctx.getConfig("max_memories"), DEFAULT_MAX_ENTRIES),
    busyTimeoutMs: parseNumber(ctx.getConfig("busy_timeout_ms"), DEFAULT_BUSY_TIMEOUT_MS),
    encryptionKey: ctx.getConfig("encryption_key"),
    moduleId: ctx.moduleId,
  };
}

/**
 * Create the memory module. Every tool shares one store: the injected one,
 * or one built from configuration the first time a tool (or onLoad) needs it.
 */
export function createMemoryModule(injected?: MemoryStore): ModuleDefinition {
  let store: MemoryStore | null = injected ?? null;

  const resolveStore: StoreResolver = (ctx) => {
    if (!store) {
      store = new MemoryStore(resolveStoreOptions(ctx));
    }
    return store;
  };

  return defineModule({
    manifest: {
      id: MEMORY_MODULE_ID,
      name: "Sovereign Memory",
      version: "1.0.0",
      description:
        "Persistent memory across sessions. Store and recall user preferences, context, and insights.",
    },

    configSchema: {
      db_path: {
        type: "string",
        description: "Path to the memory database file",
        required: false,
      },
      max_memories: {
        type: "number",
        description: "Maximum memories stored before the oldest are pruned (10-1000)",
        required: false,
        default: DEFAULT_MAX_ENTRIES,
      },
      busy_timeout_ms: {
        type: "number",
        description: "How long a write waits for a locked database before failing",
        required: false,
        default: DEFAULT_BUSY_TIMEOUT_MS,
      },
      encryption_key: {
        type: "secret",
        description: "Optional key used to encrypt the memory database",
        required: false,
      },
    },

    tools: createMemoryTools(resolveStore),

    async onLoad(ctx) {
      const active = resolveStore(ctx);
      ctx.log(`Memory database: ${active.dbPath} (max ${active.maxEntries} entries)`);
    },

    async onUnload() {
      store?.close();
    },
  });
}
