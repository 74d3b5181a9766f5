import type { MemoryEntry, ModuleContext, ModuleToolDefinition } from "@sovereign/shared";
import { invalidInput, isMemoryStoreError } from "./errors.js";
import type { MemoryStore } from "./memory-store.js";

/** Resolves the store shared by every tool of one module instance. */
export type StoreResolver = (ctx: ModuleContext) => MemoryStore;

const PREVIEW_LENGTH = 200;

// ─── Formatting ──────────────────────────────────────────────────────────────

export function preview(content: string): string {
  return content.length > PREVIEW_LENGTH
    ? `${content.slice(0, PREVIEW_LENGTH)}...`
    : content;
}

export function formatEntries(entries: MemoryEntry[]): string {
  if (entries.length === 0) return "No memories found.";

  const blocks = entries.map(
    (e) => `- **[${e.topic}]** _${e.updatedAt.slice(0, 10)}_\n  ${e.content}`,
  );
  return `**${entries.length} memory(ies):**\n\n${blocks.join("\n\n")}`;
}

function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw invalidInput(`${key} must be a string`);
  }
  return value;
}

/** Run a tool body, turning any failure into an "Error: ..." result for the model. */
async function runTool(
  ctx: ModuleContext,
  toolName: string,
  body: () => string,
): Promise<string> {
  try {
    return body();
  } catch (err) {
    if (isMemoryStoreError(err) && err.code === "INVALID_INPUT") {
      ctx.warn(`${toolName} rejected:`, err.message);
      return `Error: ${err.message}`;
    }
    ctx.error(`${toolName} failed:`, err);
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }
}

// ─── Tools ───────────────────────────────────────────────────────────────────

export function createMemoryTools(resolveStore: StoreResolver): ModuleToolDefinition[] {
  const rememberTool: ModuleToolDefinition = {
    name: "remember",
    description:
      "Store a persistent memory. Use this to save user preferences, important context, " +
      "project details, or decisions that should be available in future conversations. " +
      "If a memory with the same topic exists, it is overwritten.",
    parameters: {
      topic: { type: "string", description: "Short label for this memory (e.g. 'preferred_language', 'project_stack')", required: true },
      content: { type: "string", description: "The information to remember. Be specific and concise.", required: true },
    },
    async execute(args, ctx) {
      return runTool(ctx, "remember", () => {
        const topic = requireString(args, "topic");
        const content = requireString(args, "content");
        const { action, entry, pruned } = resolveStore(ctx).remember(topic, content);

        ctx.log(`Memory ${action}: ${entry.topic}`);
        if (pruned > 0) {
          ctx.log(`Pruned ${pruned} oldest memory(ies)`);
        }

        const verb = action === "stored" ? "Stored" : "Updated";
        return `${verb} memory **[${entry.topic}]**: ${preview(entry.content)}`;
      });
    },
  };

  const recallTool: ModuleToolDefinition = {
    name: "recall",
    description:
      "Search stored memories. Use this at the start of conversations to load user context, " +
      "or whenever previously stored information is needed. Use \"*\" to list all memories.",
    parameters: {
      query: { type: "string", description: "Text matched against memory topics and content, or \"*\" for all", required: true },
    },
    async execute(args, ctx) {
      return runTool(ctx, "recall", () => {
        const entries = resolveStore(ctx).recall(requireString(args, "query"));
        ctx.log(`Found ${entries.length} memories`);
        return formatEntries(entries);
      });
    },
  };

  const forgetTool: ModuleToolDefinition = {
    name: "forget",
    description:
      "Delete a stored memory by its exact topic. Use when information is outdated " +
      "or the user explicitly asks to forget something.",
    parameters: {
      topic: { type: "string", description: "The exact topic label of the memory to delete", required: true },
    },
    async execute(args, ctx) {
      return runTool(ctx, "forget", () => {
        const topic = requireString(args, "topic").trim();
        const { deleted } = resolveStore(ctx).forget(topic);

        ctx.log(`${deleted ? "Deleted" : "Not found"}: ${topic}`);
        return deleted
          ? `Forgotten: **[${topic}]**`
          : `No memory found with topic **[${topic}]**.`;
      });
    },
  };

  const forgetAllTool: ModuleToolDefinition = {
    name: "forget_all",
    description:
      "Permanently delete every stored memory. Only use when the user explicitly asks " +
      "to wipe all memories.",
    parameters: {
      confirm: { type: "boolean", description: "Must be true to perform the wipe", required: true },
    },
    async execute(args, ctx) {
      return runTool(ctx, "forget_all", () => {
        if (args.confirm !== true) {
          throw invalidInput("confirm must be true to delete all memories");
        }
        const removed = resolveStore(ctx).forgetAll();
        ctx.log(`Wiped ${removed} memories`);
        return `Forgot ${removed} memory(ies).`;
      });
    },
  };

  return [rememberTool, recallTool, forgetTool, forgetAllTool];
}
