/**
 * Exposes loaded modules' tools to the language model as AI SDK tools.
 */

import { tool, type Tool } from "ai";
import { z } from "zod";
import type { ModuleToolParameter } from "@sovereign/shared";
import type { LoadedModule } from "./module-loader.js";

/** Convert a module tool's parameter descriptors into a zod object schema. */
export function toZodSchema(
  params: Record<string, ModuleToolParameter>,
): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, param] of Object.entries(params)) {
    let fieldSchema: z.ZodTypeAny;
    switch (param.type) {
      case "number":
        fieldSchema = z.number().describe(param.description);
        break;
      case "boolean":
        fieldSchema = z.boolean().describe(param.description);
        break;
      default:
        fieldSchema = z.string().describe(param.description);
    }
    shape[key] = param.required ? fieldSchema : fieldSchema.optional();
  }
  return z.object(shape);
}

export function createModuleTools(modules: Iterable<LoadedModule>): Record<string, Tool> {
  const tools: Record<string, Tool> = {};

  for (const loaded of modules) {
    for (const moduleTool of loaded.definition.tools ?? []) {
      if (tools[moduleTool.name]) {
        loaded.context.warn(`Tool "${moduleTool.name}" is already registered by another module, skipping`);
        continue;
      }

      tools[moduleTool.name] = tool({
        description: moduleTool.description,
        parameters: toZodSchema(moduleTool.parameters),
        execute: async (args: Record<string, unknown>) => {
          return moduleTool.execute(args, loaded.context);
        },
      });
    }
  }

  return tools;
}
