/**
 * Module system entry point.
 * Call initModules() at host startup to load the built-in modules and
 * collect their tools.
 */

import type { Tool } from "ai";
import type { ModuleDefinition } from "@sovereign/shared";
import { createMemoryModule } from "@sovereign/module-sovereign-memory";
import { ModuleLoader, type ModuleLoaderOptions } from "./module-loader.js";
import { createModuleTools } from "./module-tools.js";

let _loader: ModuleLoader | null = null;

export function getModuleLoader(): ModuleLoader | null {
  return _loader;
}

/** Modules that ship with the host. */
export function builtinModules(): ModuleDefinition[] {
  return [createMemoryModule()];
}

export interface InitModulesOptions extends ModuleLoaderOptions {
  /** Defaults to the built-in modules */
  modules?: ModuleDefinition[];
}

export interface ModuleSystem {
  loader: ModuleLoader;
  tools: Record<string, Tool>;
}

export async function initModules(options: InitModulesOptions = {}): Promise<ModuleSystem> {
  console.log("[Modules] Initializing module system...");

  const loader = new ModuleLoader(options);
  _loader = loader;

  const modules = await loader.loadAll(options.modules ?? builtinModules());
  const tools = createModuleTools(modules.values());

  console.log(`[Modules] Module system initialized with ${modules.size} modules`);
  return { loader, tools };
}

export async function shutdownModules(): Promise<void> {
  if (!_loader) return;
  await _loader.unloadAll();
  _loader = null;
}
