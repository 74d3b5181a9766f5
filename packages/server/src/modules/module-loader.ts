/**
 * Module loader — creates module contexts and manages the lifecycle of modules.
 */

import type { ModuleContext, ModuleDefinition } from "@sovereign/shared";
import { getConfig, type ConfigLookup } from "../settings/settings.js";
import { debug } from "../utils/debug.js";

export interface LoadedModule {
  /** Instance ID (defaults to the manifest ID) */
  id: string;
  definition: ModuleDefinition;
  context: ModuleContext;
}

export interface ModuleLoaderOptions {
  /** Config source; defaults to environment-backed settings */
  getConfig?: ConfigLookup;
}

function createModuleContext(moduleId: string, lookup: ConfigLookup): ModuleContext {
  return {
    moduleId,
    getConfig(key: string): string | undefined {
      return lookup(`module:${moduleId}:${key}`);
    },
    log(...args: unknown[]) {
      console.log(`[module:${moduleId}]`, ...args);
    },
    warn(...args: unknown[]) {
      console.warn(`[module:${moduleId}]`, ...args);
    },
    error(...args: unknown[]) {
      console.error(`[module:${moduleId}]`, ...args);
    },
  };
}

export class ModuleLoader {
  private modules = new Map<string, LoadedModule>();
  private readonly lookup: ConfigLookup;

  constructor(options: ModuleLoaderOptions = {}) {
    this.lookup = options.getConfig ?? getConfig;
  }

  /** Load every definition; a module that fails to load is logged and skipped. */
  async loadAll(definitions: ModuleDefinition[]): Promise<Map<string, LoadedModule>> {
    for (const definition of definitions) {
      try {
        await this.load(definition);
      } catch (err) {
        console.error(`[ModuleLoader] Failed to load module ${definition.manifest.id}:`, err);
      }
    }

    console.log(`[ModuleLoader] Loaded ${this.modules.size} modules`);
    return this.modules;
  }

  /** Load a single module. Loading an already-loaded ID returns the existing instance. */
  async load(definition: ModuleDefinition, instanceId?: string): Promise<LoadedModule> {
    const id = instanceId ?? definition.manifest.id;

    const existing = this.modules.get(id);
    if (existing) return existing;

    const context = createModuleContext(id, this.lookup);
    this.warnMissingConfig(definition, context);

    if (definition.onLoad) {
      await definition.onLoad(context);
    }

    const loaded: LoadedModule = { id, definition, context };
    this.modules.set(id, loaded);
    console.log(`[ModuleLoader] Loaded module: ${definition.manifest.name} v${definition.manifest.version}`);
    debug("modules", `${id} tools:`, (definition.tools ?? []).map((t) => t.name));

    return loaded;
  }

  /** Unload a module. */
  async unload(id: string): Promise<void> {
    const loaded = this.modules.get(id);
    if (!loaded) return;

    try {
      if (loaded.definition.onUnload) {
        await loaded.definition.onUnload(loaded.context);
      }
    } catch (err) {
      console.error(`[ModuleLoader] Error during onUnload for ${id}:`, err);
    }

    this.modules.delete(id);
    console.log(`[ModuleLoader] Unloaded module: ${id}`);
  }

  /** Get a loaded module. */
  get(id: string): LoadedModule | undefined {
    return this.modules.get(id);
  }

  /** Get all loaded modules. */
  getAll(): Map<string, LoadedModule> {
    return this.modules;
  }

  /** Unload all modules. */
  async unloadAll(): Promise<void> {
    for (const id of [...this.modules.keys()]) {
      await this.unload(id);
    }
  }

  private warnMissingConfig(definition: ModuleDefinition, context: ModuleContext): void {
    for (const [key, field] of Object.entries(definition.configSchema ?? {})) {
      if (field.required && context.getConfig(key) === undefined) {
        context.warn(`Required config "${key}" is not set`);
      }
    }
  }
}
