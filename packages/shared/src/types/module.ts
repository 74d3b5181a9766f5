// ---------------------------------------------------------------------------
// Module types
//
// Modules are host-loaded plugins. Each one declares a manifest, a config
// schema and a set of tools; the host hands it a ModuleContext and exposes
// its tools to the language model.
// ---------------------------------------------------------------------------

/**
 * Structural view of a better-sqlite3 Database instance.
 * We avoid importing better-sqlite3 here to keep the shared package dependency-free.
 */
export interface ModuleDatabase {
  prepare(sql: string): { run(...params: unknown[]): unknown; get(...params: unknown[]): unknown; all(...params: unknown[]): unknown[] };
  exec(sql: string): unknown;
  transaction<T>(fn: () => T): { (): T; immediate(): T };
}

// ─── Manifest ────────────────────────────────────────────────────────────────

export interface ModuleManifest {
  id: string;
  name: string;
  version: string; // semver
  description: string;
  author?: string;
}

// ─── Config schema ───────────────────────────────────────────────────────────

export interface ModuleConfigField {
  type: "string" | "number" | "boolean" | "secret";
  description: string;
  required: boolean;
  default?: string | number | boolean;
}

export type ModuleConfigSchema = Record<string, ModuleConfigField>;

// ─── Module context ──────────────────────────────────────────────────────────

export interface ModuleContext {
  /** Instance ID the host loaded the module under. */
  moduleId: string;
  getConfig(key: string): string | undefined;
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// ─── Migrations ──────────────────────────────────────────────────────────────

export interface ModuleMigration {
  version: number;
  description: string;
  up(db: ModuleDatabase): void;
}

// ─── Tools ───────────────────────────────────────────────────────────────────

export interface ModuleToolParameter {
  type: "string" | "number" | "boolean";
  description: string;
  required: boolean;
}

export interface ModuleToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ModuleToolParameter>;
  execute(args: Record<string, unknown>, ctx: ModuleContext): Promise<string>;
}

// ─── Module definition ───────────────────────────────────────────────────────

export interface ModuleDefinition {
  manifest: ModuleManifest;
  configSchema?: ModuleConfigSchema;
  tools?: ModuleToolDefinition[];
  onLoad?(ctx: ModuleContext): Promise<void>;
  onUnload?(ctx: ModuleContext): Promise<void>;
}

// ─── defineModule() ──────────────────────────────────────────────────────────

/** Identity function for type narrowing — module authors use this to define their module. */
export function defineModule(def: ModuleDefinition): ModuleDefinition {
  return def;
}
