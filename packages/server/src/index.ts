export {
  initModules,
  shutdownModules,
  getModuleLoader,
  builtinModules,
  type InitModulesOptions,
  type ModuleSystem,
} from "./modules/index.js";
export { ModuleLoader, type LoadedModule, type ModuleLoaderOptions } from "./modules/module-loader.js";
export { createModuleTools, toZodSchema } from "./modules/module-tools.js";
export { getConfig, staticConfig, configKeyToEnv, type ConfigLookup } from "./settings/settings.js";
