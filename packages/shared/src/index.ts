export * from "./types/module.js";
export * from "./types/memory.js";
