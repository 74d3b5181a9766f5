/**
 * Opt-in diagnostic logging.
 *
 * SOVEREIGN_DEBUG is "1", "true" or "*" for every tag, or a comma-separated
 * list of tags (e.g. "modules,settings"). Read on each call so tests and
 * long-running hosts can toggle it.
 */

export function isDebugEnabled(tag: string): boolean {
  const setting = process.env.SOVEREIGN_DEBUG?.trim();
  if (!setting || setting === "0" || setting === "false") return false;
  if (setting === "1" || setting === "true" || setting === "*") return true;
  return setting.split(",").some((t) => t.trim() === tag);
}

export function debug(tag: string, ...args: unknown[]): void {
  if (isDebugEnabled(tag)) console.log(`[DEBUG:${tag}]`, ...args);
}
