/**
 * reel-search public API
 *
 * @example
 * ```typescript
 * import { SearchManager } from "reel-search";
 *
 * const engine = await SearchManager.open();
 * const response = await engine.search("happy taipei clips");
 * ```
 */

export * from "./core/index.js";
export { EventBus, type EventHandler } from "./utils/events.js";
export { ok, err, unwrap, type Result } from "./types/result.js";
