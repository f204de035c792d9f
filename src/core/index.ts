/**
 * Core module - everything the CLI and embedding applications share
 */

export * from "./errors.js";
export * from "./query/index.js";
export * from "./nl/index.js";
export * from "./index/index.js";
export * from "./search/index.js";
export * from "./templates/index.js";
export * from "./suggestions/index.js";
export { loadConfig, resolveConfig } from "./config.js";

export * from "../types/index.js";
