/**
 * Core type definitions.
 */

export * from "./pipeline.js";
export * from "./events.js";
