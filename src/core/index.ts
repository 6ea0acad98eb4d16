/**
 * Core barrel: the innermost ring. No third-party dependencies.
 */
export * from "./types/index.js";
export * from "./errors/index.js";
export * from "./fields/index.js";
export * from "./ports/index.js";
