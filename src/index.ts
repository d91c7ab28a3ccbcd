/**
 * Main entry point for termhook
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./url-parser.js";
export * from "./project-resolver.js";
export * from "./confirmation.js";
export * from "./command-builder.js";
export * from "./terminal-dispatcher.js";
export * from "./launcher.js";
export * from "./prompters/index.js";
