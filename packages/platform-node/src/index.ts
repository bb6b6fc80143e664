/**
 * @tandem/platform-node - YAML configuration and runtime wiring for Node.js
 */

export { ConfigLoader, TandemConfigSchema, MEMORY_DATABASE } from "./config.js";
export type { TandemConfig, TandemConfigInput } from "./config.js";
export { NodePlatform } from "./platform.js";
export type { PlatformOverrides, TandemRuntime } from "./platform.js";

// Errors
export { Platform, ErrConfigUnreadable, ErrConfigInvalid } from "./errors.js";
