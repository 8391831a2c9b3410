/**
 * Config Module - Configuration Management
 */

export { ConfigManager } from "./manager.js";
export { DEFAULT_CONFIG } from "./types.js";
export type { OsFamilyConfig, LoggingConfig } from "./types.js";
