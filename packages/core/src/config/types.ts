/**
 * Configuration Module Types
 */

import type { RawEnvironment } from "../os/snapshot.js";
import { LogLevel } from "../utils/logger.js";

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: LogLevel;
  logToFile: boolean;
}

/**
 * Main configuration structure
 */
export interface OsFamilyConfig {
  /**
   * Values that replace what the host reports, e.g. to evaluate conditions
   * for a different target platform
   */
  environment?: Partial<RawEnvironment>;
  logging: LoggingConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: OsFamilyConfig = {
  logging: {
    level: LogLevel.INFO,
    logToFile: false,
  },
};
