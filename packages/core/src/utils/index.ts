/**
 * Utils Module - Utility functions and helpers
 */

export { logger, initLogger, getLogger, getDefaultLogDir, parseLogLevel, LogLevel } from "./logger.js";
export type { Logger, LoggerConfig } from "./logger.js";
