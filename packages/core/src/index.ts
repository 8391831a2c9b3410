/**
 * @os-family/core
 *
 * Operating-system family classification and platform queries for build tooling.
 * Provides the family registry, environment snapshots, predicate evaluation,
 * configuration and logging.
 */

// Export common types
export type { Result } from "./types/common.js";

// Export errors
export {
  OsFamilyError,
  ClassificationError,
  InvalidArgumentError,
  ConfigurationError,
  isOsFamilyError,
  isOsFamilyErrorWithCode,
} from "./errors.js";
export type { OsFamilyErrorCode } from "./errors.js";

// Export OS module
export {
  FAMILY_WINDOWS,
  FAMILY_WIN9X,
  FAMILY_NT,
  FAMILY_OS2,
  FAMILY_NETWARE,
  FAMILY_DOS,
  FAMILY_MAC,
  FAMILY_TANDEM,
  FAMILY_UNIX,
  FAMILY_OPENVMS,
  FAMILY_ZOS,
  FAMILY_OS400,
  FAMILY_PRIORITY,
  validFamilies,
  isValidFamily,
  createSnapshot,
  currentSnapshot,
  detectHostEnvironment,
  readEnvironmentOverrides,
  hostOsName,
  hostArchName,
  ENVIRONMENT_OVERRIDE_VARIABLES,
  classify,
  matches,
  tryMatches,
  hasCriteria,
  resolveFamily,
  matchingFamilies,
  currentFamily,
  OsQuery,
  OsDetector,
} from "./os/index.js";
export type { OsFamily, EnvironmentSnapshot, RawEnvironment, OsCriteria, PlatformReport } from "./os/index.js";

// Export Config module
export { ConfigManager, DEFAULT_CONFIG } from "./config/index.js";
export type { OsFamilyConfig, LoggingConfig } from "./config/index.js";

// Export Utils module
export { logger, initLogger, getLogger, getDefaultLogDir, parseLogLevel, LogLevel } from "./utils/index.js";
export type { Logger, LoggerConfig } from "./utils/index.js";

// Export XML module
export { XmlEncodingError } from "./xml/index.js";
export type { XmlEncodingEvidence } from "./xml/index.js";
