/**
 * OS Module - Family classification and platform queries
 */

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
} from "./families.js";
export type { OsFamily } from "./families.js";
export {
  createSnapshot,
  currentSnapshot,
  detectHostEnvironment,
  readEnvironmentOverrides,
  hostOsName,
  hostArchName,
  ENVIRONMENT_OVERRIDE_VARIABLES,
} from "./snapshot.js";
export type { EnvironmentSnapshot, RawEnvironment } from "./snapshot.js";
export { classify } from "./classifier.js";
export { matches, tryMatches, hasCriteria } from "./evaluator.js";
export type { OsCriteria } from "./evaluator.js";
export { resolveFamily, matchingFamilies, currentFamily } from "./resolver.js";
export { OsQuery } from "./query.js";
export { OsDetector } from "./detector.js";
export type { PlatformReport } from "./detector.js";
