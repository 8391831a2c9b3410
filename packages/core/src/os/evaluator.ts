/**
 * Predicate Evaluator
 * Combines family, name, architecture and version criteria with logical AND
 */

import { isOsFamilyError, requireString, type OsFamilyError } from "../errors.js";
import type { Result } from "../types/common.js";
import { classify } from "./classifier.js";
import type { EnvironmentSnapshot } from "./snapshot.js";

/**
 * Match criteria. An absent field means "don't care".
 */
export interface OsCriteria {
  family?: string;
  name?: string;
  arch?: string;
  version?: string;
}

// null arrives from parsed config files and plain JavaScript callers
const isAbsent = (value: string | undefined | null): value is undefined | null => value === undefined || value === null;

const normalize = (value: string | undefined, field: keyof OsCriteria): string | undefined =>
  isAbsent(value) ? undefined : requireString(value, field).toLowerCase();

/**
 * Whether at least one criterion is present
 */
export function hasCriteria(criteria: OsCriteria): boolean {
  return [criteria.family, criteria.name, criteria.arch, criteria.version].some((value) => !isAbsent(value));
}

/**
 * Evaluate criteria against a snapshot.
 *
 * No criteria at all is `false`, never an implicit match. Otherwise every
 * present criterion must hold; name, arch and version compare exactly after
 * lowercasing.
 *
 * @throws ClassificationError for an unknown family token
 */
export function matches(criteria: OsCriteria, snapshot: EnvironmentSnapshot): boolean {
  if (!hasCriteria(criteria)) {
    return false;
  }

  const family = normalize(criteria.family, "family");
  const name = normalize(criteria.name, "name");
  const arch = normalize(criteria.arch, "arch");
  const version = normalize(criteria.version, "version");

  const isFamily = family === undefined || classify(family, snapshot);
  const isName = name === undefined || name === snapshot.name;
  const isArch = arch === undefined || arch === snapshot.arch;
  const isVersion = version === undefined || version === snapshot.version;

  return isFamily && isName && isArch && isVersion;
}

/**
 * Like {@link matches}, but reports classification and argument errors as a
 * failed Result instead of throwing.
 */
export function tryMatches(criteria: OsCriteria, snapshot: EnvironmentSnapshot): Result<boolean, OsFamilyError> {
  try {
    return { success: true, data: matches(criteria, snapshot) };
  } catch (error) {
    if (isOsFamilyError(error)) {
      return { success: false, error };
    }
    throw error;
  }
}
