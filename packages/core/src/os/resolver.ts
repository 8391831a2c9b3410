/**
 * Family Resolver
 * Picks one representative family label for display and logging
 */

import { logger } from "../utils/logger.js";
import { classify } from "./classifier.js";
import { FAMILY_PRIORITY, type OsFamily } from "./families.js";
import { currentSnapshot, type EnvironmentSnapshot } from "./snapshot.js";

/**
 * Every family the snapshot belongs to, in FAMILY_PRIORITY order
 */
export function matchingFamilies(snapshot: EnvironmentSnapshot): OsFamily[] {
  return FAMILY_PRIORITY.filter((family) => classify(family, snapshot));
}

/**
 * The first family in FAMILY_PRIORITY the snapshot belongs to, or null.
 *
 * Several families usually match; use a specific family query when the
 * answer matters.
 */
export function resolveFamily(snapshot: EnvironmentSnapshot): OsFamily | null {
  return FAMILY_PRIORITY.find((family) => classify(family, snapshot)) ?? null;
}

let currentFamilyInstance: { family: OsFamily | null } | undefined;

/**
 * The resolved family of the current snapshot, computed once
 */
export function currentFamily(): OsFamily | null {
  if (!currentFamilyInstance) {
    const snapshot = currentSnapshot();
    currentFamilyInstance = { family: resolveFamily(snapshot) };
    if (currentFamilyInstance.family === null) {
      logger.warn("No registered os family matches this host", { snapshot });
    } else {
      logger.debug("Resolved current os family", { family: currentFamilyInstance.family });
    }
  }
  return currentFamilyInstance.family;
}
