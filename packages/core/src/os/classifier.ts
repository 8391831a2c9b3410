/**
 * Family Classifier
 * Decides family membership of a snapshot from substring and path-separator rules
 */

import { ClassificationError, requireString } from "../errors.js";
import {
  FAMILY_DOS,
  FAMILY_MAC,
  FAMILY_NETWARE,
  FAMILY_NT,
  FAMILY_OPENVMS,
  FAMILY_OS2,
  FAMILY_OS400,
  FAMILY_TANDEM,
  FAMILY_UNIX,
  FAMILY_WIN9X,
  FAMILY_WINDOWS,
  FAMILY_ZOS,
  isValidFamily,
  type OsFamily,
} from "./families.js";
import type { EnvironmentSnapshot } from "./snapshot.js";

/**
 * Some runtimes report macOS by its kernel name, "Darwin"
 */
const DARWIN = "darwin";

/**
 * The only 9x platforms looked for. CE is not 9x but close enough.
 */
const WIN9X_MARKERS = ["95", "98", "me", "ce"] as const;

const isWindows = (name: string): boolean => name.includes(FAMILY_WINDOWS);

const isWin9x = (name: string): boolean => isWindows(name) && WIN9X_MARKERS.some((marker) => name.includes(marker));

const isMac = (name: string): boolean => name.includes(FAMILY_MAC) || name.includes(DARWIN);

const isNetware = (name: string): boolean => name.includes(FAMILY_NETWARE);

const isOpenVms = (name: string): boolean => name.includes(FAMILY_OPENVMS);

/**
 * One membership rule per family. Rules overlap on purpose: a host can be
 * windows, winnt and dos at once, or unix and z/os at once.
 */
const FAMILY_RULES: Record<OsFamily, (snapshot: EnvironmentSnapshot) => boolean> = {
  [FAMILY_WINDOWS]: ({ name }) => isWindows(name),
  [FAMILY_WIN9X]: ({ name }) => isWin9x(name),
  [FAMILY_NT]: ({ name }) => isWindows(name) && !isWin9x(name),
  [FAMILY_OS2]: ({ name }) => name.includes(FAMILY_OS2),
  [FAMILY_NETWARE]: ({ name }) => isNetware(name),
  [FAMILY_DOS]: ({ name, pathSeparator }) => pathSeparator === ";" && !isNetware(name),
  [FAMILY_MAC]: ({ name }) => isMac(name),
  [FAMILY_TANDEM]: ({ name }) => name.includes("nonstop_kernel"),
  [FAMILY_UNIX]: ({ name, pathSeparator }) =>
    pathSeparator === ":" && !isOpenVms(name) && (!isMac(name) || name.endsWith("x") || name.includes(DARWIN)),
  [FAMILY_ZOS]: ({ name }) => name.includes(FAMILY_ZOS) || name.includes("os/390"),
  [FAMILY_OS400]: ({ name }) => name.includes(FAMILY_OS400),
  [FAMILY_OPENVMS]: ({ name }) => isOpenVms(name),
};

/**
 * Determine whether a snapshot belongs to a family.
 *
 * @throws ClassificationError if `family` is not a registered family
 * @throws InvalidArgumentError if `family` is not a string
 */
export function classify(family: string, snapshot: EnvironmentSnapshot): boolean {
  const token = requireString(family, "family");
  if (!isValidFamily(token)) {
    throw new ClassificationError(token);
  }
  return FAMILY_RULES[token](snapshot);
}
