/**
 * Family Registry
 * The closed set of operating-system families that can be tested for
 */

/** OS family that can be tested for: any Windows host. */
export const FAMILY_WINDOWS = "windows";
/** OS family that can be tested for: Windows 95, 98, ME and CE. */
export const FAMILY_WIN9X = "win9x";
/** OS family that can be tested for: every Windows host that is not 9x. */
export const FAMILY_NT = "winnt";
/** OS family that can be tested for. */
export const FAMILY_OS2 = "os/2";
/** OS family that can be tested for. */
export const FAMILY_NETWARE = "netware";
/** OS family that can be tested for: hosts with a `;` path-list separator, except NetWare. */
export const FAMILY_DOS = "dos";
/** OS family that can be tested for: macOS, including hosts reporting "Darwin". */
export const FAMILY_MAC = "mac";
/** OS family that can be tested for: HP NonStop. */
export const FAMILY_TANDEM = "tandem";
/** OS family that can be tested for. */
export const FAMILY_UNIX = "unix";
/** OS family that can be tested for. */
export const FAMILY_OPENVMS = "openvms";
/** OS family that can be tested for: z/OS and OS/390. */
export const FAMILY_ZOS = "z/os";
/** OS family that can be tested for. */
export const FAMILY_OS400 = "os/400";

/**
 * Probe order used when a single family label is needed.
 *
 * More specific families come before the families they overlap with:
 * winnt/win9x before windows, every Windows and OS/2 family before dos,
 * and mac, tandem, z/os and os/400 before unix.
 */
export const FAMILY_PRIORITY = Object.freeze([
  FAMILY_NT,
  FAMILY_WIN9X,
  FAMILY_WINDOWS,
  FAMILY_OS2,
  FAMILY_NETWARE,
  FAMILY_DOS,
  FAMILY_MAC,
  FAMILY_TANDEM,
  FAMILY_ZOS,
  FAMILY_OS400,
  FAMILY_OPENVMS,
  FAMILY_UNIX,
] as const);

export type OsFamily = (typeof FAMILY_PRIORITY)[number];

const VALID_FAMILIES: ReadonlySet<string> = new Set<string>(FAMILY_PRIORITY);

/**
 * The registered families, as a copy callers are free to keep.
 */
export function validFamilies(): ReadonlySet<OsFamily> {
  return new Set(FAMILY_PRIORITY);
}

/**
 * Test whether a token is exactly one of the registered family identifiers.
 * Never throws.
 */
export function isValidFamily(token: unknown): token is OsFamily {
  return typeof token === "string" && VALID_FAMILIES.has(token);
}
