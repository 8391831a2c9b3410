/**
 * Environment Snapshot
 * Captures the host values every family rule and query is evaluated against
 */

import os from "node:os";
import path from "node:path";
import { requireString } from "../errors.js";
import { logger } from "../utils/logger.js";

/**
 * Raw environment values, in the spelling the host reports them
 */
export interface RawEnvironment {
  name: string;
  arch: string;
  version: string;
  pathSeparator: string;
}

/**
 * Immutable classification input. name, arch and version are lowercase.
 */
export type EnvironmentSnapshot = Readonly<RawEnvironment>;

/**
 * Environment variables that override individual host values
 */
export const ENVIRONMENT_OVERRIDE_VARIABLES = {
  name: "OS_FAMILY_NAME",
  arch: "OS_FAMILY_ARCH",
  version: "OS_FAMILY_VERSION",
  pathSeparator: "OS_FAMILY_PATH_SEPARATOR",
} as const satisfies Record<keyof RawEnvironment, string>;

const ENVIRONMENT_FIELDS: ReadonlyArray<keyof RawEnvironment> = ["name", "arch", "version", "pathSeparator"];

/**
 * Build a snapshot from raw values
 */
export function createSnapshot(values: RawEnvironment): EnvironmentSnapshot {
  return Object.freeze({
    name: requireString(values.name, "name").toLowerCase(),
    arch: requireString(values.arch, "arch").toLowerCase(),
    version: requireString(values.version, "version").toLowerCase(),
    pathSeparator: requireString(values.pathSeparator, "pathSeparator"),
  });
}

/**
 * Product name without the edition: os.version() reports "Windows 10 Home"
 * or "Windows Server 2022 Datacenter", and edition words such as "Home" would
 * otherwise trip the 9x markers.
 */
const WINDOWS_PRODUCT = /^windows (server \d+(?: r2)?|\d+(?:\.\d+)?|[a-z]+)/i;

function windowsProductName(version: string): string | null {
  const match = WINDOWS_PRODUCT.exec(version.trim());
  return match ? match[0] : null;
}

/**
 * Conventional OS name for a Node.js platform
 */
export function hostOsName(platform: string, type: string, version: string): string {
  switch (platform) {
    case "win32":
    case "cygwin":
      return windowsProductName(version) ?? "Windows NT";
    case "darwin":
      return "Mac OS X";
    case "linux":
    case "android":
      return "Linux";
    case "sunos":
      return "SunOS";
    case "aix":
      return "AIX";
    case "freebsd":
      return "FreeBSD";
    case "openbsd":
      return "OpenBSD";
    case "netbsd":
      return "NetBSD";
    case "haiku":
      return "Haiku";
    case "os390":
      return "z/OS";
    case "os400":
      return "OS/400";
    default:
      return type;
  }
}

/**
 * Conventional architecture name for a Node.js arch
 */
export function hostArchName(arch: string): string {
  switch (arch) {
    case "x64":
      return "amd64";
    case "ia32":
      return "x86";
    case "arm64":
      return "aarch64";
    default:
      return arch;
  }
}

/**
 * Read the raw values of the machine this process runs on
 */
export function detectHostEnvironment(): RawEnvironment {
  const platform = os.platform();
  return {
    name: hostOsName(platform, os.type(), os.version()),
    arch: hostArchName(os.arch()),
    version: os.release(),
    pathSeparator: path.delimiter,
  };
}

/**
 * Collect per-field overrides from environment variables. Empty values are ignored.
 */
export function readEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): Partial<RawEnvironment> {
  const overrides: Partial<RawEnvironment> = {};
  for (const key of ENVIRONMENT_FIELDS) {
    const value = env[ENVIRONMENT_OVERRIDE_VARIABLES[key]];
    if (value !== undefined && value !== "") {
      overrides[key] = value;
    }
  }
  return overrides;
}

let snapshotInstance: EnvironmentSnapshot | undefined;

/**
 * The process-wide snapshot: host values plus environment overrides,
 * computed on first access and never again
 */
export function currentSnapshot(): EnvironmentSnapshot {
  if (!snapshotInstance) {
    const overrides = readEnvironmentOverrides();
    snapshotInstance = createSnapshot({ ...detectHostEnvironment(), ...overrides });
    logger.debug("Captured environment snapshot", { snapshot: snapshotInstance, overrides });
  }
  return snapshotInstance;
}
