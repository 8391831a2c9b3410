/**
 * OS Family Detection Module
 * Answers platform questions about the machine this process runs on
 */

import { isValidFamily, validFamilies, type OsFamily } from "./families.js";
import { matches } from "./evaluator.js";
import { currentFamily, matchingFamilies, resolveFamily } from "./resolver.js";
import { currentSnapshot, type EnvironmentSnapshot } from "./snapshot.js";

/**
 * Everything known about one snapshot's platform
 */
export interface PlatformReport {
  snapshot: EnvironmentSnapshot;
  family: OsFamily | null;
  families: OsFamily[];
}

/**
 * Static queries against the process-wide environment snapshot
 */
export class OsDetector {
  /**
   * Determine if the host matches the given OS family
   */
  public static isFamily(family: string): boolean {
    return matches({ family }, currentSnapshot());
  }

  /**
   * Determine if the host matches the given OS name
   */
  public static isName(name: string): boolean {
    return matches({ name }, currentSnapshot());
  }

  /**
   * Determine if the host matches the given OS architecture
   */
  public static isArch(arch: string): boolean {
    return matches({ arch }, currentSnapshot());
  }

  /**
   * Determine if the host matches the given OS version
   */
  public static isVersion(version: string): boolean {
    return matches({ version }, currentSnapshot());
  }

  /**
   * Determine if the host matches every given criterion. With none given the answer is false.
   */
  public static isOs(family?: string, name?: string, arch?: string, version?: string): boolean {
    return matches({ family, name, arch, version }, currentSnapshot());
  }

  public static isValidFamily(token: unknown): token is OsFamily {
    return isValidFamily(token);
  }

  public static validFamilies(): ReadonlySet<OsFamily> {
    return validFamilies();
  }

  /**
   * Representative family of the host, for display. null on an unsupported platform.
   */
  public static currentFamily(): OsFamily | null {
    return currentFamily();
  }

  public static snapshot(): EnvironmentSnapshot {
    return currentSnapshot();
  }

  /**
   * Summarize a snapshot, the host's by default
   */
  public static describe(snapshot?: EnvironmentSnapshot): PlatformReport {
    if (snapshot === undefined) {
      const host = currentSnapshot();
      return { snapshot: host, family: currentFamily(), families: matchingFamilies(host) };
    }
    return {
      snapshot,
      family: resolveFamily(snapshot),
      families: matchingFamilies(snapshot),
    };
  }
}
