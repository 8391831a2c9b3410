/**
 * Query Object
 * Accumulates criteria through setters and evaluates them on demand
 */

import { requireString } from "../errors.js";
import { matches, type OsCriteria } from "./evaluator.js";
import { currentSnapshot, type EnvironmentSnapshot } from "./snapshot.js";

/**
 * Object-style wrapper over {@link matches}.
 *
 * @example
 * ```typescript
 * const isModernWindows = new OsQuery("winnt").setArch("amd64").evaluate();
 * ```
 */
export class OsQuery {
  private criteria: OsCriteria = {};

  /**
   * @param family Optional family to look for, same as calling setFamily
   */
  constructor(family?: string) {
    if (family !== undefined) {
      this.setFamily(family);
    }
  }

  /**
   * Set the desired OS family, one of the FAMILY_* identifiers
   */
  public setFamily(family: string): this {
    this.criteria.family = requireString(family, "family").toLowerCase();
    return this;
  }

  /**
   * Set the desired OS name
   */
  public setName(name: string): this {
    this.criteria.name = requireString(name, "name").toLowerCase();
    return this;
  }

  /**
   * Set the desired OS architecture
   */
  public setArch(arch: string): this {
    this.criteria.arch = requireString(arch, "arch").toLowerCase();
    return this;
  }

  /**
   * Set the desired OS version
   */
  public setVersion(version: string): this {
    this.criteria.version = requireString(version, "version").toLowerCase();
    return this;
  }

  /**
   * A frozen copy of the accumulated criteria
   */
  public toCriteria(): Readonly<OsCriteria> {
    return Object.freeze({ ...this.criteria });
  }

  /**
   * Determine whether the snapshot matches every criterion set so far.
   * Defaults to the process-wide snapshot.
   *
   * @throws ClassificationError if the family is not registered
   */
  public evaluate(snapshot: EnvironmentSnapshot = currentSnapshot()): boolean {
    return matches(this.criteria, snapshot);
  }
}
