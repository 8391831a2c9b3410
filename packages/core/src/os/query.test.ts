import { describe, it, expect } from "vitest";
import { ClassificationError, InvalidArgumentError } from "../errors.js";
import { classify } from "./classifier.js";
import { matches } from "./evaluator.js";
import { validFamilies } from "./families.js";
import { OsQuery } from "./query.js";
import { createSnapshot, currentSnapshot } from "./snapshot.js";

const linux = createSnapshot({ name: "Linux", arch: "amd64", version: "6.1.0", pathSeparator: ":" });
const snapshots = [
  linux,
  createSnapshot({ name: "Windows 10", arch: "amd64", version: "10.0", pathSeparator: ";" }),
  createSnapshot({ name: "Windows Me", arch: "x86", version: "4.90", pathSeparator: ";" }),
  createSnapshot({ name: "Mac OS X", arch: "aarch64", version: "14.2", pathSeparator: ":" }),
  createSnapshot({ name: "z/OS", arch: "s390x", version: "2.5", pathSeparator: ":" }),
  createSnapshot({ name: "NetWare", arch: "x86", version: "6.5", pathSeparator: ";" }),
];

describe("OsQuery", () => {
  it("evaluates to false with no criteria", () => {
    expect(new OsQuery().evaluate(linux)).toBe(false);
  });

  it("takes the family from the constructor", () => {
    expect(new OsQuery("UNIX").toCriteria()).toEqual({ family: "unix" });
    expect(new OsQuery("unix").evaluate(linux)).toBe(true);
  });

  it("lowercases every value it stores", () => {
    const query = new OsQuery().setFamily("Unix").setName("Linux").setArch("AMD64").setVersion("6.1.0-RC");

    expect(query.toCriteria()).toEqual({ family: "unix", name: "linux", arch: "amd64", version: "6.1.0-rc" });
  });

  it("returns a frozen copy of its criteria", () => {
    const query = new OsQuery().setName("linux");
    const criteria = query.toCriteria();
    query.setName("windows 10");

    expect(Object.isFrozen(criteria)).toBe(true);
    expect(criteria).toEqual({ name: "linux" });
  });

  it("combines criteria with AND", () => {
    const query = new OsQuery().setFamily("unix").setArch("amd64");

    expect(query.evaluate(linux)).toBe(true);
    expect(query.setArch("aarch64").evaluate(linux)).toBe(false);
  });

  it("rejects missing setter values", () => {
    const missing: string = JSON.parse("null");

    expect(() => new OsQuery().setFamily(missing)).toThrow(InvalidArgumentError);
    expect(() => new OsQuery().setName(missing)).toThrow(InvalidArgumentError);
    expect(() => new OsQuery().setArch(missing)).toThrow(InvalidArgumentError);
    expect(() => new OsQuery().setVersion(missing)).toThrow(InvalidArgumentError);
  });

  it("throws ClassificationError on evaluate for an unknown family", () => {
    const query = new OsQuery("beos");

    expect(() => query.evaluate(linux)).toThrow(ClassificationError);
  });

  it("agrees with classify for every family and snapshot", () => {
    for (const family of validFamilies()) {
      for (const snapshot of snapshots) {
        expect(new OsQuery().setFamily(family).evaluate(snapshot)).toBe(classify(family, snapshot));
      }
    }
  });

  it("evaluates against the current snapshot by default", () => {
    const query = new OsQuery().setName(currentSnapshot().name);

    expect(query.evaluate()).toBe(true);
    expect(query.evaluate()).toBe(matches(query.toCriteria(), currentSnapshot()));
  });
});
