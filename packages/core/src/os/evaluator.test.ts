import { describe, it, expect } from "vitest";
import { ClassificationError, InvalidArgumentError } from "../errors.js";
import { hasCriteria, matches, tryMatches, type OsCriteria } from "./evaluator.js";
import { createSnapshot } from "./snapshot.js";

const linux = createSnapshot({ name: "Linux", arch: "amd64", version: "6.1.0-18", pathSeparator: ":" });
const windows = createSnapshot({ name: "Windows 10", arch: "amd64", version: "10.0", pathSeparator: ";" });

describe("hasCriteria", () => {
  it("is false for empty criteria", () => {
    expect(hasCriteria({})).toBe(false);
    expect(hasCriteria({ family: undefined, name: undefined })).toBe(false);
  });

  it("treats null fields as absent", () => {
    const criteria: OsCriteria = JSON.parse('{"family": null, "name": null}');

    expect(hasCriteria(criteria)).toBe(false);
  });

  it("is true when any field is present", () => {
    expect(hasCriteria({ version: "1.0" })).toBe(true);
    expect(hasCriteria({ name: "" })).toBe(true);
  });
});

describe("matches", () => {
  it("never matches without criteria", () => {
    expect(matches({}, linux)).toBe(false);
    expect(matches({}, windows)).toBe(false);
  });

  it("compares the name exactly after lowercasing", () => {
    expect(matches({ name: "linux" }, linux)).toBe(true);
    expect(matches({ name: "LINUX" }, linux)).toBe(true);
    expect(matches({ name: "linux" }, windows)).toBe(false);
    expect(matches({ name: "lin" }, linux)).toBe(false);
  });

  it("compares arch and version exactly", () => {
    expect(matches({ arch: "AMD64" }, linux)).toBe(true);
    expect(matches({ arch: "x86" }, linux)).toBe(false);
    expect(matches({ version: "6.1.0-18" }, linux)).toBe(true);
    expect(matches({ version: "6.1" }, linux)).toBe(false);
  });

  it("classifies the family case-insensitively", () => {
    expect(matches({ family: "UNIX" }, linux)).toBe(true);
    expect(matches({ family: "winnt" }, windows)).toBe(true);
    expect(matches({ family: "unix" }, windows)).toBe(false);
  });

  it("requires every present criterion", () => {
    expect(matches({ family: "unix", name: "linux", arch: "amd64", version: "6.1.0-18" }, linux)).toBe(true);
    expect(matches({ family: "unix", arch: "aarch64" }, linux)).toBe(false);
    expect(matches({ family: "windows", name: "linux" }, linux)).toBe(false);
  });

  it("propagates ClassificationError for an unknown family", () => {
    expect(() => matches({ family: "beos" }, linux)).toThrow(ClassificationError);
  });

  it("throws ClassificationError even when another criterion fails", () => {
    expect(() => matches({ family: "beos", name: "windows 10" }, linux)).toThrow(ClassificationError);
  });

  it("rejects non-string criteria", () => {
    const criteria: OsCriteria = JSON.parse('{"name": 42}');

    expect(() => matches(criteria, linux)).toThrow(InvalidArgumentError);
  });
});

describe("tryMatches", () => {
  it("wraps a successful evaluation", () => {
    expect(tryMatches({ family: "unix" }, linux)).toEqual({ success: true, data: true });
    expect(tryMatches({}, linux)).toEqual({ success: true, data: false });
  });

  it("returns the classification error instead of throwing", () => {
    const result = tryMatches({ family: "beos" }, linux);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ClassificationError);
      expect(result.error.code).toBe("UNKNOWN_FAMILY");
    }
  });
});
