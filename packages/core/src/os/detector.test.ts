import { describe, it, expect, vi } from "vitest";
import { ClassificationError } from "../errors.js";
import { OsDetector } from "./detector.js";
import { createSnapshot, currentSnapshot } from "./snapshot.js";
import { resolveFamily } from "./resolver.js";

vi.mock("./snapshot.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./snapshot.js")>();
  return { ...actual, currentSnapshot: vi.fn(actual.currentSnapshot) };
});

describe("OsDetector", () => {
  it("answers false when no criteria are given", () => {
    expect(OsDetector.isOs()).toBe(false);
  });

  it("matches the current snapshot's own values", () => {
    const snapshot = currentSnapshot();

    expect(OsDetector.isName(snapshot.name)).toBe(true);
    expect(OsDetector.isName(snapshot.name.toUpperCase())).toBe(true);
    expect(OsDetector.isArch(snapshot.arch)).toBe(true);
    expect(OsDetector.isVersion(snapshot.version)).toBe(true);
    expect(OsDetector.isOs(undefined, snapshot.name, snapshot.arch, snapshot.version)).toBe(true);
  });

  it("does not match a name the host cannot have", () => {
    expect(OsDetector.isName("not an operating system")).toBe(false);
  });

  it("belongs to its own current family", () => {
    const family = OsDetector.currentFamily();

    expect(family).toBe(resolveFamily(currentSnapshot()));
    if (family !== null) {
      expect(OsDetector.isFamily(family)).toBe(true);
    }
  });

  it("throws ClassificationError for an unknown family", () => {
    expect(() => OsDetector.isFamily("beos")).toThrow(ClassificationError);
  });

  it("exposes the registry", () => {
    expect(OsDetector.validFamilies().size).toBe(12);
    expect(OsDetector.isValidFamily("z/os")).toBe(true);
    expect(OsDetector.isValidFamily("zos")).toBe(false);
  });

  it("returns the process-wide snapshot", () => {
    expect(OsDetector.snapshot()).toBe(currentSnapshot());
  });

  describe("describe", () => {
    it("reports the resolved and matching families of a snapshot", () => {
      const snapshot = createSnapshot({ name: "z/OS", arch: "s390x", version: "2.5", pathSeparator: ":" });

      expect(OsDetector.describe(snapshot)).toEqual({
        snapshot: { name: "z/os", arch: "s390x", version: "2.5", pathSeparator: ":" },
        family: "z/os",
        families: ["z/os", "unix"],
      });
    });

    it("leaves the host alone when given a snapshot", () => {
      const snapshot = createSnapshot({ name: "Windows 10", arch: "amd64", version: "10.0", pathSeparator: ";" });

      expect(OsDetector.describe(snapshot).family).toBe("winnt");
      expect(vi.mocked(currentSnapshot)).not.toHaveBeenCalled();
    });

    it("describes the host by default", () => {
      const report = OsDetector.describe();

      expect(report.snapshot).toBe(currentSnapshot());
      expect(report.family).toBe(OsDetector.currentFamily());
    });
  });
});
