/**
 * Tests for the core error types.
 */

import { describe, it, expect } from "vitest";
import {
  ClassificationError,
  ConfigurationError,
  InvalidArgumentError,
  OsFamilyError,
  isOsFamilyError,
  isOsFamilyErrorWithCode,
  requireString,
} from "./errors.js";

describe("ClassificationError", () => {
  it("names the unknown family", () => {
    const error = new ClassificationError("beos");

    expect(error.code).toBe("UNKNOWN_FAMILY");
    expect(error.family).toBe("beos");
    expect(error.message).toBe('Don\'t know how to detect os family "beos"');
    expect(error.name).toBe("ClassificationError");
    expect(error.context).toEqual({ family: "beos" });
  });

  it("extends OsFamilyError and Error", () => {
    const error = new ClassificationError("beos");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(OsFamilyError);
    expect(error).toBeInstanceOf(ClassificationError);
  });
});

describe("InvalidArgumentError", () => {
  it("describes the received value", () => {
    expect(new InvalidArgumentError("name", undefined).message).toBe(
      'Expected a string for "name", received undefined'
    );
    expect(new InvalidArgumentError("arch", null).message).toBe('Expected a string for "arch", received null');
    expect(new InvalidArgumentError("version", 7).message).toBe('Expected a string for "version", received number');
  });

  it("uses the INVALID_ARGUMENT code", () => {
    const error = new InvalidArgumentError("family", undefined);

    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(error.argument).toBe("family");
  });
});

describe("ConfigurationError", () => {
  it("keeps message and context", () => {
    const error = new ConfigurationError("bad config", { path: "/tmp/config.yaml" });

    expect(error.code).toBe("INVALID_CONFIG");
    expect(error.message).toBe("bad config");
    expect(error.context).toEqual({ path: "/tmp/config.yaml" });
  });
});

describe("isOsFamilyError", () => {
  it("returns true for core errors", () => {
    expect(isOsFamilyError(new ClassificationError("beos"))).toBe(true);
    expect(isOsFamilyError(new ConfigurationError("bad"))).toBe(true);
  });

  it("returns false for regular errors and non-errors", () => {
    expect(isOsFamilyError(new Error("test"))).toBe(false);
    expect(isOsFamilyError("UNKNOWN_FAMILY")).toBe(false);
    expect(isOsFamilyError(undefined)).toBe(false);
  });
});

describe("isOsFamilyErrorWithCode", () => {
  it("matches only the given code", () => {
    const error = new InvalidArgumentError("name", undefined);

    expect(isOsFamilyErrorWithCode(error, "INVALID_ARGUMENT")).toBe(true);
    expect(isOsFamilyErrorWithCode(error, "UNKNOWN_FAMILY")).toBe(false);
  });
});

describe("requireString", () => {
  it("returns strings unchanged", () => {
    expect(requireString("Linux", "name")).toBe("Linux");
    expect(requireString("", "name")).toBe("");
  });

  it("throws InvalidArgumentError for anything else", () => {
    expect(() => requireString(undefined, "name")).toThrow(InvalidArgumentError);
    expect(() => requireString(null, "name")).toThrow(InvalidArgumentError);
    expect(() => requireString(42, "name")).toThrow(InvalidArgumentError);
  });
});
