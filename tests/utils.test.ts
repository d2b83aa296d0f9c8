import { describe, it, expect } from "@jest/globals";
import { ConfigurationError } from "../tooling/lib/errors";
import {
  formatValue,
  isStringArray,
  narrowInteger,
  sanitizeIdentifier,
  sharedLibrarySuffix,
  shellSplit,
} from "../tooling/lib/utils";

describe("shellSplit", () => {
  it("should split on whitespace", () => {
    expect(shellSplit("  ccache   gcc\t-m64 ")).toEqual(["ccache", "gcc", "-m64"]);
  });

  it("should keep quoted words together", () => {
    expect(shellSplit(`-DA='x y' -DB="1 2"`)).toEqual(["-DA=x y", "-DB=1 2"]);
  });

  it("should honor backslash escapes", () => {
    expect(shellSplit(`a\\ b "c\\"d" 'e\\f'`)).toEqual(["a b", 'c"d', "e\\f"]);
  });

  it("should keep empty quoted words", () => {
    expect(shellSplit(`a "" b`)).toEqual(["a", "", "b"]);
  });

  it("should return nothing for blank input", () => {
    expect(shellSplit("   ")).toEqual([]);
  });

  it("should reject an unterminated quote", () => {
    expect(() => shellSplit(`-DA="x`)).toThrow(ConfigurationError);
  });
});

describe("isStringArray", () => {
  it("should accept only arrays of strings", () => {
    expect(isStringArray(["a", "b"])).toBe(true);
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(["a", 1])).toBe(false);
    expect(isStringArray("a")).toBe(false);
  });
});

describe("sanitizeIdentifier", () => {
  it("should replace invalid characters", () => {
    expect(sanitizeIdentifier("c++/probe")).toBe("c___probe");
  });

  it("should prefix a leading digit", () => {
    expect(sanitizeIdentifier("1abc")).toBe("_1abc");
  });

  it("should truncate long names", () => {
    expect(sanitizeIdentifier("a".repeat(150))).toHaveLength(100);
  });
});

describe("sharedLibrarySuffix", () => {
  it("should follow the platform", () => {
    expect(sharedLibrarySuffix("linux")).toBe(".so");
    expect(sharedLibrarySuffix("darwin")).toBe(".dylib");
    expect(sharedLibrarySuffix("win32")).toBe(".dll");
    expect(sharedLibrarySuffix("freebsd")).toBe(".so");
  });
});

describe("formatValue", () => {
  it("should render each value kind", () => {
    expect(formatValue(undefined)).toBe("");
    expect(formatValue(42)).toBe("42");
    expect(formatValue("1.3")).toBe("1.3");
    expect(formatValue(9007199254740993n)).toBe("9007199254740993");
    expect(formatValue({ kind: "pointer", address: 0n })).toBe("0x0");
    expect(formatValue({ kind: "pointer", address: 4096n })).toBe("0x1000");
  });
});

describe("narrowInteger", () => {
  it("should narrow only within the safe range", () => {
    expect(narrowInteger(-9007199254740991n)).toBe(-9007199254740991);
    expect(narrowInteger(9007199254740992n)).toBe(9007199254740992n);
  });
});
