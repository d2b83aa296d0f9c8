import { describe, it, expect } from "@jest/globals";
import { formatConstantLine, formatConstants, parseCliArgs } from "../tooling/lib/cli";
import { Constant } from "../tooling/lib/constant";
import { ConfigurationError } from "../tooling/lib/errors";
import { FakeResolver } from "./fixtures/toolchain.fixtures";

describe("parseCliArgs", () => {
  it("should collect headers and defaults", () => {
    expect(parseCliArgs(["stdio.h", "errno.h"])).toEqual({
      headers: ["stdio.h", "errno.h"],
      cflags: [],
      includeDirs: [],
      resolve: false,
      json: false,
      help: false,
    });
  });

  it("should read every option", () => {
    const options = parseCliArgs([
      "--lang",
      "c++",
      "--cc",
      "clang -m64",
      "--cflag",
      "-DX=1",
      "--cflag",
      "-O2",
      "-I",
      "/opt/a",
      "-I/opt/b",
      "--filter",
      "^E",
      "--resolve",
      "--json",
      "--config",
      "probe.json",
      "--log-level",
      "debug",
      "errno.h",
    ]);

    expect(options).toEqual({
      headers: ["errno.h"],
      lang: "c++",
      cc: "clang -m64",
      cflags: ["-DX=1", "-O2"],
      includeDirs: ["/opt/a", "/opt/b"],
      filter: "^E",
      resolve: true,
      json: true,
      configPath: "probe.json",
      logLevel: "debug",
      help: false,
    });
  });

  it("should recognize help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
    expect(parseCliArgs(["--help"]).help).toBe(true);
  });

  it("should reject unknown options", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow(ConfigurationError);
  });

  it("should reject a missing value", () => {
    expect(() => parseCliArgs(["--cc"])).toThrow("--cc requires a value");
  });

  it("should reject an unknown log level", () => {
    expect(() => parseCliArgs(["--log-level", "loud"])).toThrow("unknown log level: loud");
  });
});

describe("formatConstants", () => {
  const resolver = new FakeResolver({ SUM: "int" }, { SUM: 3 });

  const literal = () =>
    new Constant({ name: "FOO", rawValue: "1", classification: { type: "int", value: 1 }, resolver });
  const pending = () => new Constant({ name: "SUM", rawValue: "(1+2)", resolver });

  it("should print a question mark for unresolved types", () => {
    expect(formatConstantLine(pending(), false)).toBe("SUM\t?\t(1+2)");
  });

  it("should resolve types when asked", () => {
    expect(formatConstantLine(pending(), true)).toBe("SUM\tint\t3");
  });

  it("should print heuristic results directly", () => {
    expect(formatConstants([literal(), pending()], false, false)).toBe("FOO\tint\t1\nSUM\t?\t(1+2)");
  });

  it("should print JSON rows", () => {
    const rows: unknown = JSON.parse(formatConstants([literal(), pending()], false, true));

    expect(rows).toEqual([
      { name: "FOO", rawValue: "1", type: "int", value: 1 },
      { name: "SUM", rawValue: "(1+2)" },
    ]);
  });

  it("should print other without a value", () => {
    const code = new Constant({ name: "LOOP", rawValue: "do {} while (0)", resolver });
    expect(formatConstantLine(code, true)).toBe("LOOP\tother\t");
  });
});
