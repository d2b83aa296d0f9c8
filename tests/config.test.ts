/**
 * Test suite for ConfigManager and option validation
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import {
  ConfigManager,
  DEFAULT_ENV_SEARCH_PATHS,
  DEFAULT_FILTER,
  defaultCc,
  defaultCflags,
  parseConfig,
  toDiscoveryConfig,
} from "../tooling/lib/config";
import { ConfigurationError } from "../tooling/lib/errors";
import { writeFileSync, existsSync, mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

describe("ConfigManager", () => {
  let configPath: string;
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = join(tmpdir(), `project-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    mkdirSync(projectRoot, { recursive: true });
    configPath = join(projectRoot, "macroprobe.config.json");
  });

  afterEach(() => {
    if (existsSync(projectRoot)) {
      rmSync(projectRoot, { recursive: true, force: true });
    }
  });

  it("should load defaults when the file does not exist", () => {
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.getConfig()).toEqual({});
    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
    expect(manager.getLogLevel()).toBe("info");
  });

  it("should load a custom config from the default location", () => {
    const customConfig = {
      headers: ["stdio.h"],
      lang: "c++",
      cc: "clang -m64",
      extraCflags: ["-I/opt/include"],
      logLevel: "debug",
      timeoutMs: 5000,
    };

    writeFileSync(configPath, JSON.stringify(customConfig), "utf8");
    const manager = new ConfigManager(projectRoot);

    expect(manager.getConfig()).toEqual(customConfig);
    expect(manager.getLogLevel()).toBe("debug");
  });

  it("should drop mistyped keys", () => {
    writeFileSync(configPath, JSON.stringify({ headers: "stdio.h", lang: "go", timeoutMs: 10 }), "utf8");
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.getConfig()).toEqual({ timeoutMs: 10 });
  });

  it("should handle invalid JSON gracefully", () => {
    writeFileSync(configPath, "{ invalid json }", "utf8");
    const manager = new ConfigManager(projectRoot, configPath);

    expect(manager.getEnvSearchPaths()).toEqual(DEFAULT_ENV_SEARCH_PATHS);
  });

  it("should expand relative paths", () => {
    const manager = new ConfigManager(projectRoot, configPath);
    expect(manager.expandPath("subdir/file.txt")).toBe(join(projectRoot, "subdir/file.txt"));
  });

  it("should expand home directory paths", () => {
    const manager = new ConfigManager(projectRoot, configPath);
    const expanded = manager.expandPath("~/Documents/test.txt");

    expect(expanded).toContain("Documents/test.txt");
    expect(expanded).not.toContain("~");
  });

  it("should leave absolute paths unchanged", () => {
    const manager = new ConfigManager(projectRoot, configPath);
    expect(manager.expandPath("/absolute/path/to/file.txt")).toBe("/absolute/path/to/file.txt");
  });

  it("should load .env files without overriding existing variables", () => {
    writeFileSync(join(projectRoot, ".env"), "MACROPROBE_TEST_FRESH=from-file\nMACROPROBE_TEST_SET=from-file\n", "utf8");
    process.env.MACROPROBE_TEST_SET = "already-set";

    try {
      const manager = new ConfigManager(projectRoot, configPath);
      expect(manager.loadEnvironment()).toEqual([join(projectRoot, ".env")]);
      expect(process.env.MACROPROBE_TEST_FRESH).toBe("from-file");
      expect(process.env.MACROPROBE_TEST_SET).toBe("already-set");
    } finally {
      delete process.env.MACROPROBE_TEST_FRESH;
      delete process.env.MACROPROBE_TEST_SET;
    }
  });

  it("should merge file config with overrides", () => {
    writeFileSync(
      configPath,
      JSON.stringify({ headers: ["a.h"], cc: "ccache gcc", cflags: "-O2 -g", filter: "^SIG" }),
      "utf8"
    );
    const manager = new ConfigManager(projectRoot, configPath);
    const options = manager.toDiscoveryOptions({ headers: ["b.h"] });

    expect(options.headers).toEqual(["b.h"]);
    expect(options.cc).toEqual(["ccache", "gcc"]);
    expect(options.cflags).toEqual(["-O2", "-g"]);
    expect(options.filter).toBeInstanceOf(RegExp);

    const config = toDiscoveryConfig(options);
    expect(config.filter("SIGINT")).toBe(true);
    expect(config.filter("EINTR")).toBe(false);
  });
});

describe("parseConfig", () => {
  it("should ignore non-object input", () => {
    expect(parseConfig([1, 2])).toEqual({});
    expect(parseConfig("text")).toEqual({});
    expect(parseConfig(null)).toEqual({});
  });
});

describe("environment defaults", () => {
  it("should prefer MACROPROBE_CC over CC", () => {
    expect(defaultCc({ MACROPROBE_CC: "clang -m32", CC: "gcc" })).toEqual(["clang", "-m32"]);
    expect(defaultCc({ CC: "gcc" })).toEqual(["gcc"]);
    expect(defaultCc({})).toEqual(["cc"]);
  });

  it("should split quoted compiler flags", () => {
    expect(defaultCflags({ CFLAGS: `-DNAME="a b" -O2` })).toEqual(["-DNAME=a b", "-O2"]);
    expect(defaultCflags({})).toEqual([]);
  });
});

describe("toDiscoveryConfig", () => {
  const env = { CC: "gcc", CFLAGS: "-O1" };

  it("should fill defaults", () => {
    const config = toDiscoveryConfig({}, env);

    expect(config.headers).toEqual([]);
    expect(config.lang).toBe("c");
    expect(config.cc).toEqual(["gcc"]);
    expect(config.cflags).toEqual(["-O1"]);
    expect(config.extraCflags).toEqual([]);
    expect(config.ppflags).toEqual(["-dM", "-E", "-x", "c"]);
    expect(config.timeoutMs).toBeUndefined();
  });

  it("should keep explicit ppflags", () => {
    expect(toDiscoveryConfig({ ppflags: ["-dM", "-E"] }, env).ppflags).toEqual(["-dM", "-E"]);
  });

  it("should reject names starting with an underscore by default", () => {
    expect(DEFAULT_FILTER("_X")).toBe(false);
    expect(DEFAULT_FILTER("X_")).toBe(true);
  });

  it("should accept a predicate filter", () => {
    const config = toDiscoveryConfig({ filter: (name: string) => name.length > 2 }, env);

    expect(config.filter("ABC")).toBe(true);
    expect(config.filter("AB")).toBe(false);
  });

  it("should test a global RegExp filter without state", () => {
    const config = toDiscoveryConfig({ filter: /^A/g }, env);

    expect(config.filter("AB")).toBe(true);
    expect(config.filter("AC")).toBe(true);
  });

  it("should reject invalid options", () => {
    expect(() => toDiscoveryConfig({ lang: "fortran" }, env)).toThrow(ConfigurationError);
    expect(() => toDiscoveryConfig({ cflags: "-O2" }, env)).toThrow("cflags should be an array of strings");
    expect(() => toDiscoveryConfig({ headers: [1] }, env)).toThrow("headers should be an array of strings");
    expect(() => toDiscoveryConfig({ cc: [] }, env)).toThrow("cc should name a compiler");
    expect(() => toDiscoveryConfig({ filter: "^A" }, env)).toThrow("filter should be a RegExp or a function");
    expect(() => toDiscoveryConfig({ timeoutMs: -1 }, env)).toThrow("timeoutMs should be a positive number");
  });
});
