/**
 * Configuration loading, environment defaults and option validation
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { config as loadEnv } from "dotenv";
import { ConfigurationError } from "./errors";
import { isLogLevel, LogLevel } from "./logger";
import { Config, DiscoveryConfig, DiscoveryOptions, Lang, NamePredicate } from "./types";
import { isStringArray, shellSplit } from "./utils";

export const CONFIG_FILE_NAME = "macroprobe.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_LANG: Lang = "c";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
export const DEFAULT_FILTER: NamePredicate = (name) => /^[^_]/.test(name);

type Env = Record<string, string | undefined>;

/**
 * Compiler command: MACROPROBE_CC, then CC, then plain `cc`
 */
export function defaultCc(env: Env = process.env): string[] {
  const words = shellSplit(env.MACROPROBE_CC ?? env.CC ?? "");
  return words.length > 0 ? words : ["cc"];
}

/**
 * Compiler flags: MACROPROBE_CFLAGS, then CFLAGS, else none
 */
export function defaultCflags(env: Env = process.env): string[] {
  return shellSplit(env.MACROPROBE_CFLAGS ?? env.CFLAGS ?? "");
}

export function defaultPpflags(lang: Lang): string[] {
  return ["-dM", "-E", "-x", lang];
}

export function isLang(value: unknown): value is Lang {
  return value === "c" || value === "c++";
}

function stringList(name: string, value: unknown, fallback: () => string[]): string[] {
  if (value === undefined) {
    return fallback();
  }
  if (!isStringArray(value)) {
    throw new ConfigurationError(`${name} should be an array of strings`);
  }
  return [...value];
}

function toFilter(value: unknown): NamePredicate {
  if (value === undefined) {
    return DEFAULT_FILTER;
  }
  if (value instanceof RegExp) {
    // test() on a g or y pattern advances lastIndex
    const pattern = new RegExp(value.source, value.flags.replace("g", "").replace("y", ""));
    return (name) => pattern.test(name);
  }
  if (typeof value === "function") {
    return (name) => value(name) === true;
  }
  throw new ConfigurationError("filter should be a RegExp or a function");
}

/**
 * Validate caller options into an immutable run configuration
 */
export function toDiscoveryConfig(options: DiscoveryOptions, env: Env = process.env): DiscoveryConfig {
  const lang = options.lang ?? DEFAULT_LANG;
  if (!isLang(lang)) {
    throw new ConfigurationError("lang should be one of c or c++");
  }

  const cc = stringList("cc", options.cc, () => defaultCc(env));
  if (cc.length === 0) {
    throw new ConfigurationError("cc should name a compiler");
  }

  let timeoutMs: number | undefined;
  if (options.timeoutMs !== undefined) {
    if (typeof options.timeoutMs !== "number" || !(options.timeoutMs > 0)) {
      throw new ConfigurationError("timeoutMs should be a positive number");
    }
    timeoutMs = options.timeoutMs;
  }

  return Object.freeze({
    headers: Object.freeze(stringList("headers", options.headers, () => [])),
    lang,
    cc: Object.freeze(cc),
    ppflags: Object.freeze(stringList("ppflags", options.ppflags, () => defaultPpflags(lang))),
    cflags: Object.freeze(stringList("cflags", options.cflags, () => defaultCflags(env))),
    extraCflags: Object.freeze(stringList("extraCflags", options.extraCflags, () => [])),
    filter: toFilter(options.filter),
    timeoutMs,
  });
}

/**
 * Keep the recognized keys of a parsed config file, dropping mistyped ones
 */
export function parseConfig(raw: unknown): Config {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const entries = new Map(Object.entries(raw));
  const config: Config = {};
  const headers = entries.get("headers");
  const lang = entries.get("lang");
  const cc = entries.get("cc");
  const cflags = entries.get("cflags");
  const extraCflags = entries.get("extraCflags");
  const filter = entries.get("filter");
  const envSearchPaths = entries.get("envSearchPaths");
  const logLevel = entries.get("logLevel");
  const timeoutMs = entries.get("timeoutMs");

  if (isStringArray(headers)) config.headers = headers;
  if (isLang(lang)) config.lang = lang;
  if (typeof cc === "string" || isStringArray(cc)) config.cc = cc;
  if (typeof cflags === "string" || isStringArray(cflags)) config.cflags = cflags;
  if (isStringArray(extraCflags)) config.extraCflags = extraCflags;
  if (typeof filter === "string") config.filter = filter;
  if (isStringArray(envSearchPaths)) config.envSearchPaths = envSearchPaths;
  if (isLogLevel(logLevel)) config.logLevel = logLevel;
  if (typeof timeoutMs === "number") config.timeoutMs = timeoutMs;

  return config;
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string = join(projectRoot, CONFIG_FILE_NAME)) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    try {
      return parseConfig(JSON.parse(readFileSync(configPath, "utf8")));
    } catch {
      return {};
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load .env files into process.env without overriding variables already set
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      loadEnv({ path: expanded, override: false });
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getLogLevel(): LogLevel {
    return isLogLevel(this.config.logLevel) ? this.config.logLevel : DEFAULT_LOG_LEVEL;
  }

  getConfig(): Config {
    return this.config;
  }

  /**
   * Merge file configuration with command-line overrides.
   * String-valued cc and cflags are split into words.
   */
  toDiscoveryOptions(overrides: DiscoveryOptions = {}): DiscoveryOptions {
    const file = this.config;
    const words = (value: unknown): unknown => (typeof value === "string" ? shellSplit(value) : value);
    const extraCflags = overrides.extraCflags ?? file.extraCflags;

    return {
      headers: overrides.headers ?? file.headers,
      lang: overrides.lang ?? file.lang,
      cc: words(overrides.cc ?? file.cc),
      ppflags: overrides.ppflags,
      cflags: words(overrides.cflags ?? file.cflags),
      extraCflags,
      filter: overrides.filter ?? (typeof file.filter === "string" ? new RegExp(file.filter) : undefined),
      timeoutMs: overrides.timeoutMs ?? file.timeoutMs,
    };
  }
}
