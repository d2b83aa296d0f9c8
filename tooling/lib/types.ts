/**
 * Shared type definitions for the macro discovery pipeline
 */

import type { LogLevel } from "./logger";

export const TYPE_TAGS = ["int", "long", "float", "double", "string", "pointer", "other"] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export type ScalarTypeTag = Exclude<TypeTag, "other">;

export type Lang = "c" | "c++";

export type OpaquePointer = {
  kind: "pointer";
  address: bigint;
};

/**
 * Host value of a constant. Integers are numbers, or bigints outside the safe range.
 * A float or double read from the macro text stays as its decimal text ("1.3");
 * one computed by the compiler is a number, so the same tag may carry either.
 */
export type ConstantValue = number | bigint | string | OpaquePointer;

export type NamePredicate = (name: string) => boolean;

/**
 * Options accepted from callers; validated into a DiscoveryConfig
 */
export type DiscoveryOptions = {
  headers?: unknown;
  lang?: unknown;
  cc?: unknown;
  ppflags?: unknown;
  cflags?: unknown;
  extraCflags?: unknown;
  filter?: unknown;
  timeoutMs?: unknown;
};

export type DiscoveryConfig = Readonly<{
  headers: readonly string[];
  lang: Lang;
  cc: readonly string[];
  ppflags: readonly string[];
  cflags: readonly string[];
  extraCflags: readonly string[];
  filter: NamePredicate;
  timeoutMs?: number;
}>;

/**
 * Contents of macroprobe.config.json
 */
export type Config = {
  headers?: string[];
  lang?: Lang;
  cc?: string[] | string;
  cflags?: string[] | string;
  extraCflags?: string[];
  filter?: string;
  envSearchPaths?: string[];
  logLevel?: LogLevel;
  timeoutMs?: number;
};

export type RawMacro = {
  name: string;
  rawValue: string;
};

export type Classification = {
  type: ScalarTypeTag;
  value: ConstantValue;
};

export type CommandResult = {
  command: string[];
  stdout: string;
  stderr: string;
  status: number | null;
  signal: string | null;
  error?: Error;
};

export type CommandRunner = (command: string[], options?: { timeoutMs?: number }) => CommandResult;

export type ParseWarning = {
  line: string;
  lineNumber: number;
  message: string;
};

export type EnumerationResult = {
  macros: RawMacro[];
  warnings: ParseWarning[];
};
