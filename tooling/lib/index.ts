/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils";
export * from "./logger";
export * from "./audit";
export * from "./toolchain";
export * from "./headers";
export * from "./enumerator";
export * from "./classifier";
export * from "./templates";
export * from "./probe";
export * from "./resolver";
export * from "./constant";
export * from "./discovery";
export * from "./cli";
