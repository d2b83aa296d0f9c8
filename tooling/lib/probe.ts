/**
 * Probe building and loading
 *
 * A probe source is compiled into a shared library inside its own temporary
 * directory, loaded, called once, unloaded, and deleted. Nothing survives the call.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as koffi from "koffi";
import { ProbeBuildError, ProbeLoadError } from "./errors";
import { sourceSuffix } from "./headers";
import { Logger } from "./logger";
import { succeeded } from "./toolchain";
import { CommandRunner, DiscoveryConfig, OpaquePointer } from "./types";
import { sanitizeIdentifier, sharedLibrarySuffix } from "./utils";

export type NativeReturnType = "const char *" | "void *" | "int" | "long" | "float" | "double";

export type NativeValue = number | bigint | string | null | OpaquePointer;

export interface NativeLibrary {
  call(symbol: string, returns: NativeReturnType): NativeValue;
  close(): void;
}

export type LibraryLoader = (path: string) => NativeLibrary;

/**
 * Normalize what koffi hands back for a return type
 */
export function toNativeValue(raw: unknown, returns: NativeReturnType): NativeValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (returns === "void *") {
    return { kind: "pointer", address: koffi.address(raw) };
  }
  if (typeof raw === "number" || typeof raw === "bigint" || typeof raw === "string") {
    return raw;
  }
  throw new Error(`unexpected ${typeof raw} returned for ${returns}`);
}

/**
 * Load a shared library through koffi
 */
export const loadWithKoffi: LibraryLoader = (path) => {
  const lib = koffi.load(path);
  return {
    call: (symbol, returns) => toNativeValue(lib.func(symbol, returns, [])(), returns),
    close: () => lib.unload(),
  };
};

export type ProbeRequest = {
  kind: string;
  source: string;
  symbol: string;
  returns: NativeReturnType;
};

export class ProbeBuilder {
  private counter = 0;

  constructor(
    private readonly config: DiscoveryConfig,
    private readonly runner: CommandRunner,
    private readonly loader: LibraryLoader,
    private readonly logger: Logger,
    private readonly baseDir: string = tmpdir()
  ) {}

  /**
   * File stem unique to this process and call
   */
  nextName(kind: string): string {
    this.counter += 1;
    return `${sanitizeIdentifier(kind)}${process.pid}_${this.counter}`;
  }

  buildCommand(sourcePath: string, libraryPath: string): string[] {
    return [
      ...this.config.cc,
      ...this.config.cflags,
      ...this.config.extraCflags,
      "-shared",
      "-fPIC",
      "-o",
      libraryPath,
      "-x",
      this.config.lang,
      sourcePath,
    ];
  }

  /**
   * Compile, load, and call the probe's single symbol
   */
  run(request: ProbeRequest): NativeValue {
    const stem = this.nextName(request.kind);
    const dir = mkdtempSync(join(this.baseDir, `${stem}-`));

    try {
      const sourcePath = join(dir, `${stem}${sourceSuffix(this.config.lang)}`);
      const libraryPath = join(dir, `${stem}${sharedLibrarySuffix()}`);
      writeFileSync(sourcePath, request.source, "utf8");

      const command = this.buildCommand(sourcePath, libraryPath);
      this.logger.debug("Building probe", { command });
      const result = this.runner(command, { timeoutMs: this.config.timeoutMs });
      if (!succeeded(result)) {
        const stderr = result.error ? `${result.stderr}${result.error.message}` : result.stderr;
        throw new ProbeBuildError(command, stderr);
      }

      return this.invoke(libraryPath, request);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }

  private invoke(libraryPath: string, request: ProbeRequest): NativeValue {
    let library: NativeLibrary;
    try {
      library = this.loader(libraryPath);
    } catch (error) {
      throw new ProbeLoadError(libraryPath, error);
    }

    try {
      return library.call(request.symbol, request.returns);
    } catch (error) {
      throw new ProbeLoadError(libraryPath, error);
    } finally {
      library.close();
    }
  }
}
