/**
 * Macro enumeration from the preprocessor's macro dump
 */

import { AuditLog } from "./audit";
import { ToolInvocationError } from "./errors";
import { Logger } from "./logger";
import { succeeded } from "./toolchain";
import { CommandRunner, DiscoveryConfig, EnumerationResult, NamePredicate, ParseWarning, RawMacro } from "./types";

const DEFINE_LINE = /^#define\s+(\S+)(?:\s+(.*?))?\s*$/;

export function isFunctionLike(name: string): boolean {
  return /[()]/.test(name);
}

/**
 * Parse `#define NAME VALUE` lines, keeping preprocessor order.
 * Function-like macros and names rejected by the filter are skipped;
 * lines of any other shape become warnings.
 */
export function parsePreprocessorOutput(output: string, filter: NamePredicate): EnumerationResult {
  const macros: RawMacro[] = [];
  const warnings: ParseWarning[] = [];

  output.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }

    const match = DEFINE_LINE.exec(line);
    if (!match) {
      warnings.push({
        line,
        lineNumber: index + 1,
        message: `unable to parse line: ${line}`,
      });
      return;
    }

    const name = match[1];
    if (isFunctionLike(name) || !filter(name)) {
      return;
    }

    macros.push({ name, rawValue: match[2] ?? "" });
  });

  return { macros, warnings };
}

export function buildEnumerationCommand(config: DiscoveryConfig, sourcePath: string): string[] {
  return [...config.cc, ...config.ppflags, ...config.cflags, ...config.extraCflags, sourcePath];
}

/**
 * Run the preprocessor in macro-dump mode over the aggregated header source
 */
export function enumerateMacros(
  config: DiscoveryConfig,
  sourcePath: string,
  runner: CommandRunner,
  logger: Logger,
  auditLog?: AuditLog
): EnumerationResult {
  const command = buildEnumerationCommand(config, sourcePath);

  return logger.withContext({ phase: "enumerate" }, () => {
    logger.debug("Running preprocessor", { command });
    logger.startTimer("enumerate");

    const result = runner(command, { timeoutMs: config.timeoutMs });
    if (!succeeded(result)) {
      const stderr = result.error ? `${result.stderr}${result.error.message}` : result.stderr;
      logger.error("Preprocessor failed", { command, status: result.status, signal: result.signal });
      throw new ToolInvocationError(command, stderr, result.status, result.signal);
    }

    const enumeration = parsePreprocessorOutput(result.stdout, config.filter);
    for (const warning of enumeration.warnings) {
      logger.warn(warning.message, { lineNumber: warning.lineNumber });
      auditLog?.recordParseWarning(warning);
    }

    logger.endTimer("enumerate", `Found ${enumeration.macros.length} macro(s)`);
    return enumeration;
  });
}
