/**
 * Macro discovery run
 *
 * Aggregates the configured headers, enumerates their macros through the
 * preprocessor, classifies what it can from the text, and hands back
 * Constants whose remaining questions are answered lazily by the compiler.
 */

import { tmpdir } from "node:os";
import { AuditLog } from "./audit";
import { classifyRawValue } from "./classifier";
import { toDiscoveryConfig } from "./config";
import { Constant } from "./constant";
import { enumerateMacros } from "./enumerator";
import { writeHeaderSource } from "./headers";
import { Logger } from "./logger";
import { LibraryLoader, loadWithKoffi, ProbeBuilder } from "./probe";
import { CompilerExpressionResolver, ExpressionResolver } from "./resolver";
import { ProbeTemplates } from "./templates";
import { runCommand } from "./toolchain";
import { CommandRunner, ConstantValue, DiscoveryConfig, DiscoveryOptions, ParseWarning, TypeTag } from "./types";

export type DiscoveryDependencies = {
  runner?: CommandRunner;
  loader?: LibraryLoader;
  resolver?: ExpressionResolver;
  logger?: Logger;
  auditLog?: AuditLog;
  tempDir?: string;
};

export class MacroDiscovery {
  readonly config: DiscoveryConfig;
  readonly resolver: ExpressionResolver;
  readonly logger: Logger;
  readonly auditLog: AuditLog;

  private readonly runner: CommandRunner;
  private readonly tempDir: string;
  private lastWarnings: ParseWarning[] = [];

  constructor(options: DiscoveryOptions = {}, deps: DiscoveryDependencies = {}) {
    this.config = toDiscoveryConfig(options);
    this.runner = deps.runner ?? runCommand;
    this.logger = deps.logger ?? new Logger("info", false);
    this.auditLog = deps.auditLog ?? new AuditLog();
    this.tempDir = deps.tempDir ?? tmpdir();
    this.resolver =
      deps.resolver ??
      new CompilerExpressionResolver(
        new ProbeTemplates(this.config.headers, this.config.lang),
        new ProbeBuilder(this.config, this.runner, deps.loader ?? loadWithKoffi, this.logger, this.tempDir),
        this.logger,
        this.auditLog
      );
  }

  /** Parse warnings from the most recent run */
  get warnings(): ParseWarning[] {
    return [...this.lastWarnings];
  }

  /**
   * Enumerate and classify every macro the headers define, in preprocessor order
   */
  run(): Constant[] {
    const source = writeHeaderSource(this.config.headers, this.config.lang, this.tempDir);

    try {
      const { macros, warnings } = enumerateMacros(this.config, source.path, this.runner, this.logger, this.auditLog);
      this.lastWarnings = warnings;

      return macros.map(({ name, rawValue }) => {
        const classification = classifyRawValue(rawValue);
        if (classification) {
          this.auditLog.recordHeuristic(name, classification.type, rawValue);
        }
        return new Constant({ name, rawValue, classification, resolver: this.resolver });
      });
    } finally {
      source.dispose();
    }
  }

  /**
   * Same as run(), keyed by name. A redefinition replaces the earlier entry.
   */
  discover(): Map<string, Constant> {
    const result = new Map<string, Constant>();
    for (const constant of this.run()) {
      result.set(constant.name, constant);
    }
    return result;
  }

  computeExpressionType(expression: string): TypeTag {
    return this.resolver.resolveType(expression);
  }

  computeExpressionValue(type: TypeTag, expression: string): ConstantValue | undefined {
    return this.resolver.resolveValue(type, expression);
  }

  /**
   * A constant for a bare C expression rather than a discovered macro
   */
  constant(expression: string): Constant {
    return new Constant({
      name: expression,
      rawValue: expression,
      expression,
      classification: classifyRawValue(expression),
      resolver: this.resolver,
    });
  }
}
