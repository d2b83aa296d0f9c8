/**
 * Audit Trail
 * Records how each macro got its type and value: heuristic, compiler probe, or failure
 */

import { ParseWarning, TypeTag } from "./types";

export type AuditEntryType =
  | "heuristic_classified"
  | "type_resolved"
  | "value_resolved"
  | "resolution_failed"
  | "parse_warning";

export type ResolutionStage = "type" | "value";

export interface AuditEntry {
  timestamp: string;
  type: AuditEntryType;
  macro: string;
  details: Record<string, unknown>;
}

export interface ResolutionFailure {
  expression: string;
  stage: ResolutionStage;
  reason: string;
  stderr?: string;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private failures: Map<string, ResolutionFailure[]> = new Map();
  private warnings: ParseWarning[] = [];

  recordHeuristic(macro: string, type: TypeTag, rawValue: string): void {
    this.push("heuristic_classified", macro, { type, rawValue });
  }

  recordTypeResolution(expression: string, type: TypeTag): void {
    this.push("type_resolved", expression, { type });
  }

  recordValueResolution(expression: string, type: TypeTag, present: boolean): void {
    this.push("value_resolved", expression, { type, present });
  }

  recordFailure(failure: ResolutionFailure): void {
    const existing = this.failures.get(failure.expression) ?? [];
    existing.push(failure);
    this.failures.set(failure.expression, existing);

    this.push("resolution_failed", failure.expression, {
      stage: failure.stage,
      reason: failure.reason,
    });
  }

  recordParseWarning(warning: ParseWarning): void {
    this.warnings.push(warning);
    this.push("parse_warning", "", {
      line: warning.line,
      lineNumber: warning.lineNumber,
    });
  }

  private push(type: AuditEntryType, macro: string, details: Record<string, unknown>): void {
    this.entries.push({
      timestamp: new Date().toISOString(),
      type,
      macro,
      details,
    });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesForMacro(macro: string): AuditEntry[] {
    return this.entries.filter((entry) => entry.macro === macro);
  }

  getFailures(expression: string): ResolutionFailure[] {
    return this.failures.get(expression) ?? [];
  }

  getParseWarnings(): ParseWarning[] {
    return [...this.warnings];
  }

  getSummary(): {
    totalEntries: number;
    heuristicCount: number;
    compilerResolvedCount: number;
    failureCount: number;
    parseWarningCount: number;
  } {
    const count = (type: AuditEntryType) => this.entries.filter((entry) => entry.type === type).length;

    return {
      totalEntries: this.entries.length,
      heuristicCount: count("heuristic_classified"),
      compilerResolvedCount: count("type_resolved") + count("value_resolved"),
      failureCount: count("resolution_failed"),
      parseWarningCount: this.warnings.length,
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): {
    entries: AuditEntry[];
    failures: Record<string, ResolutionFailure[]>;
    parseWarnings: ParseWarning[];
  } {
    const failures: Record<string, ResolutionFailure[]> = {};
    for (const [key, value] of this.failures) {
      failures[key] = value;
    }

    return {
      entries: this.getEntries(),
      failures,
      parseWarnings: this.getParseWarnings(),
    };
  }

  clear(): void {
    this.entries = [];
    this.failures.clear();
    this.warnings = [];
  }
}
