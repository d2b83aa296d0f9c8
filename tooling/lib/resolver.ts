/**
 * Compiler-assisted expression resolution
 *
 * The compiler is asked two questions about an expression: what is its static
 * type, and what value does it evaluate to. Failures never escape: an
 * unanswerable type question yields "other", an unanswerable value question
 * yields undefined.
 */

import { AuditLog, ResolutionStage } from "./audit";
import { ConfigurationError, describeError, ProbeBuildError } from "./errors";
import { Logger } from "./logger";
import { NativeReturnType, NativeValue, ProbeBuilder } from "./probe";
import { ProbeTemplates, TYPE_PROBE_SYMBOL, VALUE_PROBE_SYMBOL } from "./templates";
import { ConstantValue, ScalarTypeTag, TYPE_TAGS, TypeTag } from "./types";
import { narrowInteger } from "./utils";

export interface ExpressionResolver {
  resolveType(expression: string): TypeTag;
  resolveValue(type: TypeTag, expression: string): ConstantValue | undefined;
}

export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === "string" && TYPE_TAGS.some((tag) => tag === value);
}

/**
 * Reject "other" before any probe is built
 */
export function assertScalarType(type: TypeTag): ScalarTypeTag {
  if (type === "other") {
    throw new ConfigurationError("cannot compute a value for type other");
  }
  if (!isTypeTag(type)) {
    throw new ConfigurationError(`type should be one of: ${TYPE_TAGS.join(", ")}`);
  }
  return type;
}

/**
 * Map a probe's native return value onto the host representation for a type
 */
export function decodeNativeValue(type: ScalarTypeTag, raw: NativeValue): ConstantValue | undefined {
  switch (type) {
    case "pointer":
      if (raw === null) {
        return { kind: "pointer", address: 0n };
      }
      return typeof raw === "object" ? raw : undefined;
    case "string":
      return typeof raw === "string" ? raw : undefined;
    case "long":
      if (typeof raw === "bigint") {
        return narrowInteger(raw);
      }
      return typeof raw === "number" ? raw : undefined;
    case "int":
    case "float":
    case "double":
      return typeof raw === "number" ? raw : undefined;
  }
}

export class CompilerExpressionResolver implements ExpressionResolver {
  constructor(
    private readonly templates: ProbeTemplates,
    private readonly builder: ProbeBuilder,
    private readonly logger: Logger,
    private readonly auditLog?: AuditLog
  ) {}

  resolveType(expression: string): TypeTag {
    return this.logger.withContext({ macro: expression, probe: "type" }, () => {
      try {
        const answer = this.builder.run({
          kind: "cet",
          source: this.templates.typeProbe(expression),
          symbol: TYPE_PROBE_SYMBOL,
          returns: "const char *",
        });
        if (!isTypeTag(answer) || answer === "other") {
          throw new Error(`probe answered ${String(answer)}`);
        }

        this.logger.debug(`Resolved type ${answer}`);
        this.auditLog?.recordTypeResolution(expression, answer);
        return answer;
      } catch (error) {
        this.fail("type", expression, error);
        return "other";
      }
    });
  }

  resolveValue(type: TypeTag, expression: string): ConstantValue | undefined {
    const scalar = assertScalarType(type);
    const returns = nativeReturnType(scalar);

    return this.logger.withContext({ macro: expression, probe: "value" }, () => {
      try {
        const raw = this.builder.run({
          kind: "cev",
          source: this.templates.valueProbe(scalar, expression),
          symbol: VALUE_PROBE_SYMBOL,
          returns,
        });
        const value = decodeNativeValue(scalar, raw);

        this.logger.debug("Resolved value", { type: scalar, present: value !== undefined });
        this.auditLog?.recordValueResolution(expression, scalar, value !== undefined);
        return value;
      } catch (error) {
        this.fail("value", expression, error);
        return undefined;
      }
    });
  }

  private fail(stage: ResolutionStage, expression: string, error: unknown): void {
    const stderr = error instanceof ProbeBuildError ? error.stderr : undefined;
    this.logger.debug(`Unable to resolve ${stage}`, { reason: describeError(error) });
    this.auditLog?.recordFailure({ expression, stage, reason: describeError(error), stderr });
  }
}

function nativeReturnType(type: ScalarTypeTag): NativeReturnType {
  switch (type) {
    case "string":
      return "const char *";
    case "pointer":
      return "void *";
    default:
      return type;
  }
}
