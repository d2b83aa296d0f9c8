/**
 * A single discovered C/C++ constant with lazily resolved type and value
 */

import { ConfigurationError } from "./errors";
import { ExpressionResolver, isTypeTag } from "./resolver";
import { Classification, ConstantValue, TYPE_TAGS, TypeTag } from "./types";
import { formatValue } from "./utils";

type Cell<T> = { state: "pending" } | { state: "computed"; value: T };

export type ConstantInit = {
  name: string;
  rawValue?: string;
  /** What the compiler evaluates; defaults to the name */
  expression?: string;
  type?: TypeTag;
  value?: ConstantValue;
  classification?: Classification;
  resolver: ExpressionResolver;
};

export type ConstantJSON = {
  name: string;
  rawValue?: string;
  type: TypeTag;
  value?: string | number;
};

export class Constant {
  readonly name: string;
  /** Right-hand side as the preprocessor printed it, kept for diagnostics */
  readonly rawValue?: string;
  readonly expression: string;

  private typeCell: Cell<TypeTag> = { state: "pending" };
  private valueCell: Cell<ConstantValue | undefined> = { state: "pending" };
  private readonly resolver: ExpressionResolver;

  constructor(init: ConstantInit) {
    this.name = init.name;
    this.rawValue = init.rawValue;
    this.expression = init.expression ?? init.name;
    this.resolver = init.resolver;

    const type = init.classification?.type ?? init.type;
    if (type !== undefined) {
      if (!isTypeTag(type)) {
        throw new ConfigurationError(`type should be one of: ${TYPE_TAGS.join(", ")}`);
      }
      this.typeCell = { state: "computed", value: type };
    }

    const value = init.classification ? init.classification.value : init.value;
    if (value !== undefined) {
      this.valueCell = { state: "computed", value };
    }
  }

  type(): TypeTag {
    if (this.typeCell.state === "pending") {
      this.typeCell = { state: "computed", value: this.resolver.resolveType(this.expression) };
    }
    return this.typeCell.value;
  }

  value(): ConstantValue | undefined {
    const type = this.type();
    if (type === "other") {
      return undefined;
    }
    if (this.valueCell.state === "pending") {
      this.valueCell = { state: "computed", value: this.resolver.resolveValue(type, this.expression) };
    }
    return this.valueCell.value;
  }

  /** True once type() has been answered */
  isTypeResolved(): boolean {
    return this.typeCell.state === "computed";
  }

  toJSON(): ConstantJSON {
    const type = this.type();
    const value = this.value();
    const json: ConstantJSON = { name: this.name, rawValue: this.rawValue, type };
    if (typeof value === "number" || typeof value === "string") {
      json.value = value;
    } else if (value !== undefined) {
      json.value = formatValue(value);
    }
    return json;
  }
}
