/**
 * Heuristic classification of raw macro text
 *
 * Only three literal shapes are recognized, checked in order:
 * - integers: optional `-`, then decimal without a leading zero, or octal with one;
 *   a bigint once outside the safe integer range
 * - strings: double-quoted identifier characters only
 * - decimals: digits on both sides of `.`, optional `f`/`F` suffix
 *
 * Everything else (hex, suffixed integers, casts, expressions, references to
 * other macros) is left for the compiler.
 */

import { Classification } from "./types";
import { narrowInteger } from "./utils";

const INTEGER = /^(-?)([1-9][0-9]*|0[0-7]*)$/;
const IDENTIFIER_STRING = /^"([a-z_0-9]+)"$/i;
const DECIMAL = /^([0-9]+\.[0-9]+)([Ff]?)$/;

export function classifyRawValue(raw: string): Classification | undefined {
  const integer = INTEGER.exec(raw);
  if (integer) {
    const digits = integer[2];
    const magnitude = BigInt(digits.startsWith("0") ? `0o${digits}` : digits);
    return { type: "int", value: narrowInteger(integer[1] === "-" ? -magnitude : magnitude) };
  }

  const string = IDENTIFIER_STRING.exec(raw);
  if (string) {
    return { type: "string", value: string[1] };
  }

  const decimal = DECIMAL.exec(raw);
  if (decimal) {
    return { type: decimal[2] ? "float" : "double", value: decimal[1] };
  }

  return undefined;
}
