/**
 * Utility functions used across the discovery pipeline
 */

import { ConfigurationError } from "./errors";

/**
 * Split a command string into words using POSIX shell quoting rules
 * ("ccache gcc -m64" becomes ["ccache", "gcc", "-m64"])
 */
export function shellSplit(text: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | undefined;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];

    if (quote === "'") {
      if (ch === "'") {
        quote = undefined;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = undefined;
      } else if (ch === "\\" && i + 1 < text.length && '"\\$`'.includes(text[i + 1])) {
        current += text[i + 1];
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === "\\") {
      if (i + 1 < text.length) {
        current += text[i + 1];
        i += 1;
      }
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new ConfigurationError(`unterminated ${quote} quote in: ${text}`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Sanitize text for use in a file name
 */
export function sanitizeIdentifier(raw: string): string {
  return raw
    .replace(/[^a-zA-Z0-9_]/g, "_")
    .replace(/^(\d)/, "_$1")
    .substring(0, 100);
}

/**
 * Shared library file suffix for a platform
 */
export function sharedLibrarySuffix(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case "darwin":
      return ".dylib";
    case "win32":
      return ".dll";
    default:
      return ".so";
  }
}

/**
 * Render a value for display, keeping bigint and pointer payloads readable
 */
export function formatValue(value: unknown): string {
  if (value === undefined) {
    return "";
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "object" && value !== null && "address" in value && typeof value.address === "bigint") {
    return `0x${value.address.toString(16)}`;
  }
  return String(value);
}

const SAFE_MIN = BigInt(Number.MIN_SAFE_INTEGER);
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * A number when the integer fits the safe range, otherwise the bigint itself
 */
export function narrowInteger(value: bigint): number | bigint {
  return value >= SAFE_MIN && value <= SAFE_MAX ? Number(value) : value;
}
