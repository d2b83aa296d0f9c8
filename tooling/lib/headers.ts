/**
 * Header aggregation: a translation unit that only includes the configured headers
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Lang } from "./types";

export function sourceSuffix(lang: Lang): string {
  return lang === "c" ? ".c" : ".cxx";
}

/**
 * One #include line per header, in order
 */
export function renderHeaderSource(headers: readonly string[]): string {
  return headers.map((header) => `#include <${header}>\n`).join("");
}

export type HeaderSource = {
  path: string;
  dispose: () => void;
};

/**
 * Write the aggregated header translation unit into a fresh temporary directory
 */
export function writeHeaderSource(
  headers: readonly string[],
  lang: Lang,
  baseDir: string = tmpdir()
): HeaderSource {
  const dir = mkdtempSync(join(baseDir, "macroprobe-"));
  const path = join(dir, `headers${sourceSuffix(lang)}`);
  writeFileSync(path, renderHeaderSource(headers), "utf8");

  return {
    path,
    dispose: () => rmSync(dir, { recursive: true, force: true }),
  };
}
