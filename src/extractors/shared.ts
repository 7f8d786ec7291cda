import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ParseError, describeError } from "../errors";
import { isJsonObject, type JsonObject } from "../json";
import type { CandidateFile } from "../types";

export { isJsonObject, type JsonObject } from "../json";

export interface ExtractOptions {
  /** Keep items flagged `deprecated: true`. Default false. */
  includeDeprecated?: boolean;
}

export function asObject(value: unknown): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Trimmed string form of a scalar; empty for anything else. */
export function str(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

export function firstString(...values: unknown[]): string {
  for (const v of values) {
    const s = str(v);
    if (s) return s;
  }
  return "";
}

/** Distinct non-empty strings, first occurrence order. */
export function unique(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const v of values) if (v) seen.add(v);
  return Array.from(seen);
}

export function isDeprecated(data: JsonObject): boolean {
  return data.deprecated === true || str(data.deprecated).toLowerCase() === "true";
}

export function parseYamlObject(candidate: CandidateFile, text: string): JsonObject {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (e) {
    throw new ParseError(`Invalid YAML in ${candidate.relativePath}: ${describeError(e)}`, {
      cause: e,
    });
  }
  const obj = asObject(data);
  if (!obj) throw new ParseError(`Expected a YAML mapping in ${candidate.relativePath}`);
  return obj;
}

export function parseJsonValue(candidate: CandidateFile, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ParseError(`Invalid JSON in ${candidate.relativePath}: ${describeError(e)}`, {
      cause: e,
    });
  }
}

/** File name without its extension. */
export function fileStem(relativePath: string): string {
  return path.posix.basename(relativePath, path.posix.extname(relativePath));
}

/** `label: value` lines for non-empty values, joined the way searchable text is built. */
export function textLines(entries: ReadonlyArray<readonly [string, string]>): string {
  return entries
    .filter(([, value]) => value.length > 0)
    .map(([label, value]) => `${label}: ${value}`)
    .join("\n");
}
