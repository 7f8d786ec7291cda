import type { ContentType } from "./types";

/**
 * Glob rules per content type, evaluated relative to the library root
 * (`<root>/<group>/<pack>/<Category>/...`).
 */
export interface GlobRule {
  readonly patterns: readonly string[];
  readonly ignore: readonly string[];
}

const TEST_DATA = ["**/test_data/**", "**/*_test.yml"];

export const GLOB_RULES: Readonly<Record<ContentType, GlobRule>> = {
  playbook: { patterns: ["*/*/Playbooks/*.yml"], ignore: [] },
  script: { patterns: ["*/*/Scripts/**/*.yml"], ignore: TEST_DATA },
  integration: { patterns: ["*/*/Integrations/**/*.yml"], ignore: TEST_DATA },
  // classifier-mapper-*.json files are mappers; keep each file under exactly one type.
  classifier: {
    patterns: ["*/*/Classifiers/classifier-*.json"],
    ignore: ["*/*/Classifiers/*mapper*.json"],
  },
  mapper: { patterns: ["*/*/Classifiers/*mapper*.json"], ignore: [] },
  parsing_rule: { patterns: ["*/*/ParsingRules/**/*.xif"], ignore: [] },
  modeling_rule: { patterns: ["*/*/ModelingRules/**/*.xif"], ignore: [] },
};

/**
 * Pack name inferred from the path segment immediately under the item-grouping
 * directory (`Packs/<pack>/...`). Empty when the path is too shallow.
 */
export function packNameFromPath(relativePath: string): string {
  const segments = relativePath.split("/");
  return segments.length > 2 ? segments[1] : "";
}

/** Key of a source file within the index: `<type>:<relativePath>`. */
export function fileKey(contentType: ContentType, relativePath: string): string {
  return `${contentType}:${relativePath}`;
}

/**
 * Deterministic document identity. Sub-items (one of several mapping
 * definitions in a single file) are suffixed with `#<name>`.
 */
export function identityKey(
  contentType: ContentType,
  relativePath: string,
  subItem?: string,
): string {
  const base = fileKey(contentType, relativePath);
  return subItem === undefined ? base : `${base}#${subItem}`;
}
