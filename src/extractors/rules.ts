import { identityKey, packNameFromPath } from "../content-types";
import type { CandidateFile, ContentDoc } from "../types";
import { fileStem, unique, type ExtractOptions } from "./shared";

export interface RuleHeaderInfo {
  /** Names declared by `[RULE: name ...]` clauses. */
  rules: string[];
  datasets: string[];
  vendors: string[];
  products: string[];
}

const HEADER_RE = /\[\s*(INGEST|MODEL|RULE)\s*:([^\]]*)\]/gi;
const PAIR_RE = /([A-Za-z_]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s,\]]+))/g;

/**
 * Collect the dataset / vendor / product tokens and rule names declared in a
 * rule file's bracketed header clauses, e.g.
 * `[INGEST:vendor="acme", product="edr", target_dataset="acme_edr_raw", no_hit=keep]`.
 */
export function parseRuleHeaders(source: string): RuleHeaderInfo {
  const rules: string[] = [];
  const datasets: string[] = [];
  const vendors: string[] = [];
  const products: string[] = [];

  for (const header of source.matchAll(HEADER_RE)) {
    const kind = header[1].toUpperCase();
    const body = header[2];
    if (kind === "RULE") {
      const name = /^\s*([\w.-]+)\b(?!\s*=)/.exec(body)?.[1];
      if (name) rules.push(name);
    }
    for (const pair of body.matchAll(PAIR_RE)) {
      const key = pair[1].toLowerCase();
      const value = (pair[2] ?? pair[3] ?? pair[4] ?? "").trim();
      if (!value) continue;
      if (key === "dataset" || key === "target_dataset") datasets.push(value);
      else if (key === "vendor") vendors.push(value);
      else if (key === "product") products.push(value);
    }
  }
  return {
    rules: unique(rules),
    datasets: unique(datasets),
    vendors: unique(vendors),
    products: unique(products),
  };
}

export function extractRule(
  candidate: CandidateFile,
  text: string,
  _opts: ExtractOptions,
): ContentDoc[] {
  if (!text.trim()) return [];
  const info = parseRuleHeaders(text);
  const kind = candidate.contentType === "parsing_rule" ? "Parsing" : "Modeling";
  const source = [info.vendors.join("/"), info.products.join("/")].filter(Boolean).join(" ");
  let description = `${kind} rule`;
  if (source) description += ` for ${source}`;
  if (info.datasets.length) description += ` (dataset ${info.datasets.join(", ")})`;

  const fields: Record<string, string> = {};
  if (info.rules.length) fields.rules = info.rules.join(",");
  if (info.datasets.length) fields.dataset = info.datasets.join(",");
  if (info.vendors.length) fields.vendor = info.vendors.join(",");
  if (info.products.length) fields.product = info.products.join(",");

  return [
    {
      contentType: candidate.contentType,
      identityKey: identityKey(candidate.contentType, candidate.relativePath),
      displayName: info.rules[0] ?? fileStem(candidate.relativePath),
      description,
      packName: packNameFromPath(candidate.relativePath),
      relativePath: candidate.relativePath,
      searchableText: text,
      structuredMetadata: fields,
    },
  ];
}
