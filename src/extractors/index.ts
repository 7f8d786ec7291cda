import type { CandidateFile, ContentDoc, ContentType } from "../types";
import { extractIntegration, extractPlaybook, extractScript } from "./definitions";
import { extractMappings } from "./mappings";
import { extractRule } from "./rules";
import type { ExtractOptions } from "./shared";

export type { ExtractOptions } from "./shared";
export { parseRuleHeaders, type RuleHeaderInfo } from "./rules";

type Strategy = (candidate: CandidateFile, text: string, opts: ExtractOptions) => ContentDoc[];

/** One extraction strategy per content type; dispatch never sniffs the file format. */
const STRATEGIES: Readonly<Record<ContentType, Strategy>> = {
  playbook: extractPlaybook,
  script: extractScript,
  integration: extractIntegration,
  classifier: extractMappings,
  mapper: extractMappings,
  parsing_rule: extractRule,
  modeling_rule: extractRule,
};

/**
 * Extract documents from already-loaded file text. Returns an empty list for
 * files lacking required fields (counted as skipped by the builder).
 *
 * @throws {ParseError} When the text is not readable as the type's format.
 */
export function extractDocuments(
  candidate: CandidateFile,
  text: string,
  opts: ExtractOptions = {},
): ContentDoc[] {
  return STRATEGIES[candidate.contentType](candidate, text, opts);
}
