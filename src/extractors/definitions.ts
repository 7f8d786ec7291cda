import { identityKey, packNameFromPath } from "../content-types";
import type { CandidateFile, ContentDoc } from "../types";
import { inferIntents } from "./intents";
import {
  asArray,
  asObject,
  fileStem,
  firstString,
  isDeprecated,
  parseYamlObject,
  str,
  textLines,
  unique,
  type ExtractOptions,
  type JsonObject,
} from "./shared";

const MAX_LISTED = 30;

/** Drop empty values so stored metadata only carries facts that exist. */
function compactFields(fields: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) if (value) out[key] = value;
  return out;
}

function names(items: unknown[], key = "name"): string[] {
  return unique(items.map((item) => str(asObject(item)?.[key]))).slice(0, MAX_LISTED);
}

function descriptions(items: unknown[]): string[] {
  return unique(items.map((item) => str(asObject(item)?.description))).slice(0, MAX_LISTED);
}

function baseDoc(
  candidate: CandidateFile,
  displayName: string,
  description: string,
  searchableText: string,
  fields: Record<string, string>,
): ContentDoc {
  return {
    contentType: candidate.contentType,
    identityKey: identityKey(candidate.contentType, candidate.relativePath),
    displayName,
    description,
    packName: packNameFromPath(candidate.relativePath),
    relativePath: candidate.relativePath,
    searchableText,
    structuredMetadata: compactFields(fields),
  };
}

function playbookTasks(data: JsonObject): JsonObject[] {
  const tasks = data.tasks;
  const list = Array.isArray(tasks) ? tasks : Object.values(asObject(tasks) ?? {});
  return list.map(asObject).filter((t): t is JsonObject => t !== undefined);
}

export function extractPlaybook(
  candidate: CandidateFile,
  text: string,
  opts: ExtractOptions,
): ContentDoc[] {
  const data = parseYamlObject(candidate, text);
  const name = str(data.name);
  if (!name) return [];
  if (isDeprecated(data) && !opts.includeDeprecated) return [];
  const description = str(data.description);

  const commands: string[] = [];
  const subplaybooks: string[] = [];
  const taskTypes: string[] = [];
  const taskText: string[] = [];
  for (const task of playbookTasks(data)) {
    taskTypes.push(str(task.type));
    const def = asObject(task.task) ?? {};
    const script = str(def.script);
    const sep = script.indexOf("|||");
    // "|||cmd" (no brand) is still a command reference.
    if (sep >= 0) commands.push(script.slice(sep + 3).trim());
    subplaybooks.push(str(def.playbookName));
    const taskLine = [str(def.name), str(def.description)].filter(Boolean).join(" - ");
    taskText.push(taskLine);
  }
  const intents = inferIntents(`${name} ${description}`);
  const cmds = unique(commands).slice(0, MAX_LISTED);
  const subs = unique(subplaybooks).slice(0, MAX_LISTED);
  const types = unique(taskTypes).sort();

  const searchableText = textLines([
    ["name", name],
    ["description", description],
    ["intents", intents.join(", ")],
    ["commands", cmds.join(", ")],
    ["subplaybooks", subs.join(", ")],
    ["tasks", unique(taskText).slice(0, MAX_LISTED).join("; ")],
    ["inputs", descriptions(asArray(data.inputs)).join("; ")],
  ]);
  return [
    baseDoc(candidate, name, description, searchableText, {
      id: firstString(data.id, fileStem(candidate.relativePath)),
      fromversion: str(data.fromversion),
      deprecated: isDeprecated(data) ? "true" : "",
      intents: intents.join(","),
      commands: cmds.join(","),
      subplaybooks: subs.join(","),
      taskTypes: types.join(","),
    }),
  ];
}

export function extractScript(
  candidate: CandidateFile,
  text: string,
  opts: ExtractOptions,
): ContentDoc[] {
  const data = parseYamlObject(candidate, text);
  const name = str(data.name);
  if (!name) return [];
  if (isDeprecated(data) && !opts.includeDeprecated) return [];
  const description = firstString(data.comment, data.description);
  const common = asObject(data.commonfields) ?? {};
  const tags = unique(asArray(data.tags).map(str));
  const args = asArray(data.args);
  const intents = inferIntents(`${name} ${description}`);

  const searchableText = textLines([
    ["name", name],
    ["description", description],
    ["intents", intents.join(", ")],
    ["tags", tags.join(", ")],
    ["arguments", names(args).join(", ")],
    ["argument details", descriptions(args).join("; ")],
    ["outputs", descriptions(asArray(data.outputs)).join("; ")],
  ]);
  return [
    baseDoc(candidate, name, description, searchableText, {
      id: firstString(common.id, name),
      fromversion: str(data.fromversion),
      deprecated: isDeprecated(data) ? "true" : "",
      intents: intents.join(","),
      tags: tags.join(","),
      type: str(data.type),
      subtype: str(data.subtype),
      arguments: names(args).join(","),
    }),
  ];
}

export function extractIntegration(
  candidate: CandidateFile,
  text: string,
  opts: ExtractOptions,
): ContentDoc[] {
  const data = parseYamlObject(candidate, text);
  const name = firstString(data.display, data.name);
  if (!name) return [];
  if (isDeprecated(data) && !opts.includeDeprecated) return [];
  const description = str(data.description);
  const common = asObject(data.commonfields) ?? {};
  const commands = asArray(asObject(data.script)?.commands);
  const commandLines = commands
    .map(asObject)
    .filter((c): c is JsonObject => c !== undefined)
    .map((c) => [str(c.name), str(c.description)].filter(Boolean).join(" - "))
    .filter(Boolean)
    .slice(0, MAX_LISTED);
  const configuration = names(asArray(data.configuration));
  const intents = inferIntents(`${name} ${description}`);

  const searchableText = textLines([
    ["name", name],
    ["description", description],
    ["category", str(data.category)],
    ["intents", intents.join(", ")],
    ["commands", commandLines.join("; ")],
  ]);
  return [
    baseDoc(candidate, name, description, searchableText, {
      id: firstString(common.id, data.name, name),
      fromversion: str(data.fromversion),
      deprecated: isDeprecated(data) ? "true" : "",
      category: str(data.category),
      intents: intents.join(","),
      commands: names(commands).join(","),
      configuration: configuration.join(","),
    }),
  ];
}
