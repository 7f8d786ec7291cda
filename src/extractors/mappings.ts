import { identityKey, packNameFromPath } from "../content-types";
import { ParseError } from "../errors";
import type { CandidateFile, ContentDoc } from "../types";
import {
  asObject,
  fileStem,
  firstString,
  isJsonObject,
  parseJsonValue,
  str,
  textLines,
  unique,
  type ExtractOptions,
  type JsonObject,
} from "./shared";

const MAX_FIELDS = 40;

interface MappingDefinition {
  /** Set when the file yields more than one document. */
  readonly subItem?: string;
  readonly label: string;
  readonly data: JsonObject;
  /** The per-incident-type mapping body, when split out of a `mapping` object. */
  readonly mappingBody?: JsonObject;
}

function mappedFields(body: JsonObject | undefined): string[] {
  if (!body) return [];
  return Object.keys(asObject(body.internalMapping) ?? {});
}

function allMappedFields(data: JsonObject): string[] {
  const fields: string[] = [];
  for (const body of Object.values(asObject(data.mapping) ?? {})) {
    fields.push(...mappedFields(asObject(body)));
  }
  return unique(fields).slice(0, MAX_FIELDS);
}

function mapperDirection(data: JsonObject, relativePath: string): string {
  const type = str(data.type).toLowerCase();
  if (type.endsWith("incoming")) return "incoming";
  if (type.endsWith("outgoing")) return "outgoing";
  return fileStem(relativePath).toLowerCase().includes("incoming") ? "incoming" : "outgoing";
}

/** `::` suffixes chunk keys, so a sub-item carrying it could shadow a sibling's chunk. */
function checkSubItem(candidate: CandidateFile, name: string): string {
  if (name.includes("::")) {
    throw new ParseError(`Definition name "${name}" in ${candidate.relativePath} contains "::"`);
  }
  return name;
}

/**
 * Split a parsed classifier / mapper file into its definitions. A top-level
 * array yields one definition per named element; an object whose `mapping`
 * holds several incident-type entries yields one definition per entry.
 *
 * @throws {ParseError} When two definitions in the file share a name, or a
 * name contains `::`.
 */
function splitDefinitions(candidate: CandidateFile, value: unknown): MappingDefinition[] {
  if (Array.isArray(value)) {
    const named = value
      .filter(isJsonObject)
      .map((data) => ({ data, label: firstString(data.name, data.id) }))
      .filter((d) => d.label.length > 0);
    if (named.length <= 1) return named;
    const seen = new Set<string>();
    for (const d of named) {
      if (seen.has(d.label)) {
        throw new ParseError(`Duplicate definition "${d.label}" in ${candidate.relativePath}`);
      }
      seen.add(d.label);
    }
    return named.map((d) => ({ ...d, subItem: checkSubItem(candidate, d.label) }));
  }

  const data = asObject(value);
  if (!data) throw new ParseError(`Expected a JSON object or array in ${candidate.relativePath}`);
  const label = firstString(data.name, data.id);
  if (!label) return [];

  const entries = Object.entries(asObject(data.mapping) ?? {}).filter(
    (entry): entry is [string, JsonObject] => isJsonObject(entry[1]),
  );
  if (entries.length < 2) return [{ label, data }];
  return entries.map(([key, body]) => ({
    subItem: checkSubItem(candidate, key),
    label: `${label} - ${key}`,
    data,
    mappingBody: body,
  }));
}

function toDoc(candidate: CandidateFile, def: MappingDefinition): ContentDoc {
  const { data } = def;
  const isMapper = candidate.contentType === "mapper";
  const description = str(data.description);
  const fields = def.mappingBody
    ? unique(mappedFields(def.mappingBody)).slice(0, MAX_FIELDS)
    : allMappedFields(data);
  const classifies = unique(Object.values(asObject(data.keyTypeMap) ?? {}).map(str)).slice(
    0,
    MAX_FIELDS,
  );
  const direction = isMapper ? mapperDirection(data, candidate.relativePath) : "";

  const searchableText = textLines([
    ["name", def.label],
    ["description", description],
    ["brand", str(data.brandName)],
    ["type", str(data.type)],
    ["direction", direction],
    ["incident type", def.subItem ?? ""],
    ["classifies", classifies.join(", ")],
    ["fields", fields.join(", ")],
  ]);

  return {
    contentType: candidate.contentType,
    identityKey: identityKey(candidate.contentType, candidate.relativePath, def.subItem),
    displayName: def.label,
    description,
    packName: packNameFromPath(candidate.relativePath),
    relativePath: candidate.relativePath,
    searchableText,
    structuredMetadata: Object.fromEntries(
      Object.entries({
        id: firstString(data.id, fileStem(candidate.relativePath)),
        type: str(data.type),
        brand: str(data.brandName),
        direction,
        mapping: def.subItem ?? "",
        fields: fields.join(","),
        intents: isMapper ? "mapping" : "classification",
      }).filter(([, v]) => v.length > 0),
    ),
  };
}

/** Classifier and mapper files share a format; the candidate's type tags the result. */
export function extractMappings(
  candidate: CandidateFile,
  text: string,
  _opts: ExtractOptions,
): ContentDoc[] {
  const value = parseJsonValue(candidate, text);
  return splitDefinitions(candidate, value).map((def) => toDoc(candidate, def));
}
