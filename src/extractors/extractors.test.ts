import { describe, expect, it } from "vitest";
import { ParseError } from "../errors";
import { LIBRARY } from "../test-utils";
import type { CandidateFile, ContentType } from "../types";
import { extractDocuments, parseRuleHeaders } from "./index";
import { inferIntents } from "./intents";

function candidate(contentType: ContentType, relativePath: string): CandidateFile {
  return { contentType, relativePath, absolutePath: `/library/${relativePath}` };
}

function fixture(rel: string): string {
  const text = LIBRARY[rel];
  if (text === undefined) throw new Error(`missing fixture ${rel}`);
  return text;
}

describe("playbook extraction", () => {
  it("builds one document from name, description and intents", () => {
    const rel = "Packs/ThreatIntel/Playbooks/Enrich_IP.yml";
    const [doc, ...rest] = extractDocuments(candidate("playbook", rel), fixture(rel));
    expect(rest).toEqual([]);
    expect(doc).toEqual({
      contentType: "playbook",
      identityKey: `playbook:${rel}`,
      displayName: "Enrich IP Playbook",
      description: "Enrich IP addresses using VirusTotal",
      packName: "ThreatIntel",
      relativePath: rel,
      searchableText:
        "name: Enrich IP Playbook\ndescription: Enrich IP addresses using VirusTotal\nintents: enrichment",
      structuredMetadata: { id: "enrich-ip", intents: "enrichment" },
    });
  });

  it("collects commands, sub-playbooks, tasks and inputs", () => {
    const text = `name: Phishing Triage
description: Triage reported phishing emails
deprecated: false
tasks:
  "0":
    type: start
    task:
      name: Start
  "1":
    type: regular
    task:
      name: Extract indicators
      description: Pull URLs from the email
      script: "|||extractIndicators"
  "2":
    type: playbook
    task:
      name: Enrich
      playbookName: Enrich IP Playbook
  "3":
    type: regular
    task:
      name: Block sender
      script: "Mail|||block-sender"
inputs:
  - key: Mailbox
    description: Mailbox to scan
`;
    const [doc] = extractDocuments(
      candidate("playbook", "Packs/Mail/Playbooks/Phishing_Triage.yml"),
      text,
    );
    expect(doc.searchableText).toBe(
      [
        "name: Phishing Triage",
        "description: Triage reported phishing emails",
        "intents: phishing, triage",
        "commands: extractIndicators, block-sender",
        "subplaybooks: Enrich IP Playbook",
        "tasks: Start; Extract indicators - Pull URLs from the email; Enrich; Block sender",
        "inputs: Mailbox to scan",
      ].join("\n"),
    );
    expect(doc.structuredMetadata).toEqual({
      id: "Phishing_Triage",
      intents: "phishing,triage",
      commands: "extractIndicators,block-sender",
      subplaybooks: "Enrich IP Playbook",
      taskTypes: "playbook,regular,start",
    });
  });

  it("skips deprecated playbooks unless asked to keep them", () => {
    const text = "name: Old Flow\ndeprecated: true\n";
    const c = candidate("playbook", "Packs/Old/Playbooks/old.yml");
    expect(extractDocuments(c, text)).toEqual([]);
    const [doc] = extractDocuments(c, text, { includeDeprecated: true });
    expect(doc.structuredMetadata).toEqual({ id: "old", deprecated: "true" });
  });

  it("yields nothing when the name is missing", () => {
    expect(
      extractDocuments(candidate("playbook", "Packs/X/Playbooks/x.yml"), "description: no name\n"),
    ).toEqual([]);
  });

  it("fails with ParseError on malformed YAML or a non-mapping document", () => {
    const c = candidate("playbook", "Packs/X/Playbooks/x.yml");
    expect(() => extractDocuments(c, "name: [unclosed")).toThrow(ParseError);
    expect(() => extractDocuments(c, "- just\n- a list\n")).toThrow(
      "Expected a YAML mapping in Packs/X/Playbooks/x.yml",
    );
  });
});

describe("script and integration extraction", () => {
  it("extracts a script with tags and arguments", () => {
    const rel = "Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml";
    const [doc] = extractDocuments(candidate("script", rel), fixture(rel));
    expect(doc.identityKey).toBe(`script:${rel}`);
    expect(doc.description).toBe("Parse an email file and extract the sender");
    expect(doc.packName).toBe("Utilities");
    expect(doc.searchableText).toBe(
      [
        "name: ParseEmail",
        "description: Parse an email file and extract the sender",
        "intents: parsing",
        "tags: email, utility",
        "arguments: entryid",
        "argument details: Entry ID of the email file",
      ].join("\n"),
    );
    expect(doc.structuredMetadata).toEqual({
      id: "ParseEmail",
      intents: "parsing",
      tags: "email,utility",
      type: "python",
      subtype: "python3",
      arguments: "entryid",
    });
  });

  it("extracts an integration under its display name", () => {
    const rel = "Packs/Acme/Integrations/AcmeEDR/AcmeEDR.yml";
    const [doc] = extractDocuments(candidate("integration", rel), fixture(rel));
    expect(doc.displayName).toBe("Acme EDR");
    expect(doc.searchableText).toBe(
      [
        "name: Acme EDR",
        "description: Isolate endpoints and fetch alerts from Acme EDR",
        "category: Endpoint",
        "intents: alerting, containment",
        "commands: acme-isolate-endpoint - Isolate an endpoint; acme-get-alerts",
      ].join("\n"),
    );
    expect(doc.structuredMetadata).toEqual({
      id: "AcmeEDR",
      category: "Endpoint",
      intents: "alerting,containment",
      commands: "acme-isolate-endpoint,acme-get-alerts",
      configuration: "url,api_key",
    });
  });
});

describe("classifier and mapper extraction", () => {
  it("splits a classifier with two mappings into two documents", () => {
    const rel = "Packs/Acme/Classifiers/classifier-acme.json";
    const docs = extractDocuments(candidate("classifier", rel), fixture(rel));
    expect(docs.map((d) => d.identityKey)).toEqual([
      `classifier:${rel}#Phishing`,
      `classifier:${rel}#Malware`,
    ]);
    expect(docs[0].displayName).toBe("Acme Classifier - Phishing");
    expect(docs[0].searchableText).toBe(
      "name: Acme Classifier - Phishing\ndescription: Classifies Acme alerts\nbrand: Acme\nincident type: Phishing\nfields: Sender",
    );
    expect(docs[1].structuredMetadata).toEqual({
      id: "acme-classifier",
      brand: "Acme",
      mapping: "Malware",
      fields: "File Hash",
      intents: "classification",
    });
  });

  it("keeps a single-mapping mapper as one document with its direction", () => {
    const rel = "Packs/Acme/Classifiers/classifier-mapper-incoming-acme.json";
    const docs = extractDocuments(candidate("mapper", rel), fixture(rel));
    expect(docs).toHaveLength(1);
    expect(docs[0].identityKey).toBe(`mapper:${rel}`);
    expect(docs[0].searchableText).toBe(
      "name: Acme Incoming Mapper\nbrand: Acme\ntype: mapping-incoming\ndirection: incoming\nfields: Severity",
    );
    expect(docs[0].structuredMetadata).toEqual({
      id: "acme-mapper",
      type: "mapping-incoming",
      brand: "Acme",
      direction: "incoming",
      fields: "Severity",
      intents: "mapping",
    });
  });

  it("splits a top-level array of named definitions", () => {
    const c = candidate("mapper", "Packs/Acme/Classifiers/classifier-mapper-outgoing-acme.json");
    const docs = extractDocuments(c, JSON.stringify([{ name: "Out A" }, { name: "Out B" }, {}]));
    expect(docs.map((d) => d.identityKey)).toEqual([
      `mapper:${c.relativePath}#Out A`,
      `mapper:${c.relativePath}#Out B`,
    ]);
    expect(docs[0].structuredMetadata.direction).toBe("outgoing");
  });

  it("rejects colliding definition names in one file", () => {
    const c = candidate("classifier", "Packs/Acme/Classifiers/classifier-dup.json");
    expect(() => extractDocuments(c, JSON.stringify([{ name: "Same" }, { name: "Same" }]))).toThrow(
      'Duplicate definition "Same" in Packs/Acme/Classifiers/classifier-dup.json',
    );
  });

  it("rejects definition names that would read as chunk keys", () => {
    const c = candidate("classifier", "Packs/Acme/Classifiers/classifier-odd.json");
    const text = JSON.stringify({
      name: "Odd",
      mapping: { X: { internalMapping: {} }, "X::0": { internalMapping: {} } },
    });
    expect(() => extractDocuments(c, text)).toThrow(
      'Definition name "X::0" in Packs/Acme/Classifiers/classifier-odd.json contains "::"',
    );
    expect(() => extractDocuments(c, JSON.stringify([{ name: "A" }, { name: "A::1" }]))).toThrow(
      ParseError,
    );
  });

  it("fails with ParseError on invalid JSON or a scalar document", () => {
    const c = candidate("classifier", "Packs/Acme/Classifiers/classifier-bad.json");
    expect(() => extractDocuments(c, "{not json")).toThrow(ParseError);
    expect(() => extractDocuments(c, "42")).toThrow(ParseError);
  });
});

describe("rule extraction", () => {
  it("reads dataset, vendor and product from header clauses", () => {
    expect(
      parseRuleHeaders(
        '[INGEST:vendor="acme", product="edr", target_dataset="acme_edr_raw", no_hit=keep]\n[RULE: acme_filter input="raw"]\n[rule: dataset="other"]',
      ),
    ).toEqual({
      rules: ["acme_filter"],
      datasets: ["acme_edr_raw", "other"],
      vendors: ["acme"],
      products: ["edr"],
    });
  });

  it("describes a parsing rule by its source and dataset", () => {
    const rel = "Packs/Acme/ParsingRules/AcmeParsingRules/AcmeParsingRules.xif";
    const [doc] = extractDocuments(candidate("parsing_rule", rel), fixture(rel));
    expect(doc.displayName).toBe("AcmeParsingRules");
    expect(doc.description).toBe("Parsing rule for acme edr (dataset acme_edr_raw)");
    expect(doc.searchableText).toBe(fixture(rel));
    expect(doc.structuredMetadata).toEqual({
      dataset: "acme_edr_raw",
      vendor: "acme",
      product: "edr",
    });
  });

  it("describes a modeling rule without vendor headers", () => {
    const rel = "Packs/Acme/ModelingRules/AcmeModelingRules/AcmeModelingRules.xif";
    const [doc] = extractDocuments(candidate("modeling_rule", rel), fixture(rel));
    expect(doc.description).toBe("Modeling rule (dataset acme_edr_raw)");
  });

  it("yields nothing for an empty rule file", () => {
    expect(
      extractDocuments(candidate("parsing_rule", "Packs/A/ParsingRules/x/x.xif"), "  \n"),
    ).toEqual([]);
  });
});

describe("inferIntents", () => {
  it("maps keywords to sorted, distinct labels", () => {
    expect(inferIntents("Isolate and quarantine the host, then notify")).toEqual([
      "containment",
      "notification",
    ]);
    expect(inferIntents("nothing to see")).toEqual([]);
  });
});
