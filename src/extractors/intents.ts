/** Keyword -> intent label. A keyword matches anywhere in the lower-cased text. */
const INTENT_RULES: ReadonlyArray<readonly [string, string]> = [
  ["enrich", "enrichment"],
  ["block", "blocking"],
  ["isolate", "containment"],
  ["quarantine", "containment"],
  ["remediate", "remediation"],
  ["notify", "notification"],
  ["alert", "alerting"],
  ["ticket", "ticketing"],
  ["phishing", "phishing"],
  ["malware", "malware"],
  ["ransomware", "ransomware"],
  ["hunt", "hunting"],
  ["investigate", "investigation"],
  ["triage", "triage"],
  ["detonate", "detonation"],
  ["sandbox", "detonation"],
  ["poll", "polling"],
  ["mirror", "mirroring"],
  ["xql", "xql"],
  ["query", "query"],
  ["parse", "parsing"],
  ["classify", "classification"],
  ["map", "mapping"],
];

/** Sorted, de-duplicated intent labels inferred from free text. */
export function inferIntents(text: string): string[] {
  const lowered = text.toLowerCase();
  const found = new Set<string>();
  for (const [needle, label] of INTENT_RULES) {
    if (lowered.includes(needle)) found.add(label);
  }
  return Array.from(found).sort();
}
