import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { HashEmbeddings } from "./hash-embeddings";

/** Small content library covering every content type (9 documents in 8 files). */
export const LIBRARY: Readonly<Record<string, string>> = {
  "Packs/ThreatIntel/Playbooks/Enrich_IP.yml": `id: enrich-ip
name: Enrich IP Playbook
description: Enrich IP addresses using VirusTotal
`,
  "Packs/Network/Playbooks/Block_Domain.yml": `id: block-domain
name: Block Domain
description: Block a malicious domain on the firewall
`,
  "Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml": `commonfields:
  id: ParseEmail
name: ParseEmail
comment: Parse an email file and extract the sender
tags:
  - email
  - utility
type: python
subtype: python3
args:
  - name: entryid
    description: Entry ID of the email file
`,
  "Packs/Utilities/Scripts/ParseEmail/test_data/sample.yml": `name: Not indexed
`,
  "Packs/Acme/Integrations/AcmeEDR/AcmeEDR.yml": `commonfields:
  id: AcmeEDR
name: AcmeEDR
display: Acme EDR
category: Endpoint
description: Isolate endpoints and fetch alerts from Acme EDR
configuration:
  - name: url
  - name: api_key
script:
  commands:
    - name: acme-isolate-endpoint
      description: Isolate an endpoint
    - name: acme-get-alerts
`,
  "Packs/Acme/Classifiers/classifier-acme.json": JSON.stringify({
    id: "acme-classifier",
    name: "Acme Classifier",
    description: "Classifies Acme alerts",
    brandName: "Acme",
    mapping: {
      Phishing: { internalMapping: { Sender: { simple: "from" } } },
      Malware: { internalMapping: { "File Hash": { simple: "sha256" } } },
    },
  }),
  "Packs/Acme/Classifiers/classifier-mapper-incoming-acme.json": JSON.stringify({
    id: "acme-mapper",
    name: "Acme Incoming Mapper",
    type: "mapping-incoming",
    brandName: "Acme",
    mapping: { "Acme Alert": { internalMapping: { Severity: { simple: "sev" } } } },
  }),
  "Packs/Acme/ParsingRules/AcmeParsingRules/AcmeParsingRules.xif": `[INGEST:vendor="acme", product="edr", target_dataset="acme_edr_raw", no_hit=keep]
filter severity != null;
`,
  "Packs/Acme/ModelingRules/AcmeModelingRules/AcmeModelingRules.xif": `[MODEL: dataset="acme_edr_raw"]
alter xdm.event.type = "alert";
`,
};

export async function makeTempDir(prefix = "pattern-index-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(
  root: string,
  files: Readonly<Record<string, string>>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content, "utf8");
  }
}

export function hashBackend(): HashEmbeddings {
  return new HashEmbeddings();
}
