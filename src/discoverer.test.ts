import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discover, discoverAll } from "./discoverer";
import { LIBRARY, makeTempDir, writeFiles } from "./test-utils";

describe("discover", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.realpath(await makeTempDir());
    await writeFiles(root, LIBRARY);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("yields every matching file once, in type then path order", async () => {
    const found = await discoverAll(root);
    expect(found.map((c) => `${c.contentType}:${c.relativePath}`)).toEqual([
      "playbook:Packs/Network/Playbooks/Block_Domain.yml",
      "playbook:Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
      "script:Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml",
      "integration:Packs/Acme/Integrations/AcmeEDR/AcmeEDR.yml",
      "classifier:Packs/Acme/Classifiers/classifier-acme.json",
      "mapper:Packs/Acme/Classifiers/classifier-mapper-incoming-acme.json",
      "parsing_rule:Packs/Acme/ParsingRules/AcmeParsingRules/AcmeParsingRules.xif",
      "modeling_rule:Packs/Acme/ModelingRules/AcmeModelingRules/AcmeModelingRules.xif",
    ]);
    expect(found[0].absolutePath).toBe(path.join(root, "Packs/Network/Playbooks/Block_Domain.yml"));
  });

  it("restricts the walk to requested types", async () => {
    const found = await discoverAll(root, { types: ["mapper", "playbook"] });
    expect(found.map((c) => c.contentType)).toEqual(["playbook", "playbook", "mapper"]);
  });

  it("ignores files outside the category layout", async () => {
    await writeFiles(root, {
      "Packs/Loose/Playbooks/nested/deep.yml": "name: deep\n",
      "Playbooks/top.yml": "name: top\n",
      "Packs/Acme/Classifiers/layout-acme.json": "{}",
    });
    const found = await discoverAll(root, { types: ["playbook", "classifier"] });
    expect(found.map((c) => c.relativePath)).toEqual([
      "Packs/Network/Playbooks/Block_Domain.yml",
      "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
      "Packs/Acme/Classifiers/classifier-acme.json",
    ]);
  });

  it("passes over deprecated packs unless they are included", async () => {
    await writeFiles(root, {
      "Packs/DeprecatedContent/Playbooks/old.yml": "name: Old\n",
      "Packs/LegacyDeprecated/Scripts/Old/Old.yml": "name: Old\n",
    });
    const found = await discoverAll(root, { types: ["playbook", "script"] });
    expect(found.map((c) => c.relativePath)).toEqual([
      "Packs/Network/Playbooks/Block_Domain.yml",
      "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
      "Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml",
    ]);

    const all = await discoverAll(root, {
      types: ["playbook", "script"],
      includeDeprecatedPacks: true,
    });
    expect(all.map((c) => c.relativePath)).toEqual([
      "Packs/DeprecatedContent/Playbooks/old.yml",
      "Packs/Network/Playbooks/Block_Domain.yml",
      "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
      "Packs/LegacyDeprecated/Scripts/Old/Old.yml",
      "Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml",
    ]);
  });

  it("caps the number of files per type", async () => {
    const found = await discoverAll(root, { types: ["playbook", "script"], maxPerType: 1 });
    expect(found.map((c) => c.relativePath)).toEqual([
      "Packs/Network/Playbooks/Block_Domain.yml",
      "Packs/Utilities/Scripts/ParseEmail/ParseEmail.yml",
    ]);
  });

  it("is deterministic across walks", async () => {
    const first = await discoverAll(root);
    const second = await discoverAll(root);
    expect(second).toEqual(first);
  });

  it("skips symlinked files unless symlinks are followed", async () => {
    await fs.symlink(
      path.join(root, "Packs/ThreatIntel/Playbooks/Enrich_IP.yml"),
      path.join(root, "Packs/ThreatIntel/Playbooks/Alias.yml"),
    );
    const found = await discoverAll(root, { types: ["playbook"] });
    expect(found.map((c) => c.relativePath)).not.toContain("Packs/ThreatIntel/Playbooks/Alias.yml");

    const warnings: string[] = [];
    const followed = await discoverAll(root, {
      types: ["playbook"],
      followSymlinks: true,
      onWarning: (m) => warnings.push(m),
    });
    expect(followed.map((c) => c.relativePath)).toContain("Packs/ThreatIntel/Playbooks/Alias.yml");
    expect(warnings).toEqual([]);
  });

  it("reports symlinks whose target leaves the root", async () => {
    const outside = await fs.realpath(await makeTempDir());
    try {
      await writeFiles(outside, { "stolen.yml": "name: stolen\n" });
      await fs.symlink(
        path.join(outside, "stolen.yml"),
        path.join(root, "Packs/ThreatIntel/Playbooks/Stolen.yml"),
      );
      const warnings: string[] = [];
      const found = await discoverAll(root, {
        types: ["playbook"],
        followSymlinks: true,
        onWarning: (m) => warnings.push(m),
      });
      expect(found.map((c) => c.relativePath)).not.toContain("Packs/ThreatIntel/Playbooks/Stolen.yml");
      expect(warnings).toEqual([
        "Skipping Packs/ThreatIntel/Playbooks/Stolen.yml: Symlink target outside root: Packs/ThreatIntel/Playbooks/Stolen.yml",
      ]);
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it("is lazy", async () => {
    const iterator = discover(root);
    const first = await iterator.next();
    expect(first.done).toBe(false);
    await iterator.return(undefined);
  });
});
