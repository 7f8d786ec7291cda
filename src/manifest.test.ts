import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HashManifest, contentHash } from "./manifest";
import { makeTempDir } from "./test-utils";

describe("HashManifest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir("pattern-manifest-");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("loads empty when no manifest exists", async () => {
    const manifest = await HashManifest.load(dir);
    expect(manifest.size).toBe(0);
  });

  it("round-trips entries through disk", async () => {
    const manifest = HashManifest.empty(dir);
    manifest.set("playbook:Packs/A/Playbooks/a.yml", {
      hash: contentHash("name: a\n"),
      identityKeys: ["playbook:Packs/A/Playbooks/a.yml"],
    });
    manifest.set("script:Packs/A/Scripts/s/s.yml", { hash: "abc", identityKeys: [] });
    manifest.delete("script:Packs/A/Scripts/s/s.yml");
    await manifest.save();

    const loaded = await HashManifest.load(dir);
    expect(loaded.keys()).toEqual(["playbook:Packs/A/Playbooks/a.yml"]);
    expect(loaded.get("playbook:Packs/A/Playbooks/a.yml")).toEqual({
      hash: contentHash("name: a\n"),
      identityKeys: ["playbook:Packs/A/Playbooks/a.yml"],
    });
  });

  it("treats a malformed manifest as empty and skips bad entries", async () => {
    await fs.writeFile(path.join(dir, "manifest.json"), "not json", "utf8");
    expect((await HashManifest.load(dir)).size).toBe(0);

    await fs.writeFile(
      path.join(dir, "manifest.json"),
      JSON.stringify({ files: { good: { hash: "h", identityKeys: ["k", 3] }, bad: { hash: 1 } } }),
      "utf8",
    );
    const loaded = await HashManifest.load(dir);
    expect(loaded.keys()).toEqual(["good"]);
    expect(loaded.get("good")).toEqual({ hash: "h", identityKeys: ["k"] });
  });

  it("hashes strings and buffers alike", () => {
    expect(contentHash(Buffer.from("x"))).toBe(contentHash("x"));
    expect(contentHash("x")).toHaveLength(64);
  });
});
