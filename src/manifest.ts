import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { describeError } from "./errors";
import { isNotFound, writeFileAtomic } from "./fs-utils";
import { isJsonObject } from "./json";

const MANIFEST_FILE = "manifest.json";

/** What the last successful build stored for one source file. */
export interface ManifestEntry {
  /** Whole-file SHA-256 (hex). */
  readonly hash: string;
  /** Every record identity key the file produced. */
  readonly identityKeys: readonly string[];
}

/** Whole-file SHA-256 used for incremental skip decisions. */
export function contentHash(data: Buffer | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}

/**
 * On-disk content-hash manifest keyed by file key (`<type>:<relativePath>`),
 * stored beside the index store. A missing or malformed manifest loads as
 * empty, which makes the next incremental build re-embed everything.
 */
export class HashManifest {
  private entries = new Map<string, ManifestEntry>();

  private constructor(private readonly filePath: string) {}

  public static async load(indexDir: string): Promise<HashManifest> {
    const manifest = new HashManifest(path.join(indexDir, MANIFEST_FILE));
    let raw: string;
    try {
      raw = await fs.readFile(manifest.filePath, "utf8");
    } catch (e) {
      if (!isNotFound(e)) console.error(`[index] Cannot read hash manifest: ${describeError(e)}`);
      return manifest;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      const files = isJsonObject(parsed) && isJsonObject(parsed.files) ? parsed.files : {};
      for (const [key, value] of Object.entries(files)) {
        if (!isJsonObject(value) || typeof value.hash !== "string") continue;
        const keys = Array.isArray(value.identityKeys)
          ? value.identityKeys.filter((k): k is string => typeof k === "string")
          : [];
        manifest.entries.set(key, { hash: value.hash, identityKeys: keys });
      }
    } catch (e) {
      console.error(`[index] Ignoring malformed hash manifest: ${describeError(e)}`);
    }
    return manifest;
  }

  /** Empty manifest bound to `indexDir` (full builds start from scratch). */
  public static empty(indexDir: string): HashManifest {
    return new HashManifest(path.join(indexDir, MANIFEST_FILE));
  }

  public get(fileKey: string): ManifestEntry | undefined {
    return this.entries.get(fileKey);
  }

  public set(fileKey: string, entry: ManifestEntry): void {
    this.entries.set(fileKey, entry);
  }

  public delete(fileKey: string): void {
    this.entries.delete(fileKey);
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  public get size(): number {
    return this.entries.size;
  }

  public async save(): Promise<void> {
    const files: Record<string, ManifestEntry> = {};
    for (const key of Array.from(this.entries.keys()).sort()) {
      const entry = this.entries.get(key);
      if (entry) files[key] = entry;
    }
    await writeFileAtomic(
      this.filePath,
      JSON.stringify({ version: 1, savedAt: new Date().toISOString(), files }, null, 2),
    );
  }
}
