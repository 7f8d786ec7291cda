import fs from "node:fs/promises";
import { isNotFound } from "./fs-utils";
import { resolveWithinRoot } from "./path-guard";

/** Resolves a stored relative path to the raw source text of a full corpus checkout. */
export interface ContentSource {
  /**
   * @returns File text, or undefined when the checkout has no such file.
   * @throws {PathTraversalError} When the path escapes the checkout root.
   */
  readText(relativePath: string): Promise<string | undefined>;
}

/** Path-guarded reader over a checkout directory. */
export class CheckoutContentSource implements ContentSource {
  public constructor(
    public readonly root: string,
    private readonly opts: { allowSymlinks?: boolean } = {},
  ) {}

  public async readText(relativePath: string): Promise<string | undefined> {
    const abs = await resolveWithinRoot(this.root, relativePath, {
      allowSymlinks: this.opts.allowSymlinks,
    });
    try {
      return await fs.readFile(abs, "utf8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
  }

  /**
   * Read a 1-based inclusive line range (whole file when both bounds are omitted).
   */
  public async readLines(
    relativePath: string,
    startLine?: number,
    endLine?: number,
  ): Promise<string | undefined> {
    const content = await this.readText(relativePath);
    if (content === undefined || (startLine == null && endLine == null)) return content;
    const lines = content.split(/\r?\n/);
    const s = Math.max(0, (startLine ?? 1) - 1);
    const e = Math.min(lines.length, endLine ?? lines.length);
    return lines.slice(s, e).join("\n");
  }
}
