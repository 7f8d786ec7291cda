import fs from "node:fs/promises";
import path from "node:path";

/** Write to a sibling temp file then rename over the target, so readers see old or new content only. */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  const tempPath = `${target}.tmp.${process.pid}.${Date.now()}`;
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.writeFile(tempPath, data, "utf8");
    await fs.rename(tempPath, target);
  } catch (e) {
    await fs.rm(tempPath, { force: true });
    throw e;
  }
}

/**
 * Cheap change marker for a file; null when it does not exist. A file
 * replaced by rename gets a new inode, so same-size rewrites within one
 * clock tick still change the marker.
 */
export async function fileStamp(p: string): Promise<string | null> {
  try {
    const st = await fs.stat(p, { bigint: true });
    return `${st.ino}:${st.mtimeNs}:${st.size}`;
  } catch {
    return null;
  }
}

export function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
