import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { PathTraversalError } from "./errors";

export interface PathGuardOptions {
  /** Permit symlinked segments (their targets must still resolve inside root). Default false. */
  allowSymlinks?: boolean;
}

function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === "") return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`);
}

function isMissing(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    (e.code === "ENOENT" || e.code === "ENOTDIR")
  );
}

/**
 * Resolve `candidate` (relative to `root`, or absolute) and ensure the result
 * stays inside the canonical form of `root`.
 *
 * Every existing segment below the root is checked with lstat; a symlinked
 * segment fails unless `allowSymlinks` is set, in which case the fully
 * resolved target must still be a descendant of the root. Segments that do
 * not exist yet end the walk: the caller's read will fail on its own.
 *
 * @returns Absolute path under the canonical root.
 * @throws {PathTraversalError}
 */
export async function resolveWithinRoot(
  root: string,
  candidate: string,
  opts: PathGuardOptions = {},
): Promise<string> {
  if (candidate.includes("\0")) throw new PathTraversalError("Path contains a NUL byte");

  const lexicalRoot = path.resolve(root);
  let canonicalRoot: string;
  try {
    canonicalRoot = await fs.realpath(lexicalRoot);
  } catch {
    throw new PathTraversalError(`Root does not exist: ${root}`);
  }

  // Absolute candidates given against the lexical root are re-anchored on the canonical one.
  let rel = candidate;
  if (path.isAbsolute(candidate)) {
    const abs = path.resolve(candidate);
    if (isInside(lexicalRoot, abs)) rel = path.relative(lexicalRoot, abs);
    else if (isInside(canonicalRoot, abs)) rel = path.relative(canonicalRoot, abs);
    else throw new PathTraversalError(`Path outside root: ${candidate}`);
  }

  const resolved = path.resolve(canonicalRoot, rel);
  if (!isInside(canonicalRoot, resolved)) {
    throw new PathTraversalError(`Path outside root: ${candidate}`);
  }

  const segments = path.relative(canonicalRoot, resolved).split(path.sep).filter(Boolean);
  let current = canonicalRoot;
  let sawSymlink = false;
  for (const segment of segments) {
    current = path.join(current, segment);
    let st: Stats;
    try {
      st = await fs.lstat(current);
    } catch (e) {
      if (isMissing(e)) break;
      throw e;
    }
    if (st.isSymbolicLink()) {
      if (!opts.allowSymlinks) {
        throw new PathTraversalError(
          `Symlink in path: ${path.relative(canonicalRoot, current).split(path.sep).join("/")}`,
        );
      }
      sawSymlink = true;
      break;
    }
  }

  if (sawSymlink) {
    let target: string;
    try {
      target = await fs.realpath(resolved);
    } catch (e) {
      if (isMissing(e)) throw new PathTraversalError(`Dangling symlink in path: ${candidate}`);
      throw e;
    }
    if (!isInside(canonicalRoot, target)) {
      throw new PathTraversalError(`Symlink target outside root: ${candidate}`);
    }
  }

  return resolved;
}
