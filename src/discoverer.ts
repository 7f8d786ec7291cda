import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import fg from "fast-glob";
import { GLOB_RULES, packNameFromPath } from "./content-types";
import { describeError } from "./errors";
import { resolveWithinRoot } from "./path-guard";
import { CONTENT_TYPES, type CandidateFile, type ContentType } from "./types";

export interface DiscoverOptions {
  /** Only walk these types. Omitted or empty means every type. */
  types?: readonly ContentType[];
  /** Descend into symlinked directories and accept symlinked files inside root. */
  followSymlinks?: boolean;
  /** Walk packs whose name contains "deprecated". Default false. */
  includeDeprecatedPacks?: boolean;
  /** Stop after this many files per type; 0 or omitted means no cap. */
  maxPerType?: number;
  /** Receives one message per skipped entry. */
  onWarning?: (message: string) => void;
}

/** Code-unit ordering; independent of locale so repeated builds enumerate identically. */
function isDeprecatedPack(relativePath: string): boolean {
  return packNameFromPath(relativePath).toLowerCase().includes("deprecated");
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Lazily enumerate candidate files under `root`. Types are visited in
 * enumeration order and files lexicographically by relative path within a
 * type. Packs named as deprecated are passed over unless asked for, and
 * `maxPerType` caps each type's share of the walk. Every yielded path has passed the path guard; symlinked or
 * unreadable entries are reported through `onWarning` and skipped. Each call
 * starts a fresh walk.
 */
export async function* discover(
  root: string,
  opts: DiscoverOptions = {},
): AsyncGenerator<CandidateFile> {
  const wanted = opts.types?.length ? new Set(opts.types) : null;
  const warn = opts.onWarning ?? (() => {});
  const followSymlinks = !!opts.followSymlinks;
  const cap = opts.maxPerType && opts.maxPerType > 0 ? opts.maxPerType : Infinity;

  for (const contentType of CONTENT_TYPES) {
    if (wanted && !wanted.has(contentType)) continue;
    const rule = GLOB_RULES[contentType];
    const matches = await fg([...rule.patterns], {
      cwd: root,
      ignore: [...rule.ignore],
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: followSymlinks,
      suppressErrors: true,
    });
    matches.sort(byCodeUnit);

    let taken = 0;
    for (const relativePath of matches) {
      if (taken >= cap) break;
      if (!opts.includeDeprecatedPacks && isDeprecatedPack(relativePath)) continue;
      let absolutePath: string;
      try {
        absolutePath = await resolveWithinRoot(root, relativePath, {
          allowSymlinks: followSymlinks,
        });
        await fs.access(absolutePath, fsConstants.R_OK);
      } catch (e) {
        warn(`Skipping ${relativePath}: ${describeError(e)}`);
        continue;
      }
      taken++;
      yield { contentType, absolutePath, relativePath };
    }
  }
}

/** Drain {@link discover} into an array. */
export async function discoverAll(
  root: string,
  opts: DiscoverOptions = {},
): Promise<CandidateFile[]> {
  const out: CandidateFile[] = [];
  for await (const candidate of discover(root, opts)) out.push(candidate);
  return out;
}
