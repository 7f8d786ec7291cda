/**
 * Command line entry point.
 *
 *   pattern-index build  [--source <root>] [--index-dir <dir>] [--full] [--types a,b]
 *                        [--concurrency n] [--max-items n] [--follow-symlinks] [--include-deprecated]
 *                        [--verbose]
 *   pattern-index search <text> [--type t]... [--pack p] [--top-k n] [--content] [--index-dir <dir>]
 *   pattern-index stats  [--index-dir <dir>]
 *
 * Results go to stdout as JSON; diagnostics go to stderr. SIGINT during a
 * build cancels between files and still prints the report.
 */
import path from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { createBackend } from "./backend-factory";
import { readConfig, expandPath, type Config } from "./config";
import { CheckoutContentSource } from "./content-source";
import { PatternIndexError, describeError } from "./errors";
import { buildIndex } from "./index-builder";
import { withIndexStore } from "./index-store";
import { QueryEngine } from "./query-engine";
import { statusManager } from "./status";
import { isContentType, type ContentType } from "./types";
import type { EmbeddingBackend } from "./backend";

const USAGE = `Usage:
  pattern-index build  [--source <root>] [--index-dir <dir>] [--full] [--types a,b]
                       [--concurrency n] [--max-items n] [--follow-symlinks] [--include-deprecated]
                       [--verbose]
  pattern-index search <text> [--type t]... [--pack p] [--top-k n] [--content] [--index-dir <dir>]
  pattern-index stats  [--index-dir <dir>]`;

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface CliDeps {
  config?: Config;
  io?: CliIo;
  /** Backend override; defaults to the configured one. */
  backend?: EmbeddingBackend;
  /** Cancels a running build (the binary wires SIGINT here). */
  signal?: AbortSignal;
}

class UsageError extends Error {}

function parseTypes(values: readonly string[]): ContentType[] {
  const out: ContentType[] = [];
  for (const v of values.flatMap((s) => s.split(","))) {
    const t = v.trim();
    if (!t) continue;
    if (!isContentType(t)) throw new UsageError(`Unknown content type: ${t}`);
    out.push(t);
  }
  return out;
}

function parseCount(raw: string | undefined, flagName: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`${flagName} expects a positive integer`);
  return n;
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      source: { type: "string" },
      "index-dir": { type: "string" },
      full: { type: "boolean", default: false },
      types: { type: "string", multiple: true },
      type: { type: "string", multiple: true },
      concurrency: { type: "string" },
      "max-items": { type: "string" },
      "follow-symlinks": { type: "boolean" },
      "include-deprecated": { type: "boolean" },
      pack: { type: "string" },
      "top-k": { type: "string" },
      content: { type: "boolean", default: false },
      verbose: { type: "boolean" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });
}

type ParsedArgs = ReturnType<typeof parseCliArgs>;

/**
 * Run one CLI invocation.
 *
 * @returns Process exit code: 0 success, 1 failure, 2 usage error.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIo = deps.io ?? {
    out: (text) => process.stdout.write(`${text}\n`),
    err: (text) => process.stderr.write(`${text}\n`),
  };
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    io.err(`${describeError(e)}\n${USAGE}`);
    return 2;
  }
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    io.err(USAGE);
    return values.help ? 0 : 2;
  }

  const config = deps.config ?? readConfig();
  const indexDir = values["index-dir"] ? expandPath(values["index-dir"]) : config.INDEX_DIR;
  const verbose = values.verbose ?? config.VERBOSE;

  try {
    switch (command) {
      case "build": {
        const root = values.source ? expandPath(values.source) : config.CONTENT_ROOT;
        if (!root) throw new UsageError("build needs --source or CONTENT_ROOT");
        const types = parseTypes(values.types ?? []);
        const backend = deps.backend ?? (await createBackend(config));
        statusManager.markTransport("cli");
        statusManager.setLocations(root, indexDir);
        statusManager.setBackendId(backend.id);
        const report = await buildIndex({
          root,
          indexDir,
          backend,
          mode: values.full ? "full" : "incremental",
          types: types.length ? types : config.INDEX_TYPES,
          concurrency: parseCount(values.concurrency, "--concurrency") ?? config.INDEX_CONCURRENCY,
          followSymlinks: values["follow-symlinks"] ?? config.FOLLOW_SYMLINKS,
          includeDeprecated: values["include-deprecated"] ?? config.INCLUDE_DEPRECATED,
          maxItems: parseCount(values["max-items"], "--max-items") ?? config.MAX_ITEMS,
          chunkSize: config.CHUNK_SIZE,
          chunkOverlap: config.CHUNK_OVERLAP,
          embedTimeoutMs: config.EMBED_TIMEOUT_MS,
          signal: deps.signal,
          verbose,
        });
        io.out(JSON.stringify(report, null, 2));
        return 0;
      }

      case "search": {
        const text = rest.join(" ").trim();
        if (!text) throw new UsageError("search needs query text");
        const types = parseTypes(values.type ?? []);
        const topK = parseCount(values["top-k"], "--top-k");
        const backend = deps.backend ?? (await createBackend(config));
        const contentSource = config.CONTENT_PATH
          ? new CheckoutContentSource(config.CONTENT_PATH, { allowSymlinks: config.FOLLOW_SYMLINKS })
          : undefined;
        const result = await withIndexStore(indexDir, { backendId: backend.id, verbose }, (store) =>
          new QueryEngine({
            store,
            backend,
            contentSource,
            timeoutMs: config.EMBED_TIMEOUT_MS,
          }).search({
            text,
            contentTypes: types,
            pack: values.pack,
            topK,
            includeFullText: values.content,
          }),
        );
        io.out(JSON.stringify(result, null, 2));
        return 0;
      }

      case "stats": {
        // Stats never embed, so any backend id opens the store.
        const stats = await withIndexStore(indexDir, { backendId: "" }, async (store) => store.stats());
        io.out(JSON.stringify(stats, null, 2));
        return 0;
      }

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`${e.message}\n${USAGE}`);
      return 2;
    }
    io.err(e instanceof PatternIndexError ? `${e.code}: ${e.message}` : `ERROR: ${describeError(e)}`);
    return 1;
  }
}

const invokedDirectly =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(path.resolve(process.argv[1])).href;

if (invokedDirectly) {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("[index] Cancelling build after in-flight files...");
    controller.abort();
  });
  process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  process.removeAllListeners("SIGINT");
}
