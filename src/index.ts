/**
 * MCP server entry point.
 *
 * 1. Read configuration (dotenv + environment, see config.ts).
 * 2. Create and warm up the embedding backend.
 * 3. Optionally (INDEX_ON_START) run an incremental build of CONTENT_ROOT.
 * 4. Open the persistent index store and serve search / stats / file tools over
 *    stdio (default) or streamable HTTP (MCP_TRANSPORT=http, with /health).
 *
 * The index itself is produced by `pattern-index build` (cli.ts) or step 3;
 * the server only reads it, reloading when another process commits.
 */
import { createBackend } from "./backend-factory";
import { readConfig } from "./config";
import { CheckoutContentSource } from "./content-source";
import { describeError } from "./errors";
import { buildIndex } from "./index-builder";
import { IndexStore } from "./index-store";
import { QueryEngine } from "./query-engine";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = readConfig();
statusManager.setLocations(config.CONTENT_ROOT ?? "", config.INDEX_DIR);

const backend = await createBackend(config);
statusManager.setBackendId(backend.id);

if (config.INDEX_ON_START) {
  if (!config.CONTENT_ROOT) {
    console.error("[MCP] INDEX_ON_START is set but CONTENT_ROOT is not; serving the existing index");
  } else {
    try {
      await buildIndex({
        root: config.CONTENT_ROOT,
        indexDir: config.INDEX_DIR,
        backend,
        mode: "incremental",
        types: config.INDEX_TYPES,
        concurrency: config.INDEX_CONCURRENCY,
        followSymlinks: config.FOLLOW_SYMLINKS,
        includeDeprecated: config.INCLUDE_DEPRECATED,
        maxItems: config.MAX_ITEMS,
        chunkSize: config.CHUNK_SIZE,
        chunkOverlap: config.CHUNK_OVERLAP,
        embedTimeoutMs: config.EMBED_TIMEOUT_MS,
        verbose: config.VERBOSE,
      });
    } catch (e) {
      // The previous generation (if any) is still servable.
      console.error(`[MCP] Startup build failed: ${describeError(e)}`);
    }
  }
}

const store = await IndexStore.open(config.INDEX_DIR, {
  backendId: backend.id,
  verbose: config.VERBOSE,
});
if (!store.compatible) {
  console.error(
    `[MCP] Index at ${config.INDEX_DIR} was built with ${store.storedBackendId}; searches will fail until it is rebuilt with ${backend.id}`,
  );
}
statusManager.markReady();

const contentSource = config.CONTENT_PATH
  ? new CheckoutContentSource(config.CONTENT_PATH, { allowSymlinks: config.FOLLOW_SYMLINKS })
  : undefined;
const engine = new QueryEngine({
  store,
  backend,
  contentSource,
  timeoutMs: config.EMBED_TIMEOUT_MS,
});
const factory = () => createServer({ engine, store, contentSource });

if (config.MCP_TRANSPORT === "http") {
  statusManager.markTransport("http");
  await startHttpTransport(factory, { ...config, store });
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(factory);
}
