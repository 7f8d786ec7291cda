import fs from "node:fs/promises";
import path from "node:path";
import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { CheckoutContentSource } from "./content-source";
import { StoreUnavailableError } from "./errors";
import { buildIndex } from "./index-builder";
import { IndexStore } from "./index-store";
import { QueryEngine } from "./query-engine";
import { handleToolCall, toMcpError, type ServerContext } from "./server";
import { StatusManager } from "./status";
import { LIBRARY, hashBackend, makeTempDir, writeFiles } from "./test-utils";

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  if (first?.type !== "text") throw new Error("expected a text result");
  return first.text;
}

async function callError(ctx: ServerContext, name: string, args: unknown): Promise<McpError> {
  const err = await handleToolCall(ctx, name, args).catch((e: unknown) => e);
  if (!(err instanceof McpError)) throw new Error(`expected McpError, got ${String(err)}`);
  return err;
}

describe("handleToolCall", () => {
  let base: string;
  let root: string;
  let store: IndexStore;
  let ctx: ServerContext;

  beforeAll(async () => {
    base = await fs.realpath(await makeTempDir("pattern-server-"));
    root = path.join(base, "content");
    const indexDir = path.join(base, "index");
    await writeFiles(root, LIBRARY);
    const backend = hashBackend();
    await buildIndex({ root, indexDir, backend, mode: "full", status: new StatusManager() });
    store = await IndexStore.open(indexDir, { backendId: backend.id });
    const contentSource = new CheckoutContentSource(root);
    ctx = {
      engine: new QueryEngine({ store, backend, contentSource }),
      store,
      contentSource,
      status: new StatusManager({ transport: "stdio", ready: true }),
    };
  });

  afterAll(async () => {
    await store.close();
    await fs.rm(base, { recursive: true, force: true });
  });

  it("searches with snake_case result fields", async () => {
    const result = await handleToolCall(ctx, "search_patterns", {
      query: "Acme Incoming Mapper",
      content_type: "mapper",
    });
    const body = JSON.parse(textOf(result));
    expect(body.query).toBe("Acme Incoming Mapper");
    expect(body.top_k).toBe(5);
    expect(body.matches).toHaveLength(1);
    expect(body.matches[0]).toMatchObject({
      identity_key: "mapper:Packs/Acme/Classifiers/classifier-mapper-incoming-acme.json",
      name: "Acme Incoming Mapper",
      content_type: "mapper",
      pack: "Acme",
      path: "Packs/Acme/Classifiers/classifier-mapper-incoming-acme.json",
      metadata: { direction: "incoming" },
    });
    expect(body.matches[0]).not.toHaveProperty("full_text");
  });

  it("accepts a list of types, clamps top_k and attaches full text", async () => {
    const result = await handleToolCall(ctx, "search_patterns", {
      query: "rules for acme",
      content_type: ["parsing_rule", "modeling_rule"],
      top_k: 500,
      include_full_text: true,
    });
    const body = JSON.parse(textOf(result));
    expect(body.top_k).toBe(50);
    expect(body.matches).toHaveLength(2);
    const modeling = body.matches.find(
      (m: { content_type: string }) => m.content_type === "modeling_rule",
    );
    expect(modeling.full_text).toBe(
      LIBRARY["Packs/Acme/ModelingRules/AcmeModelingRules/AcmeModelingRules.xif"],
    );
  });

  it("rejects malformed arguments and blank queries as invalid params", async () => {
    const bad = await callError(ctx, "search_patterns", { query: 42 });
    expect(bad.code).toBe(ErrorCode.InvalidParams);
    expect(bad.message).toContain("Invalid arguments for search_patterns: query:");

    const wrongType = await callError(ctx, "search_patterns", { query: "x", content_type: "widget" });
    expect(wrongType.code).toBe(ErrorCode.InvalidParams);

    const blank = await callError(ctx, "search_patterns", { query: "  " });
    expect(blank.code).toBe(ErrorCode.InvalidParams);
    expect(blank.message).toContain("Missing query text");
  });

  it("reports index statistics with build status", async () => {
    const body = JSON.parse(textOf(await handleToolCall(ctx, "get_pattern_index_stats", {})));
    expect(body.totalRecords).toBe(9);
    expect(body.totalDocuments).toBe(9);
    expect(body.backendId).toBe("hash:384");
    expect(body.status.transport).toBe("stdio");
    expect(body.status.ready).toBe(true);
  });

  it("reads a file or a line range from the checkout", async () => {
    const whole = await handleToolCall(ctx, "read_pattern_file", {
      path: "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
    });
    expect(textOf(whole)).toBe(LIBRARY["Packs/ThreatIntel/Playbooks/Enrich_IP.yml"]);

    const range = await handleToolCall(ctx, "read_pattern_file", {
      path: "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
      startLine: 2,
      endLine: 3,
    });
    expect(textOf(range)).toBe("name: Enrich IP Playbook\ndescription: Enrich IP addresses using VirusTotal");
  });

  it("refuses traversal and reports missing files", async () => {
    const traversal = await callError(ctx, "read_pattern_file", { path: "../../etc/passwd" });
    expect(traversal.code).toBe(ErrorCode.InvalidParams);

    const missing = await callError(ctx, "read_pattern_file", { path: "Packs/Nope/x.yml" });
    expect(missing.code).toBe(ErrorCode.InvalidParams);
    expect(missing.message).toContain("File not found: Packs/Nope/x.yml");
  });

  it("needs a checkout to read files", async () => {
    const err = await callError({ ...ctx, contentSource: undefined }, "read_pattern_file", {
      path: "Packs/ThreatIntel/Playbooks/Enrich_IP.yml",
    });
    expect(err.code).toBe(ErrorCode.InvalidRequest);
  });

  it("rejects unknown tools", async () => {
    const err = await callError(ctx, "drop_index", {});
    expect(err.code).toBe(ErrorCode.MethodNotFound);
  });
});

describe("toMcpError", () => {
  it("names the failing condition for internal errors", () => {
    const err = toMcpError(new StoreUnavailableError("Index store is corrupt"));
    expect(err.code).toBe(ErrorCode.InternalError);
    expect(err.message).toContain("STORE_UNAVAILABLE: Index store is corrupt");
  });

  it("passes protocol errors through", () => {
    const original = new McpError(ErrorCode.InvalidRequest, "nope");
    expect(toMcpError(original)).toBe(original);
  });
});
