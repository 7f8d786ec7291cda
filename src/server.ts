/**
 * MCP surface over the pattern index.
 *
 * Tools:
 *  search_patterns
 *    Input:  { query, content_type?, pack?, top_k?, include_full_text? }
 *    Output: { query, top_k, matches: Array<{ identity_key, name, content_type, pack, path,
 *              description, score, excerpt, metadata, full_text? }> }
 *  get_pattern_index_stats
 *    Input:  {}
 *    Output: index statistics plus server / build status
 *  read_pattern_file
 *    Input:  { path, startLine?, endLine? }
 *    Output: file text (or 1-based inclusive line range) from the content checkout
 *
 * Error mapping:
 *  - Invalid arguments, empty query, path traversal  -> InvalidParams
 *  - Embedding / store failures                      -> InternalError naming the condition
 *  - Unknown tool                                    -> MethodNotFound
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import type { CheckoutContentSource } from "./content-source";
import { PatternIndexError, describeError } from "./errors";
import type { IndexStore } from "./index-store";
import type { QueryEngine } from "./query-engine";
import { statusManager, type StatusManager } from "./status";
import { CONTENT_TYPES } from "./types";

export interface ServerContext {
  engine: QueryEngine;
  store: IndexStore;
  /** Checkout backing `read_pattern_file` and full-text results; optional. */
  contentSource?: CheckoutContentSource;
  status?: StatusManager;
}

const contentTypeSchema = z.enum(CONTENT_TYPES);

const searchArgs = z.object({
  query: z.string(),
  content_type: z.union([contentTypeSchema, z.array(contentTypeSchema)]).optional(),
  pack: z.string().min(1).optional(),
  top_k: z.number().optional(),
  include_full_text: z.boolean().optional(),
});

const readFileArgs = z.object({
  path: z.string().min(1),
  startLine: z.number().int().min(1).optional(),
  endLine: z.number().int().min(1).optional(),
});

function parseArgs<T>(schema: z.ZodType<T>, tool: string, args: unknown): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const fields = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${fields}`);
  }
  return result.data;
}

/** Translate domain failures into MCP protocol errors. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof PatternIndexError) {
    switch (e.code) {
      case "INVALID_QUERY":
      case "PATH_TRAVERSAL":
        return new McpError(ErrorCode.InvalidParams, e.message);
      default:
        return new McpError(ErrorCode.InternalError, `${e.code}: ${e.message}`);
    }
  }
  return new McpError(ErrorCode.InternalError, describeError(e));
}

function json(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

const TOOLS: Tool[] = [
  {
    name: "search_patterns",
    description:
      "Semantically search indexed playbooks, scripts, integrations, classifiers, mappers and parsing/modeling rules. Returns the best-matching documents with pack, path, description, score (cosine similarity, -1..1) and an excerpt.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Natural language description of the automation you are looking for.",
        },
        content_type: {
          description: "Restrict to one content type or a list of them.",
          oneOf: [
            { type: "string", enum: [...CONTENT_TYPES] },
            { type: "array", items: { type: "string", enum: [...CONTENT_TYPES] } },
          ],
        },
        pack: { type: "string", description: "Restrict to one content pack (exact name)." },
        top_k: {
          type: "number",
          description: "Maximum number of documents to return (1-50). Defaults to 5.",
          minimum: 1,
          maximum: 50,
        },
        include_full_text: {
          type: "boolean",
          description: "Attach the raw source file when a content checkout is configured.",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "get_pattern_index_stats",
    description: "Record and document counts per content type, plus build status.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "read_pattern_file",
    description:
      "Read a content file by the relative path returned from search_patterns (optionally a line range).",
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Path relative to the content root (forward slashes)." },
        startLine: { type: "number", description: "1-based first line (inclusive).", minimum: 1 },
        endLine: { type: "number", description: "1-based last line (inclusive).", minimum: 1 },
      },
      required: ["path"],
    },
  },
];

/**
 * Execute one tool call. Kept apart from the SDK wiring so it can be driven
 * directly.
 *
 * @throws {McpError}
 */
export async function handleToolCall(
  ctx: ServerContext,
  name: string,
  args: unknown,
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "search_patterns": {
        const a = parseArgs(searchArgs, name, args);
        const contentTypes =
          a.content_type === undefined
            ? undefined
            : Array.isArray(a.content_type)
              ? a.content_type
              : [a.content_type];
        const result = await ctx.engine.search({
          text: a.query,
          contentTypes,
          pack: a.pack,
          topK: a.top_k,
          includeFullText: a.include_full_text,
        });
        return json({
          query: result.query,
          top_k: result.topK,
          matches: result.matches.map((m) => ({
            identity_key: m.identityKey,
            name: m.displayName,
            content_type: m.contentType,
            pack: m.packName,
            path: m.relativePath,
            description: m.description,
            score: Number(m.score.toFixed(4)),
            excerpt: m.textExcerpt,
            metadata: m.metadata,
            ...(m.fullText !== undefined ? { full_text: m.fullText } : {}),
          })),
        });
      }

      case "get_pattern_index_stats": {
        await ctx.store.refresh();
        return json({
          ...ctx.store.stats(),
          status: (ctx.status ?? statusManager).getStatus(),
        });
      }

      case "read_pattern_file": {
        const a = parseArgs(readFileArgs, name, args);
        if (!ctx.contentSource) {
          throw new McpError(
            ErrorCode.InvalidRequest,
            "No content checkout configured (set PATTERN_CONTENT_PATH)",
          );
        }
        const text = await ctx.contentSource.readLines(a.path, a.startLine, a.endLine);
        if (text === undefined) throw new McpError(ErrorCode.InvalidParams, `File not found: ${a.path}`);
        return { content: [{ type: "text", text }] };
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    const err = toMcpError(e);
    console.error(`[MCP] ${name} failed: ${err.message}`);
    throw err;
  }
}

/**
 * Factory for a fresh MCP Server bound to the shared index handles. HTTP mode
 * creates one per session; the store and engine are shared.
 */
export function createServer(ctx: ServerContext): Server {
  const server = new Server(
    { name: "pattern-index-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    handleToolCall(ctx, req.params.name, req.params.arguments),
  );

  return server;
}
