/**
 * Streamable HTTP transport.
 *
 * Session model: a client opens a session by POSTing an `initialize` request
 * to /mcp without an `mcp-session-id` header. That creates a transport plus a
 * fresh MCP Server; every later request carries the returned session id.
 * Sessions are evicted when their transport closes.
 *
 * Endpoints:
 *  - POST   /mcp    JSON-RPC requests
 *  - GET    /mcp    streaming channel of an existing session
 *  - DELETE /mcp    session teardown
 *  - GET    /health server, build and index status
 *
 * Allowed hosts default to loopback plus the bound host/port; DNS rebinding
 * protection stays on unless ENABLE_DNS_REBINDING_PROTECTION=false.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { Config } from "../config";
import { describeError } from "../errors";
import type { IndexStore } from "../index-store";
import { statusManager } from "../status";

export type HttpTransportOptions = Pick<
  Config,
  "MCP_PORT" | "HOST" | "ALLOWED_HOSTS" | "ENABLE_DNS_REBINDING_PROTECTION"
> & {
  /** Store whose stats /health reports. */
  store?: IndexStore;
};

function sessionHeader(req: express.Request): string | undefined {
  const raw = req.headers["mcp-session-id"];
  return Array.isArray(raw) ? raw[0] : raw;
}

/** Express app wiring /mcp sessions and /health; not yet listening. */
export function createHttpApp(createServer: () => Server, opts: HttpTransportOptions) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = opts.MCP_PORT;
  const host = opts.HOST;
  const allowedHosts = opts.ALLOWED_HOSTS ?? [
    ...new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  ];

  const sessions = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = sessionHeader(req);
      let transport = sessionId ? sessions.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            sessions.set(sid, created);
          },
          enableDnsRebindingProtection: opts.ENABLE_DNS_REBINDING_PROTECTION,
          allowedHosts,
        });
        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) sessions.delete(created.sessionId);
          // server.close() closes the transport again; detach first.
          created.onclose = undefined;
          server
            .close()
            .catch((e: unknown) => console.error(`[MCP] Session close failed: ${describeError(e)}`));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error(`[MCP] HTTP POST error: ${describeError(err)}`);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionHeader(req);
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error: ${describeError(err)}`);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json({
      ...statusManager.getStatus(),
      index: opts.store ? opts.store.stats() : null,
    });
  });

  return app;
}

/**
 * Bind the HTTP transport. Each session owns its own MCP Server instance
 * produced by `createServer`.
 */
export async function startHttpTransport(
  createServer: () => Server,
  opts: HttpTransportOptions,
): Promise<HttpServer> {
  const app = createHttpApp(createServer, opts);
  return new Promise<HttpServer>((resolve, reject) => {
    const listener = app.listen(opts.MCP_PORT, opts.HOST, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${opts.HOST}:${opts.MCP_PORT}/mcp`);
      resolve(listener);
    });
    listener.on("error", reject);
  });
}
