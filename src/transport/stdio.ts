import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve one MCP session over stdin/stdout. stdout belongs to the protocol
 * from here on; diagnostics stay on stderr.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  return server;
}
