import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Serve a single MCP session over stdin/stdout. All logging goes to stderr so
 * the protocol stream stays clean.
 */
export async function startStdioTransport(createServer: () => Server): Promise<void> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  console.error(`[RAG] MCP server ready on stdio`);
}
