import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import { RagError } from "./errors";
import type { QueryOrchestrator } from "./orchestrator";
import { statusManager } from "./status";
import { PROVIDERS } from "./synthesizers";

/** Map service errors onto MCP error codes. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof RagError) {
    if (e.code === "VALIDATION") return new McpError(ErrorCode.InvalidParams, e.message);
    if (e.code === "REBUILD_IN_PROGRESS") return new McpError(ErrorCode.InvalidRequest, e.message);
    return new McpError(ErrorCode.InternalError, e.message);
  }
  return new McpError(ErrorCode.InternalError, e instanceof Error ? e.message : String(e));
}

function jsonContent(payload: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }] };
}

/**
 * Build a fresh MCP server bound to the shared orchestrator. One server is
 * created per transport session; the index itself is shared.
 *
 * Tools:
 *  rag_query      { q, per_page?, page?, provider?, index_path? } -> query response JSON
 *  rebuild_index  {} -> { status, message, num_documents, index_path }
 *  index_status   {} -> orchestrator health + server status
 */
export function createServer(orchestrator: QueryOrchestrator, folderInfoName = "RAG_DATA_DIR"): Server {
  const server = new Server(
    { name: "docsearch-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "rag_query",
        description: `Search documents under '${folderInfoName}'. The 'simple' provider returns every line matching the query (hyphen/space tolerant) as HTML; model providers answer from the best-ranked documents. Results are ranked by TF-IDF cosine similarity and paginated.`,
        inputSchema: {
          type: "object",
          properties: {
            q: { type: "string", description: "Search query (1-500 characters)." },
            per_page: { type: "number", description: "Results per page (default 10).", minimum: 1 },
            page: { type: "number", description: "1-based page number (default 1).", minimum: 1 },
            provider: {
              type: "string",
              enum: [...PROVIDERS],
              description: "Answer strategy (default 'simple').",
            },
            index_path: { type: "string", description: "Query a different persisted index file." },
          },
          required: ["q"],
        },
      },
      {
        name: "rebuild_index",
        description: `Re-read every document under '${folderInfoName}' and replace the live index. Fails if a rebuild is already running.`,
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "index_status",
        description: "Report whether an index is loaded, whether a rebuild is running, and document counts.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    try {
      switch (req.params.name) {
        case "rag_query":
          return jsonContent(await orchestrator.query(req.params.arguments ?? {}));
        case "rebuild_index":
          return jsonContent(await orchestrator.rebuild());
        case "index_status":
          return jsonContent({ ...orchestrator.health(), server: statusManager.getStatus() });
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      throw toMcpError(e);
    }
  });

  return server;
}
