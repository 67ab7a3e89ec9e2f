/**
 * HTTP surface: REST endpoints for the search service plus the MCP
 * streamable-HTTP session routes, on one Express app.
 *
 * Endpoints:
 *  - GET    /health         orchestrator health + server status
 *  - POST   /query          JSON query request -> query response
 *  - POST   /rebuild-index  rebuild the live index (409 while one is running)
 *  - POST   /mcp            JSON-RPC; a body-only `initialize` opens a session
 *  - GET    /mcp            session stream (requires `mcp-session-id`)
 *  - DELETE /mcp            session teardown
 *
 * Error bodies are `{ error: { code, message } }`: validation (including a
 * body that is not JSON) 422, rebuild conflict 409, missing index file 404,
 * anything else 500.
 *
 * Environment variables:
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1),
 *  ALLOWED_HOSTS (comma list of host[:port]; local-only default),
 *  ENABLE_DNS_REBINDING_PROTECTION ("false" disables).
 */
import express from "express";
import type { Server as HttpServer } from "node:http";
import { randomUUID } from "node:crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError, RagError, ValidationError } from "../errors";
import type { QueryOrchestrator } from "../orchestrator";
import { statusManager } from "../status";

export interface HttpOptions {
  port: number;
  host: string;
  allowedHosts: string[];
  dnsRebindingProtection: boolean;
}

export function httpOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): HttpOptions {
  const port = Number(env.MCP_PORT ?? 3000);
  const host = (env.HOST ?? "127.0.0.1").trim();
  const defaults = new Set([
    "127.0.0.1",
    `127.0.0.1:${port}`,
    "localhost",
    `localhost:${port}`,
    host,
    `${host}:${port}`,
  ]);
  return {
    port,
    host,
    allowedHosts: (env.ALLOWED_HOSTS ?? [...defaults].join(","))
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    dnsRebindingProtection: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
  };
}

export function httpStatusFor(e: unknown): number {
  if (!(e instanceof RagError)) return 500;
  switch (e.code) {
    case "VALIDATION":
      return 422;
    case "REBUILD_IN_PROGRESS":
      return 409;
    case "INDEX_NOT_FOUND":
      return 404;
    default:
      return 500;
  }
}

/** body-parser's failure for a request body that is not valid JSON. */
function isJsonParseError(e: unknown): boolean {
  return e instanceof SyntaxError && "type" in e && e.type === "entity.parse.failed";
}

function sendError(res: express.Response, e: unknown) {
  const code = e instanceof RagError ? e.code : "INTERNAL";
  res.status(httpStatusFor(e)).json({ error: { code, message: describeError(e) } });
}

/**
 * Express app over a shared orchestrator. `createServer` produces a fresh,
 * unconnected MCP server for every new session.
 */
export function createHttpApp(
  orchestrator: QueryOrchestrator,
  createServer: () => Server,
  opts: Pick<HttpOptions, "allowedHosts" | "dnsRebindingProtection">,
): express.Express {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({ ...orchestrator.health(), server: statusManager.getStatus() });
  });

  app.post("/query", async (req, res) => {
    try {
      res.json(await orchestrator.query(req.body));
    } catch (e) {
      sendError(res, e);
    }
  });

  app.post("/rebuild-index", async (_req, res) => {
    try {
      res.json(await orchestrator.rebuild());
    } catch (e) {
      sendError(res, e);
    }
  });

  /** Active session transports keyed by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req, res) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports[sessionId] : undefined;

      // A session is only created for a header-less initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.dnsRebindingProtection,
          allowedHosts: opts.allowedHosts,
        });
        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again; detach first to avoid re-entry.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[RAG] MCP server close failed:", e));
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
      console.error("[RAG] HTTP POST /mcp error:", err);
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
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] HTTP ${req.method} /mcp error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (!isJsonParseError(err) || res.headersSent) {
      next(err);
      return;
    }
    if (req.path === "/mcp") {
      res.status(400).json({ jsonrpc: "2.0", error: { code: -32700, message: "Parse error" }, id: null });
      return;
    }
    sendError(res, new ValidationError(["body: Malformed JSON"]));
  });

  return app;
}

/** Bind the app and resolve once listening. */
export async function startHttpTransport(app: express.Express, opts: Pick<HttpOptions, "port" | "host">): Promise<HttpServer> {
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(opts.port, opts.host, () => {
      console.error(`[RAG] HTTP listening at http://${opts.host}:${opts.port} (MCP at /mcp)`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
