import { randomUUID } from "node:crypto";

import express from "express";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { CallToolRequestSchema, ListToolsRequestSchema, isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import { MonitorError, mapErrorToPayload } from "../core/errors.js";
import { CoreConfig } from "../core/types.js";
import { constantTimeEqual, logInfo, logWarn } from "../core/utils.js";
import { ToolRegistry } from "./registry.js";

export const SERVER_NAME = "citrix-monitor-mcp";
export const SERVER_VERSION = "0.1.0";

type SessionState = {
  server: Server;
  transport: StreamableHTTPServerTransport;
};

export function createMonitorMcpServer(registry: ToolRegistry): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: registry.list() }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const outcome = await registry.dispatch(request.params.name, request.params.arguments ?? {});
    return {
      content: [{ type: "text" as const, text: outcome.text }],
      ...(outcome.isError ? { isError: true } : {}),
    };
  });

  return server;
}

export async function startStdioServer(registry: ToolRegistry): Promise<Server> {
  const server = createMonitorMcpServer(registry);
  await server.connect(new StdioServerTransport());
  return server;
}

function logCloseFailure(what: string, error: unknown): void {
  logWarn("mcp.session.closeFailed", { what, error: error instanceof Error ? error.message : String(error) });
}

export function createMcpApp(registry: ToolRegistry, config: CoreConfig): express.Express {
  const app = express();
  const sessions = new Map<string, SessionState>();

  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));
  app.use((req, res, next) => {
    const supplied = String(req.header("x-request-id") || "").trim();
    const requestId = supplied || randomUUID();
    const startedAt = Date.now();
    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      logInfo("http.request", {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });

  function requireServerKey(req: express.Request): void {
    if (!config.serverApiKey) return;
    const supplied = String(req.header("x-server-key") || "");
    if (!constantTimeEqual(supplied, config.serverApiKey)) {
      throw new MonitorError(401, "Missing or invalid X-Server-Key.");
    }
  }

  async function closeSession(sessionId: string): Promise<void> {
    const state = sessions.get(sessionId);
    if (!state) return;
    sessions.delete(sessionId);
    await state.transport.close().catch((error: unknown) => logCloseFailure("transport", error));
    await state.server.close().catch((error: unknown) => logCloseFailure("server", error));
  }

  function writeJsonRpcError(res: express.Response, code: number, mapped: { status: number; message: string }): void {
    if (res.headersSent) return;
    res.status(mapped.status).json({
      jsonrpc: "2.0",
      error: { code, message: mapped.message },
      id: null,
    });
  }

  function lookupSession(req: express.Request, res: express.Response): SessionState | undefined {
    const sessionId = String(req.header("mcp-session-id") || "").trim();
    if (!sessionId) {
      writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header." });
      return undefined;
    }
    const state = sessions.get(sessionId);
    if (!state) {
      writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
    }
    return state;
  }

  app.post(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(req);
      const sessionId = String(req.header("mcp-session-id") || "").trim();

      if (sessionId) {
        const state = sessions.get(sessionId);
        if (!state) {
          writeJsonRpcError(res, -32001, { status: 404, message: `Unknown MCP session '${sessionId}'.` });
          return;
        }
        await state.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        writeJsonRpcError(res, -32000, { status: 400, message: "Missing mcp-session-id header for non-initialize request." });
        return;
      }

      const mcpServer = createMonitorMcpServer(registry);
      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (newSessionId) => {
          sessions.set(newSessionId, { server: mcpServer, transport });
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid) sessions.delete(sid);
        mcpServer.close().catch((error: unknown) => logCloseFailure("server", error));
      };

      try {
        await mcpServer.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        await transport.close().catch((closeError: unknown) => logCloseFailure("transport", closeError));
        await mcpServer.close().catch((closeError: unknown) => logCloseFailure("server", closeError));
        throw error;
      }
    } catch (error) {
      writeJsonRpcError(res, -32603, mapErrorToPayload(error));
    }
  });

  app.get(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(req);
      const state = lookupSession(req, res);
      if (!state) return;
      await state.transport.handleRequest(req, res);
    } catch (error) {
      writeJsonRpcError(res, -32603, mapErrorToPayload(error));
    }
  });

  app.delete(config.mcpPath, async (req, res) => {
    try {
      requireServerKey(req);
      const state = lookupSession(req, res);
      if (!state) return;
      await state.transport.handleRequest(req, res);
      const sid = state.transport.sessionId;
      if (sid) await closeSession(sid);
    } catch (error) {
      writeJsonRpcError(res, -32603, mapErrorToPayload(error));
    }
  });

  app.get(config.healthPath, (_req, res) => {
    res.json({
      ok: true,
      transport: "mcp-streamable-http",
      mcpPath: config.mcpPath,
      tools: registry.size,
      activeSessions: sessions.size,
    });
  });

  return app;
}
