import { randomUUID } from "node:crypto";
import {
  createServer as createHttpServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse
} from "node:http";

import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import type { ToolRuntime } from "../runtime/toolRuntime.js";
import { AppError } from "../shared/errors.js";
import { createComponentLogger } from "../shared/logger.js";
import { SERVER_NAME, createServer } from "./createServer.js";

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 3000;
const DEFAULT_MCP_PATH = "/mcp";
const HEALTH_PATH = "/health";
const MIN_REQUEST_BODY_BYTES = 1024 * 1024;

const httpLogger = createComponentLogger("http");

export interface HttpServerConfig {
  host: string;
  port: number;
  mcpPath: string;
}

interface SessionContext {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export function loadHttpServerConfig(env: NodeJS.ProcessEnv = process.env): HttpServerConfig {
  const host = env.MCP_HTTP_HOST?.trim() || DEFAULT_HOST;
  const rawPort = env.MCP_HTTP_PORT?.trim() || String(DEFAULT_PORT);
  const mcpPath = env.MCP_HTTP_PATH?.trim() || DEFAULT_MCP_PATH;
  const port = Number.parseInt(rawPort, 10);

  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw AppError.validation(`MCP_HTTP_PORT 非法：${rawPort}`);
  }

  if (!mcpPath.startsWith("/")) {
    throw AppError.validation(`MCP_HTTP_PATH 必须以 / 开头，当前值：${mcpPath}`);
  }

  return { host, port, mcpPath };
}

function getHeader(headers: IncomingHttpHeaders, headerName: string): string | undefined {
  const headerValue = headers[headerName];
  const first = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  return first?.trim() || undefined;
}

function writeJson(res: ServerResponse, statusCode: number, payload: unknown): void {
  if (res.headersSent || res.writableEnded) {
    return;
  }
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(payload));
}

function writeText(res: ServerResponse, statusCode: number, message: string): void {
  if (res.headersSent || res.writableEnded) {
    return;
  }
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "text/plain; charset=utf-8");
  res.end(message);
}

function writeJsonRpcError(res: ServerResponse, statusCode: number, code: number, message: string): void {
  writeJson(res, statusCode, {
    jsonrpc: "2.0",
    error: { code, message },
    id: null
  });
}

function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    req.on("data", (chunk: Buffer | string) => {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      totalBytes += buffer.byteLength;
      if (totalBytes > maxBytes) {
        req.destroy();
        reject(new Error(`请求体超过限制：${String(maxBytes)} bytes`));
        return;
      }
      chunks.push(buffer);
    });

    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf8");
      if (!raw.trim()) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(raw) as unknown);
      } catch (error: unknown) {
        reject(error);
      }
    });

    req.on("error", reject);
  });
}

async function closeSession(sessionId: string, session: SessionContext): Promise<void> {
  session.transport.onclose = undefined;
  const results = await Promise.allSettled([session.transport.close(), session.server.close()]);
  for (const result of results) {
    if (result.status === "rejected") {
      httpLogger.warn({ err: result.reason, sessionId }, "关闭 MCP 会话失败");
    }
  }
}

function listen(server: Server, config: HttpServerConfig): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function closeHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * 以 Streamable HTTP 承载 MCP：每个会话独立的 McpServer / transport，
 * 但共享同一个 ToolRuntime，保证所有会话访问同一个记录表。
 */
export async function startHttpServer(
  runtime: ToolRuntime,
  config: HttpServerConfig = loadHttpServerConfig()
): Promise<Server> {
  const sessions = new Map<string, SessionContext>();
  // base64 膨胀约 4/3，再留出 JSON 包装的余量
  const maxBodyBytes = Math.max(MIN_REQUEST_BODY_BYTES, Math.ceil(runtime.config.maxUploadBytes * 1.5));

  const handlePost = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    let body: unknown;
    try {
      body = await readJsonBody(req, maxBodyBytes);
    } catch (error: unknown) {
      httpLogger.warn({ err: error }, "解析 MCP POST 请求体失败");
      writeJsonRpcError(res, 400, -32700, "Parse error: Invalid JSON body");
      return;
    }

    const sessionId = getHeader(req.headers, "mcp-session-id");
    if (sessionId) {
      const existing = sessions.get(sessionId);
      if (!existing) {
        writeJsonRpcError(res, 404, -32001, "Session Not Found");
        return;
      }
      await existing.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      writeJsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }

    const server = createServer(runtime);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (initializedId) => {
        sessions.set(initializedId, { server, transport });
        httpLogger.info({ sessionId: initializedId }, "MCP 会话初始化完成");
      }
    });

    transport.onclose = () => {
      const activeId = transport.sessionId;
      const active = activeId ? sessions.get(activeId) : undefined;
      if (!activeId || !active) {
        return;
      }
      sessions.delete(activeId);
      void active.server.close().catch((error: unknown) => {
        httpLogger.warn({ err: error, sessionId: activeId }, "关闭 MCP 会话 server 失败");
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const handleSessionRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const sessionId = getHeader(req.headers, "mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;
    if (!sessionId) {
      writeText(res, 400, "Invalid or missing session ID");
      return;
    }
    if (!existing) {
      writeText(res, 404, "Session Not Found");
      return;
    }
    await existing.transport.handleRequest(req, res);
  };

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const method = req.method ?? "GET";

    if (method === "GET" && path === HEALTH_PATH) {
      writeJson(res, 200, {
        ok: true,
        service: SERVER_NAME,
        transport: "streamable-http",
        mcpPath: config.mcpPath,
        sessions: sessions.size,
        timestamp: new Date().toISOString()
      });
      return;
    }

    if (path !== config.mcpPath) {
      writeText(res, 404, "Not Found");
      return;
    }

    if (method === "POST") {
      await handlePost(req, res);
      return;
    }
    if (method === "GET" || method === "DELETE") {
      await handleSessionRequest(req, res);
      return;
    }
    writeText(res, 405, "Method Not Allowed");
  };

  const httpServer = createHttpServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      httpLogger.error({ err: error, method: req.method, url: req.url }, "处理 HTTP 请求时发生未捕获异常");
      writeJsonRpcError(res, 500, -32603, "Internal server error");
    });
  });

  await listen(httpServer, config);
  httpLogger.info(
    { host: config.host, port: config.port, mcpPath: config.mcpPath, healthPath: HEALTH_PATH },
    "二维码 MCP 服务已通过 Streamable HTTP 启动"
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    httpLogger.info({ signal }, "收到退出信号，开始关闭 MCP HTTP 服务");

    for (const [sessionId, session] of sessions.entries()) {
      sessions.delete(sessionId);
      await closeSession(sessionId, session);
    }

    try {
      await closeHttpServer(httpServer);
      httpLogger.info("MCP HTTP 服务已关闭");
    } catch (error: unknown) {
      httpLogger.error({ err: error }, "关闭 MCP HTTP 服务失败");
      process.exitCode = 1;
    }
  };

  process.once("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  return httpServer;
}
