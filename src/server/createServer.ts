import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { createToolRuntime, type ToolRuntime } from "../runtime/toolRuntime.js";
import { registerTools } from "../tools/registerTools.js";

export const SERVER_NAME = "expiring-qr-mcp-server";
export const SERVER_VERSION = "0.1.0";

export function createServer(runtime: ToolRuntime = createToolRuntime()): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerTools(server, runtime);
  return server;
}
