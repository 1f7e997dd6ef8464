import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ZodRawShape } from "zod";

import type { ToolRuntime } from "../runtime/toolRuntime.js";
import { runTool } from "../shared/toolRunner.js";
import {
  qrCreateFromFileToolDefinition,
  qrCreateToolDefinition,
  qrListAnalyticsToolDefinition,
  qrRecordScanToolDefinition,
  qrRenderPreviewToolDefinition,
  qrSweepToolDefinition
} from "./handlers/qrHandlers.js";
import type { ToolDefinition } from "./types.js";

function registerTool<TSchema extends ZodRawShape, TData>(
  server: McpServer,
  runtime: ToolRuntime,
  definition: ToolDefinition<TSchema, TData>
): void {
  const shape: ZodRawShape = definition.schema;
  server.tool(definition.name, definition.description, shape, async (args) => {
    return runTool({
      definition,
      runtime,
      args
    });
  });
}

export function registerTools(server: McpServer, runtime: ToolRuntime): void {
  registerTool(server, runtime, qrCreateToolDefinition);
  registerTool(server, runtime, qrCreateFromFileToolDefinition);
  registerTool(server, runtime, qrRenderPreviewToolDefinition);

  registerTool(server, runtime, qrListAnalyticsToolDefinition);
  registerTool(server, runtime, qrRecordScanToolDefinition);
  registerTool(server, runtime, qrSweepToolDefinition);
}
