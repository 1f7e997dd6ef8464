import { randomUUID } from "node:crypto";

import { z } from "zod";

import type { ToolRuntime } from "../runtime/toolRuntime.js";
import type { ToolDefinition, ToolHandlerOutput } from "../tools/types.js";
import { errorCodeToStatus, errorCodeToToolCode } from "./errorCodes.js";
import { ErrorCode, toAppError } from "./errors.js";
import { createToolResult, type ToolResult } from "./result.js";

export type ToolCallResponse = {
  isError?: boolean;
  content: Array<{ type: "text"; text: string }>;
};

function normalizeOutput<TData>(traceId: string, output: ToolHandlerOutput<TData>): ToolResult<TData> {
  return createToolResult({
    traceId,
    status: output.status ?? "success",
    code: output.code,
    message: output.message,
    data: output.data
  });
}

function toFailureResult(traceId: string, error: unknown): ToolResult<Record<string, unknown>> {
  const appError = toAppError(error);
  const data: Record<string, unknown> = {};
  if (appError.details !== undefined) {
    data.details = appError.details;
  }

  return createToolResult({
    traceId,
    status: errorCodeToStatus(appError.code),
    code: errorCodeToToolCode(appError.code),
    message: appError.message,
    data
  });
}

interface RunToolOptions<TSchema extends z.ZodRawShape, TData> {
  definition: ToolDefinition<TSchema, TData>;
  runtime: ToolRuntime;
  args: unknown;
}

/**
 * 统一执行工具：入参 schema 校验、trace 记录、异常转换为稳定的 ToolResult 结构。
 */
export async function runTool<TSchema extends z.ZodRawShape, TData>(
  options: RunToolOptions<TSchema, TData>
): Promise<ToolCallResponse> {
  const { definition, runtime } = options;
  const traceId = randomUUID();
  const trace = runtime.traceStore.createTrace(traceId, definition.name);

  let result: ToolResult<TData> | ToolResult<Record<string, unknown>>;

  try {
    // 所有工具入参在业务执行前统一做 schema 校验，未知字段直接拒绝。
    const parsedInput = z.object(definition.schema).strict().parse(options.args ?? {});

    const output = await definition.handler(parsedInput, {
      traceId,
      trace,
      runtime
    });

    result = normalizeOutput(traceId, output);
  } catch (error: unknown) {
    result = toFailureResult(traceId, error);
    const logPayload = {
      err: error,
      traceId,
      toolName: definition.name,
      code: result.code,
      status: result.status
    };

    const appError = toAppError(error);
    if (appError.code === ErrorCode.INTERNAL_ERROR) {
      runtime.logger.error(logPayload, "tool execution failed");
    } else {
      runtime.logger.warn(logPayload, "tool execution non-success state");
    }
  }

  trace.record("tool.end", definition.name, `${result.status}:${result.code}`);
  try {
    const saved = await trace.complete({
      status: result.status,
      code: result.code,
      message: result.message
    });
    runtime.traceStore.save(saved);
  } catch (error: unknown) {
    runtime.logger.warn({ err: error, traceId }, "trace 落盘失败");
    runtime.traceStore.save(trace.snapshot());
  }

  return {
    ...(result.ok ? {} : { isError: true }),
    content: [
      {
        type: "text",
        text: JSON.stringify(result)
      }
    ]
  };
}
