import type { z, ZodRawShape } from "zod";

import type { ToolCode, ToolStatus } from "../shared/errorCodes.js";
import type { TraceRecorder } from "../observability/TraceStore.js";
import type { ToolRuntime } from "../runtime/toolRuntime.js";

export type ToolInput<TSchema extends ZodRawShape> = z.output<z.ZodObject<TSchema, "strict">>;

export interface ToolHandlerContext {
  traceId: string;
  trace: TraceRecorder;
  runtime: ToolRuntime;
}

export interface ToolHandlerOutput<TData = Record<string, never>> {
  status?: ToolStatus;
  code?: ToolCode;
  message?: string;
  data?: TData;
}

export interface ToolDefinition<TSchema extends ZodRawShape, TData> {
  name: string;
  description: string;
  schema: TSchema;
  handler: (
    input: ToolInput<TSchema>,
    context: ToolHandlerContext
  ) => Promise<ToolHandlerOutput<TData>> | ToolHandlerOutput<TData>;
}
