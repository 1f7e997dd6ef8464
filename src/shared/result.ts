import {
  ToolCode,
  type ToolStatus,
  codeToDefaultMessage,
  isErrorStatus,
  statusToDefaultCode
} from "./errorCodes.js";

export type EmptyData = Record<string, never>;

export interface ToolResult<TData = EmptyData> {
  ok: boolean;
  traceId: string;
  status: ToolStatus;
  code: ToolCode;
  message: string;
  data: TData | EmptyData;
}

interface ResultOptions<TData> {
  traceId: string;
  status: ToolStatus;
  code?: ToolCode;
  message?: string;
  data?: TData;
}

export function createToolResult<TData = EmptyData>(options: ResultOptions<TData>): ToolResult<TData> {
  const code = options.code ?? statusToDefaultCode(options.status);
  return {
    ok: !isErrorStatus(options.status),
    traceId: options.traceId,
    status: options.status,
    code,
    message: options.message ?? codeToDefaultMessage(code),
    data: options.data ?? {}
  };
}
