import { ErrorCode } from "./errors.js";

export type ToolStatus = "success" | "retryable_error" | "fatal_error";

export enum ToolCode {
  OK = "OK",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  UNKNOWN = "UNKNOWN",
  PAYLOAD_TOO_LARGE = "PAYLOAD_TOO_LARGE",
  BRANDING_UNREADABLE = "BRANDING_UNREADABLE",
  STORAGE_UNAVAILABLE = "STORAGE_UNAVAILABLE",
  RECORD_NOT_FOUND = "RECORD_NOT_FOUND",
  RESOURCE_UNAVAILABLE = "RESOURCE_UNAVAILABLE"
}

export function statusToDefaultCode(status: ToolStatus): ToolCode {
  switch (status) {
    case "success":
      return ToolCode.OK;
    case "retryable_error":
      return ToolCode.STORAGE_UNAVAILABLE;
    case "fatal_error":
      return ToolCode.UNKNOWN;
  }
}

export function codeToDefaultMessage(code: ToolCode): string {
  switch (code) {
    case ToolCode.OK:
      return "ok";
    case ToolCode.VALIDATION_ERROR:
      return "请求参数校验失败";
    case ToolCode.INTERNAL_ERROR:
      return "内部错误";
    case ToolCode.PAYLOAD_TOO_LARGE:
      return "内容超出二维码最大容量";
    case ToolCode.BRANDING_UNREADABLE:
      return "品牌图片无法读取";
    case ToolCode.STORAGE_UNAVAILABLE:
      return "记录存储暂不可用，请稍后重试";
    case ToolCode.RECORD_NOT_FOUND:
      return "记录不存在或已过期";
    case ToolCode.RESOURCE_UNAVAILABLE:
      return "上传文件读写失败";
    case ToolCode.UNKNOWN:
      return "未知错误";
  }
}

export function errorCodeToToolCode(code: ErrorCode): ToolCode {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
      return ToolCode.VALIDATION_ERROR;
    case ErrorCode.INTERNAL_ERROR:
      return ToolCode.INTERNAL_ERROR;
    case ErrorCode.ENCODING_ERROR:
      return ToolCode.PAYLOAD_TOO_LARGE;
    case ErrorCode.RENDER_ERROR:
      return ToolCode.BRANDING_UNREADABLE;
    case ErrorCode.STORAGE_ERROR:
      return ToolCode.STORAGE_UNAVAILABLE;
    case ErrorCode.NOT_FOUND:
      return ToolCode.RECORD_NOT_FOUND;
    case ErrorCode.RESOURCE_ERROR:
      return ToolCode.RESOURCE_UNAVAILABLE;
  }
}

/** 仅存储失败标记为可重试。 */
export function errorCodeToStatus(code: ErrorCode): ToolStatus {
  return code === ErrorCode.STORAGE_ERROR ? "retryable_error" : "fatal_error";
}

export function isErrorStatus(status: ToolStatus): boolean {
  return status !== "success";
}
