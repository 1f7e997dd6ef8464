import { ZodError } from "zod";

export enum ErrorCode {
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
  ENCODING_ERROR = "ENCODING_ERROR",
  RENDER_ERROR = "RENDER_ERROR",
  STORAGE_ERROR = "STORAGE_ERROR",
  NOT_FOUND = "NOT_FOUND",
  RESOURCE_ERROR = "RESOURCE_ERROR"
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  public constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.details = details;
  }

  public static validation(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, details);
  }

  public static internal(message = "服务器内部错误", details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, details);
  }
}

/** payload 超出所选纠错等级下的最大容量，或无法编码。 */
export class EncodingError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(ErrorCode.ENCODING_ERROR, message, details);
    this.name = "EncodingError";
  }
}

/** 品牌图片无法解码或无法合成。 */
export class RenderError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(ErrorCode.RENDER_ERROR, message, details);
    this.name = "RenderError";
  }
}

/** 持久化不可用或写入失败，调用方可重试。 */
export class StorageError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(ErrorCode.STORAGE_ERROR, message, details);
    this.name = "StorageError";
  }
}

export class NotFoundError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(ErrorCode.NOT_FOUND, message, details);
    this.name = "NotFoundError";
  }
}

/** 上传文件不可读写。回收阶段的此类错误只记录不抛出。 */
export class ResourceError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(ErrorCode.RESOURCE_ERROR, message, details);
    this.name = "ResourceError";
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  // 统一把 Zod 校验异常转换为业务可识别错误码。
  if (error instanceof ZodError) {
    return AppError.validation("请求参数校验失败", error.flatten());
  }

  if (error instanceof Error) {
    return AppError.internal(undefined, { cause: error.message });
  }

  return AppError.internal();
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
