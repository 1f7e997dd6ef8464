import QRCode, { type QRCode as QrSymbol, type QRCodeErrorCorrectionLevel } from "qrcode";

import { EncodingError, describeError } from "../shared/errors.js";

export type ErrorCorrectionTier = "low" | "medium" | "quartile" | "high";

export const DEFAULT_ERROR_CORRECTION: ErrorCorrectionTier = "quartile";
export const DEFAULT_BORDER_MODULES = 4;

const TIER_TO_LEVEL = {
  low: "L",
  medium: "M",
  quartile: "Q",
  high: "H"
} as const satisfies Record<ErrorCorrectionTier, QRCodeErrorCorrectionLevel>;

export interface EncodeOptions {
  errorCorrection?: ErrorCorrectionTier;
  border?: number;
}

export interface ModuleGrid {
  /** 不含静区的边长（模块数）。 */
  size: number;
  version: number;
  errorCorrection: ErrorCorrectionTier;
  /** 静区宽度（模块数），由渲染器使用。 */
  border: number;
  /** modules[row][col] 为 true 表示深色模块。 */
  modules: ReadonlyArray<ReadonlyArray<boolean>>;
}

export function encodeMatrix(payload: string, options: EncodeOptions = {}): ModuleGrid {
  const errorCorrection = options.errorCorrection ?? DEFAULT_ERROR_CORRECTION;
  const border = options.border ?? DEFAULT_BORDER_MODULES;

  if (payload.length === 0) {
    throw new EncodingError("二维码内容不能为空");
  }
  if (!Number.isInteger(border) || border < 0) {
    throw new EncodingError(`静区宽度必须是非负整数，当前值：${String(border)}`);
  }

  let symbol: QrSymbol;
  try {
    // 不指定 version，由 qrcode 选出能容纳内容的最小版本
    symbol = QRCode.create(payload, { errorCorrectionLevel: TIER_TO_LEVEL[errorCorrection] });
  } catch (error: unknown) {
    throw new EncodingError(
      `内容过长：${String(payload.length)} 个字符超出 ${errorCorrection} 纠错等级下的最大容量`,
      { errorCorrection, payloadLength: payload.length, cause: describeError(error) }
    );
  }

  const { size, data } = symbol.modules;
  const modules: boolean[][] = [];
  for (let row = 0; row < size; row += 1) {
    const line: boolean[] = [];
    for (let col = 0; col < size; col += 1) {
      line.push(data[row * size + col] === 1);
    }
    modules.push(line);
  }

  return {
    size,
    version: symbol.version,
    errorCorrection,
    border,
    modules
  };
}
