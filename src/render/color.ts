import { AppError } from "../shared/errors.js";

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const HEX_COLOR_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export function isHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value.trim());
}

/** 解析 `#rgb` / `#rrggbb`。 */
export function parseHexColor(value: string): RgbColor {
  const trimmed = value.trim();
  if (!HEX_COLOR_PATTERN.test(trimmed)) {
    throw AppError.validation(`颜色格式不合法：${value}，应为 #rgb 或 #rrggbb`);
  }

  const hex = trimmed.slice(1);
  const full =
    hex.length === 3
      ? hex
        .split("")
        .map((digit) => digit + digit)
        .join("")
      : hex;

  return {
    r: Number.parseInt(full.slice(0, 2), 16),
    g: Number.parseInt(full.slice(2, 4), 16),
    b: Number.parseInt(full.slice(4, 6), 16)
  };
}
