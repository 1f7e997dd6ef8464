import { PNG } from "pngjs";

import {
  DEFAULT_BORDER_MODULES,
  encodeMatrix,
  type ErrorCorrectionTier,
  type ModuleGrid
} from "../encoder/MatrixEncoder.js";
import { AppError, RenderError, describeError } from "../shared/errors.js";
import { parseHexColor, type RgbColor } from "./color.js";
import { resizeImage, type RgbaImage } from "./resample.js";

export const DEFAULT_FILL_COLOR = "#000000";
export const DEFAULT_BACK_COLOR = "#ffffff";
export const DEFAULT_MODULE_SIZE = 12;

/** 品牌图宽度占输出宽度的比例。 */
const BRANDING_WIDTH_RATIO = 4;
const CHANNELS = 4;

export interface RenderOptions {
  fillColor?: string;
  backColor?: string;
  moduleSize?: number;
  /** 覆盖 grid 自带的静区宽度。 */
  border?: number;
  /** PNG 编码的品牌图，只读。 */
  branding?: Uint8Array;
}

export interface BrandingPlacement {
  x: number;
  y: number;
  width: number;
  height: number;
  /** 源图是否带 alpha 通道，决定是否按透明度混合。 */
  masked: boolean;
}

export interface RenderedImage extends RgbaImage {
  branding?: BrandingPlacement;
}

interface DecodedBranding {
  image: RgbaImage;
  hasAlpha: boolean;
}

function decodeBranding(bytes: Uint8Array): DecodedBranding {
  try {
    // Buffer.from 会复制一份，解码不会触碰调用方的字节
    const decoded = PNG.sync.read(Buffer.from(bytes));
    return {
      image: {
        width: decoded.width,
        height: decoded.height,
        data: decoded.data
      },
      hasAlpha: decoded.alpha
    };
  } catch (error: unknown) {
    throw new RenderError("品牌图片无法解码，仅支持 PNG 格式", {
      cause: describeError(error),
      byteLength: bytes.byteLength
    });
  }
}

function fillBlock(
  image: RgbaImage,
  left: number,
  top: number,
  size: number,
  color: RgbColor
): void {
  for (let y = top; y < top + size; y += 1) {
    let offset = (y * image.width + left) * CHANNELS;
    for (let x = 0; x < size; x += 1) {
      image.data[offset] = color.r;
      image.data[offset + 1] = color.g;
      image.data[offset + 2] = color.b;
      image.data[offset + 3] = 255;
      offset += CHANNELS;
    }
  }
}

function blendChannel(source: number, target: number, alpha: number): number {
  return Math.round(source * alpha + target * (1 - alpha));
}

function compositeBranding(target: RgbaImage, branding: DecodedBranding): BrandingPlacement {
  const width = Math.floor(target.width / BRANDING_WIDTH_RATIO);
  // 与宽度同比例缩放：height = srcHeight * (width / srcWidth)
  const height = Math.max(1, Math.floor((branding.image.height * width) / branding.image.width));
  const resized = resizeImage(branding.image, width, height);

  const x = Math.floor((target.width - resized.width) / 2);
  const y = Math.floor((target.height - resized.height) / 2);

  for (let row = 0; row < resized.height; row += 1) {
    const targetRow = y + row;
    if (targetRow < 0 || targetRow >= target.height) {
      continue;
    }
    for (let column = 0; column < resized.width; column += 1) {
      const source = (row * resized.width + column) * CHANNELS;
      const destination = (targetRow * target.width + x + column) * CHANNELS;

      if (!branding.hasAlpha) {
        target.data[destination] = resized.data[source];
        target.data[destination + 1] = resized.data[source + 1];
        target.data[destination + 2] = resized.data[source + 2];
        continue;
      }

      const alpha = resized.data[source + 3] / 255;
      if (alpha === 0) {
        continue;
      }
      for (let channel = 0; channel < 3; channel += 1) {
        target.data[destination + channel] = blendChannel(
          resized.data[source + channel],
          target.data[destination + channel],
          alpha
        );
      }
    }
  }

  return { x, y, width: resized.width, height: resized.height, masked: branding.hasAlpha };
}

/**
 * 把模块矩阵栅格化为 RGBA 图像：每个模块占 moduleSize x moduleSize 像素，
 * 静区填背景色；提供品牌图时缩放到输出宽度的四分之一后居中叠加。
 */
export function renderGrid(grid: ModuleGrid, options: RenderOptions = {}): RenderedImage {
  const moduleSize = options.moduleSize ?? DEFAULT_MODULE_SIZE;
  const border = options.border ?? grid.border;

  if (!Number.isInteger(moduleSize) || moduleSize < 1) {
    throw AppError.validation(`模块像素尺寸必须是正整数，当前值：${String(moduleSize)}`);
  }
  if (!Number.isInteger(border) || border < 0) {
    throw AppError.validation(`静区宽度必须是非负整数，当前值：${String(border)}`);
  }

  const fill = parseHexColor(options.fillColor ?? DEFAULT_FILL_COLOR);
  const back = parseHexColor(options.backColor ?? DEFAULT_BACK_COLOR);
  // 先解码品牌图，失败时不做任何栅格化工作
  const branding = options.branding ? decodeBranding(options.branding) : undefined;

  const side = (grid.size + border * 2) * moduleSize;
  const image: RgbaImage = {
    width: side,
    height: side,
    data: new Uint8Array(side * side * CHANNELS)
  };

  for (let offset = 0; offset < image.data.length; offset += CHANNELS) {
    image.data[offset] = back.r;
    image.data[offset + 1] = back.g;
    image.data[offset + 2] = back.b;
    image.data[offset + 3] = 255;
  }

  grid.modules.forEach((line, row) => {
    line.forEach((dark, column) => {
      if (dark) {
        fillBlock(image, (column + border) * moduleSize, (row + border) * moduleSize, moduleSize, fill);
      }
    });
  });

  if (!branding) {
    return image;
  }

  return {
    ...image,
    branding: compositeBranding(image, branding)
  };
}

export function encodePng(image: RgbaImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return PNG.sync.write(png);
}

export interface QrRenderSettings extends RenderOptions {
  errorCorrection?: ErrorCorrectionTier;
}

export interface RenderedQrCode {
  png: Buffer;
  width: number;
  height: number;
  version: number;
  errorCorrection: ErrorCorrectionTier;
  branding?: BrandingPlacement;
}

export function renderQrPng(payload: string, settings: QrRenderSettings = {}): RenderedQrCode {
  const grid = encodeMatrix(payload, {
    errorCorrection: settings.errorCorrection,
    border: settings.border ?? DEFAULT_BORDER_MODULES
  });
  const image = renderGrid(grid, settings);

  return {
    png: encodePng(image),
    width: image.width,
    height: image.height,
    version: grid.version,
    errorCorrection: grid.errorCorrection,
    branding: image.branding
  };
}
