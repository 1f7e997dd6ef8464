export interface RgbaImage {
  width: number;
  height: number;
  /** 行优先的 RGBA 字节，长度为 width * height * 4。 */
  data: Uint8Array;
}

const CHANNELS = 4;

function clampByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * 沿一个轴做面积平均采样。输入输出都是预乘 alpha 的浮点通道。
 * `lines` 为另一个轴的长度，`index` / `targetIndex` 把（行, 位置）映射到数组偏移。
 */
function resampleAxis(
  source: Float64Array,
  sourceLength: number,
  targetLength: number,
  lines: number,
  index: (line: number, position: number) => number,
  targetIndex: (line: number, position: number) => number,
  target: Float64Array
): void {
  const scale = sourceLength / targetLength;

  for (let line = 0; line < lines; line += 1) {
    for (let position = 0; position < targetLength; position += 1) {
      const start = position * scale;
      const end = start + scale;
      const first = Math.floor(start);
      const last = Math.min(sourceLength, Math.ceil(end));
      const sums = new Float64Array(CHANNELS);

      for (let cursor = first; cursor < last; cursor += 1) {
        const weight = Math.min(cursor + 1, end) - Math.max(cursor, start);
        if (weight <= 0) {
          continue;
        }
        const offset = index(line, cursor);
        for (let channel = 0; channel < CHANNELS; channel += 1) {
          sums[channel] += source[offset + channel] * weight;
        }
      }

      const out = targetIndex(line, position);
      for (let channel = 0; channel < CHANNELS; channel += 1) {
        target[out + channel] = sums[channel] / scale;
      }
    }
  }
}

/**
 * 面积平均缩放，同时适用于缩小和放大。alpha 在采样前预乘，
 * 透明像素的颜色不会渗入相邻像素。
 */
export function resizeImage(source: RgbaImage, width: number, height: number): RgbaImage {
  const targetWidth = Math.max(1, Math.floor(width));
  const targetHeight = Math.max(1, Math.floor(height));

  const premultiplied = new Float64Array(source.width * source.height * CHANNELS);
  for (let offset = 0; offset < premultiplied.length; offset += CHANNELS) {
    const alpha = source.data[offset + 3];
    premultiplied[offset] = source.data[offset] * alpha;
    premultiplied[offset + 1] = source.data[offset + 1] * alpha;
    premultiplied[offset + 2] = source.data[offset + 2] * alpha;
    premultiplied[offset + 3] = alpha;
  }

  const horizontal = new Float64Array(targetWidth * source.height * CHANNELS);
  resampleAxis(
    premultiplied,
    source.width,
    targetWidth,
    source.height,
    (row, x) => (row * source.width + x) * CHANNELS,
    (row, x) => (row * targetWidth + x) * CHANNELS,
    horizontal
  );

  const vertical = new Float64Array(targetWidth * targetHeight * CHANNELS);
  resampleAxis(
    horizontal,
    source.height,
    targetHeight,
    targetWidth,
    (column, y) => (y * targetWidth + column) * CHANNELS,
    (column, y) => (y * targetWidth + column) * CHANNELS,
    vertical
  );

  const data = new Uint8Array(targetWidth * targetHeight * CHANNELS);
  for (let offset = 0; offset < data.length; offset += CHANNELS) {
    const alpha = vertical[offset + 3];
    if (alpha > 0) {
      data[offset] = clampByte(vertical[offset] / alpha);
      data[offset + 1] = clampByte(vertical[offset + 1] / alpha);
      data[offset + 2] = clampByte(vertical[offset + 2] / alpha);
    }
    data[offset + 3] = clampByte(alpha);
  }

  return { width: targetWidth, height: targetHeight, data };
}
