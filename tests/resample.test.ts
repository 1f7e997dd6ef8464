import { describe, expect, it } from "vitest";

import { resizeImage, type RgbaImage } from "../src/render/resample.js";

function imageOf(width: number, height: number, pixels: number[][]): RgbaImage {
  return { width, height, data: Uint8Array.from(pixels.flat()) };
}

describe("resizeImage", () => {
  it("纯色图缩放后颜色不变", () => {
    const source = imageOf(4, 4, Array.from({ length: 16 }, () => [10, 200, 30, 255]));
    const resized = resizeImage(source, 3, 2);

    expect(resized.width).toBe(3);
    expect(resized.height).toBe(2);
    for (let offset = 0; offset < resized.data.length; offset += 4) {
      expect(Array.from(resized.data.subarray(offset, offset + 4))).toEqual([10, 200, 30, 255]);
    }
  });

  it("缩小时按面积取平均", () => {
    const source = imageOf(2, 2, [
      [0, 0, 0, 255],
      [255, 255, 255, 255],
      [255, 255, 255, 255],
      [0, 0, 0, 255]
    ]);

    const resized = resizeImage(source, 1, 1);

    expect(Array.from(resized.data)).toEqual([128, 128, 128, 255]);
  });

  it("透明像素的颜色不会渗入结果", () => {
    const source = imageOf(2, 1, [
      [255, 0, 0, 255],
      [0, 255, 0, 0]
    ]);

    const resized = resizeImage(source, 1, 1);

    expect(Array.from(resized.data)).toEqual([255, 0, 0, 128]);
  });

  it("放大时目标尺寸至少为 1", () => {
    const source = imageOf(1, 1, [[1, 2, 3, 255]]);

    const resized = resizeImage(source, 0, 5);

    expect(resized.width).toBe(1);
    expect(resized.height).toBe(5);
    expect(Array.from(resized.data.subarray(16, 20))).toEqual([1, 2, 3, 255]);
  });
});
