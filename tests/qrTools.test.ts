import { readdir } from "node:fs/promises";

import { afterEach, describe, expect, it } from "vitest";

import { ToolCode } from "../src/shared/errorCodes.js";
import { runTool } from "../src/shared/toolRunner.js";
import {
  qrCreateFromFileToolDefinition,
  qrCreateToolDefinition,
  qrListAnalyticsToolDefinition,
  qrRecordScanToolDefinition,
  qrRenderPreviewToolDefinition,
  qrSweepToolDefinition
} from "../src/tools/handlers/qrHandlers.js";
import {
  ManualClock,
  createTestRuntime,
  decodeQr,
  parsePayload,
  readObject,
  removeTempDirs,
  solidPng,
  type ParsedPayload,
  type TestRuntime
} from "./support.js";

const START = "2024-01-01T00:00:00.000Z";

function readString(value: Record<string, unknown>, key: string): string {
  const field = value[key];
  if (typeof field !== "string") {
    throw new Error(`missing string field: ${key}`);
  }
  return field;
}

function decodeImage(data: Record<string, unknown>): string | undefined {
  const image = readObject(data, "image");
  return decodeQr(Buffer.from(readString(image, "pngBase64"), "base64"));
}

async function createQr(fixture: TestRuntime, args: Record<string, unknown>): Promise<ParsedPayload> {
  return parsePayload(await runTool({ definition: qrCreateToolDefinition, runtime: fixture.runtime, args }));
}

afterEach(async () => {
  await removeTempDirs();
});

describe("qr_create", () => {
  it("签发记录并返回可解码的 PNG", async () => {
    const fixture = await createTestRuntime(new ManualClock(START).now);

    const payload = await createQr(fixture, {
      payload: "https://example.com/promo",
      label: "春季活动",
      ttlDays: 7,
      moduleSize: 5
    });

    expect(payload.ok).toBe(true);
    expect(payload.message).toBe("二维码已生成");
    expect(readObject(payload.data, "record")).toMatchObject({
      label: "春季活动",
      payload: "https://example.com/promo",
      resourcePath: null,
      createdAt: START,
      expiresAt: "2024-01-08T00:00:00.000Z",
      scanCount: 0
    });
    expect(readObject(payload.data, "image")).toMatchObject({ mimeType: "image/png", errorCorrection: "quartile" });
    expect(decodeImage(payload.data)).toBe("https://example.com/promo");
    expect(await fixture.store.findAll()).toHaveLength(1);
  });

  it("未指定 ttlDays 时使用默认有效期", async () => {
    const fixture = await createTestRuntime(new ManualClock(START).now);

    const payload = await createQr(fixture, { payload: "hello" });

    expect(readObject(payload.data, "record")).toMatchObject({
      label: "hello",
      expiresAt: "2024-01-08T00:00:00.000Z"
    });
  });

  it("ttlDays 超过上限时拒绝", async () => {
    const fixture = await createTestRuntime();

    const payload = await createQr(fixture, { payload: "hello", ttlDays: 31 });

    expect(payload.status).toBe("fatal_error");
    expect(payload.code).toBe(ToolCode.VALIDATION_ERROR);
    expect(await fixture.store.findAll()).toEqual([]);
  });

  it("渲染参数越界时拒绝", async () => {
    const fixture = await createTestRuntime();

    for (const args of [
      { payload: "x", moduleSize: 4 },
      { payload: "x", moduleSize: 21 },
      { payload: "x", border: 1 },
      { payload: "x", fillColor: "red" }
    ]) {
      expect((await createQr(fixture, args)).code).toBe(ToolCode.VALIDATION_ERROR);
    }
  });

  it("内容超出容量时返回 PAYLOAD_TOO_LARGE 且不留下记录", async () => {
    const fixture = await createTestRuntime();

    const payload = await createQr(fixture, { payload: "x".repeat(3000) });

    expect(payload.status).toBe("fatal_error");
    expect(payload.code).toBe(ToolCode.PAYLOAD_TOO_LARGE);
    expect(await fixture.store.findAll()).toEqual([]);
  });

  it("品牌图无法解码时返回 BRANDING_UNREADABLE，记录仍保留", async () => {
    const fixture = await createTestRuntime();

    const payload = await createQr(fixture, { payload: "hello", brandingBase64: "aGVsbG8=" });

    expect(payload.code).toBe(ToolCode.BRANDING_UNREADABLE);
    expect(await fixture.store.findAll()).toHaveLength(1);
  });

  it("品牌图不是合法 base64 时返回 VALIDATION_ERROR", async () => {
    const fixture = await createTestRuntime();

    const payload = await createQr(fixture, { payload: "hello", brandingBase64: "not base64!" });

    expect(payload.code).toBe(ToolCode.VALIDATION_ERROR);
  });
});

describe("qr_render_preview", () => {
  it("只渲染不写记录，支持 data URL 形式的品牌图", async () => {
    const fixture = await createTestRuntime();
    const logo = solidPng(20, 20, [0, 0, 255, 255]);

    const result = await runTool({
      definition: qrRenderPreviewToolDefinition,
      runtime: fixture.runtime,
      args: {
        payload: "preview",
        moduleSize: 5,
        border: 4,
        brandingBase64: `data:image/png;base64,${logo.toString("base64")}`
      }
    });

    const payload = parsePayload(result);
    expect(payload.ok).toBe(true);
    const image = readObject(payload.data, "image");
    expect(image.width).toBe(image.height);
    expect(await fixture.store.findAll()).toEqual([]);

    const trace = fixture.runtime.traceStore.getByTraceId(payload.traceId);
    expect(trace?.steps.find((step) => step.action === "render.png")?.note.endsWith(" branded")).toBe(true);
  });
});

describe("qr_create_from_file", () => {
  it("保存上传文件并签发指向该文件的二维码", async () => {
    const fixture = await createTestRuntime(new ManualClock(START).now);

    const payload = parsePayload(
      await runTool({
        definition: qrCreateFromFileToolDefinition,
        runtime: fixture.runtime,
        args: { fileName: "menu.pdf", contentBase64: Buffer.from("menu").toString("base64"), ttlDays: 2 }
      })
    );

    expect(payload.ok).toBe(true);
    const record = readObject(payload.data, "record");
    const resourcePath = readString(record, "resourcePath");
    expect(record).toMatchObject({ label: "menu.pdf", expiresAt: "2024-01-03T00:00:00.000Z" });
    expect(readString(record, "payload")).toBe(`file://${resourcePath}`);
    expect(decodeImage(payload.data)).toBe(`file://${resourcePath}`);
    expect(await readdir(fixture.resources.getRootDir())).toHaveLength(1);
  });

  it("超过上传大小上限时拒绝且不落盘", async () => {
    const fixture = await createTestRuntime(undefined, { QRGEN_MAX_UPLOAD_BYTES: "4" });

    const payload = parsePayload(
      await runTool({
        definition: qrCreateFromFileToolDefinition,
        runtime: fixture.runtime,
        args: { fileName: "big.bin", contentBase64: Buffer.from("12345").toString("base64") }
      })
    );

    expect(payload.code).toBe(ToolCode.VALIDATION_ERROR);
    expect(payload.data).toEqual({ details: { byteLength: 5 } });
    expect(await fixture.store.findAll()).toEqual([]);
  });

  it("contentBase64 非法时返回 VALIDATION_ERROR", async () => {
    const fixture = await createTestRuntime();

    const payload = parsePayload(
      await runTool({
        definition: qrCreateFromFileToolDefinition,
        runtime: fixture.runtime,
        args: { fileName: "a.txt", contentBase64: "@@@@" }
      })
    );

    expect(payload.code).toBe(ToolCode.VALIDATION_ERROR);
  });
});

describe("扫描计数与回收", () => {
  it("qr_record_scan 每次加 1，未知 id 返回 RECORD_NOT_FOUND", async () => {
    const fixture = await createTestRuntime();
    const created = await createQr(fixture, { payload: "scan me" });
    const id = readString(readObject(created.data, "record"), "id");

    await runTool({ definition: qrRecordScanToolDefinition, runtime: fixture.runtime, args: { id } });
    const second = parsePayload(
      await runTool({ definition: qrRecordScanToolDefinition, runtime: fixture.runtime, args: { id } })
    );
    expect(readObject(second.data, "record")).toMatchObject({ id, scanCount: 2 });

    const missing = parsePayload(
      await runTool({
        definition: qrRecordScanToolDefinition,
        runtime: fixture.runtime,
        args: { id: "00000000-0000-4000-8000-000000000000" }
      })
    );
    expect(missing.code).toBe(ToolCode.RECORD_NOT_FOUND);
    expect(missing.status).toBe("fatal_error");

    const malformed = parsePayload(
      await runTool({ definition: qrRecordScanToolDefinition, runtime: fixture.runtime, args: { id: "abc" } })
    );
    expect(malformed.code).toBe(ToolCode.VALIDATION_ERROR);
  });

  it("qr_list_analytics 先回收过期记录", async () => {
    const clock = new ManualClock(START);
    const fixture = await createTestRuntime(clock.now);
    await createQr(fixture, { payload: "short", ttlDays: 1 });
    await createQr(fixture, { payload: "long", label: "长期", ttlDays: 10 });

    clock.set("2024-01-03T00:00:00.000Z");
    const payload = parsePayload(
      await runTool({ definition: qrListAnalyticsToolDefinition, runtime: fixture.runtime, args: {} })
    );

    expect(payload.data).toMatchObject({ swept: 1, total: 1, items: [{ label: "长期", payload: "long" }] });
  });

  it("qr_sweep 返回回收条数并删除上传文件", async () => {
    const clock = new ManualClock(START);
    const fixture = await createTestRuntime(clock.now);
    await runTool({
      definition: qrCreateFromFileToolDefinition,
      runtime: fixture.runtime,
      args: { fileName: "a.txt", contentBase64: Buffer.from("a").toString("base64"), ttlDays: 1 }
    });

    clock.advance(2 * 24 * 60 * 60 * 1000);
    const payload = parsePayload(
      await runTool({ definition: qrSweepToolDefinition, runtime: fixture.runtime, args: {} })
    );

    expect(payload.data).toEqual({ removed: 1 });
    expect(await readdir(fixture.resources.getRootDir())).toEqual([]);
  });
});
