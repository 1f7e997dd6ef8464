import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import jsQR from "jsqr";
import { pino } from "pino";
import { PNG } from "pngjs";

import { MemoryRecordStore } from "../src/registry/MemoryRecordStore.js";
import { FileResourceStore } from "../src/registry/FileResourceStore.js";
import { createToolRuntime, type ToolRuntime } from "../src/runtime/toolRuntime.js";
import { loadAppConfig } from "../src/shared/config.js";
import type { AppLogger } from "../src/shared/logger.js";
import type { runTool } from "../src/shared/toolRunner.js";

const createdDirs: string[] = [];

export const silentLogger: AppLogger = pino({ level: "silent" });

export async function createTempDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  createdDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  await Promise.all(
    createdDirs.splice(0).map(async (dir) => {
      await rm(dir, { recursive: true, force: true });
    })
  );
}

/** 可手动推进的时钟。 */
export class ManualClock {
  private current: Date;

  public constructor(start: string) {
    this.current = new Date(start);
  }

  public now = (): Date => new Date(this.current.getTime());

  public set(value: string): void {
    this.current = new Date(value);
  }

  public advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export interface TestRuntime {
  runtime: ToolRuntime;
  store: MemoryRecordStore;
  resources: FileResourceStore;
  dataDir: string;
}

export async function createTestRuntime(
  clock?: () => Date,
  env: NodeJS.ProcessEnv = {}
): Promise<TestRuntime> {
  const dataDir = await createTempDir("qrgen-runtime-");
  const config = loadAppConfig({ ...env, QRGEN_DATA_DIR: dataDir });
  const store = new MemoryRecordStore();
  const resources = new FileResourceStore(config.resourceDir);

  return {
    runtime: createToolRuntime({ config, store, resources, clock, logger: silentLogger }),
    store,
    resources,
    dataDir
  };
}

export interface ParsedPayload {
  ok: boolean;
  status: string;
  code: string;
  message: string;
  traceId: string;
  data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePayload(result: Awaited<ReturnType<typeof runTool>>): ParsedPayload {
  const text = result.content[0]?.text;
  if (!text) {
    throw new Error("missing tool payload");
  }
  const parsed: unknown = JSON.parse(text);
  if (!isRecord(parsed) || !isRecord(parsed.data)) {
    throw new Error("tool payload is not an object");
  }
  return {
    ok: parsed.ok === true,
    status: String(parsed.status),
    code: String(parsed.code),
    message: String(parsed.message),
    traceId: String(parsed.traceId),
    data: parsed.data
  };
}

export function readObject(value: unknown, key: string): Record<string, unknown> {
  const field = isRecord(value) ? value[key] : undefined;
  if (!isRecord(field)) {
    throw new Error(`missing object field: ${key}`);
  }
  return field;
}

export function solidPng(
  width: number,
  height: number,
  rgba: [number, number, number, number],
  colorType: 2 | 6 = 6
): Buffer {
  const png = new PNG({ width, height });
  for (let offset = 0; offset < png.data.length; offset += 4) {
    png.data[offset] = rgba[0];
    png.data[offset + 1] = rgba[1];
    png.data[offset + 2] = rgba[2];
    png.data[offset + 3] = rgba[3];
  }
  return PNG.sync.write(png, { colorType });
}

/** 用独立的解码器读回二维码内容。 */
export function decodeQr(png: Buffer): string | undefined {
  const decoded = PNG.sync.read(png);
  const result = jsQR.default(new Uint8ClampedArray(decoded.data), decoded.width, decoded.height);
  return result?.data;
}
