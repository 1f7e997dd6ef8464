import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { JsonFileRecordStore } from "../src/registry/JsonFileRecordStore.js";
import type { QrRecord } from "../src/registry/types.js";
import { StorageError } from "../src/shared/errors.js";
import { createTempDir, removeTempDirs } from "./support.js";

function sampleRecord(id: string, overrides: Partial<QrRecord> = {}): QrRecord {
  return {
    id,
    label: `label-${id}`,
    resourcePath: null,
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    expiresAt: new Date("2024-01-08T00:00:00.000Z"),
    payload: `payload-${id}`,
    scanCount: 0,
    ...overrides
  };
}

async function createStoreFile(): Promise<string> {
  return join(await createTempDir("qrgen-store-"), "nested", "records.json");
}

afterEach(async () => {
  await removeTempDirs();
});

describe("JsonFileRecordStore", () => {
  it("文件不存在时视为空表", async () => {
    const store = new JsonFileRecordStore(await createStoreFile());

    expect(await store.findAll()).toEqual([]);
    expect(await store.findById("missing")).toBeUndefined();
  });

  it("记录跨实例持久化，日期按 ISO 字符串落盘", async () => {
    const filePath = await createStoreFile();
    const record = sampleRecord("a", { resourcePath: "/data/uploads/a.txt", scanCount: 2 });

    await new JsonFileRecordStore(filePath).insert(record);
    const reopened = new JsonFileRecordStore(filePath);

    expect(await reopened.findById("a")).toEqual(record);
    const raw: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(raw).toMatchObject({
      version: 1,
      records: [{ id: "a", createdAt: "2024-01-01T00:00:00.000Z", expiresAt: "2024-01-08T00:00:00.000Z" }]
    });
  });

  it("重复 id 写入失败", async () => {
    const store = new JsonFileRecordStore(await createStoreFile());
    await store.insert(sampleRecord("a"));

    await expect(store.insert(sampleRecord("a"))).rejects.toBeInstanceOf(StorageError);
    expect(await store.findAll()).toHaveLength(1);
  });

  it("并发自增不丢失计数", async () => {
    const store = new JsonFileRecordStore(await createStoreFile());
    await store.insert(sampleRecord("a"));

    await Promise.all(Array.from({ length: 20 }, () => store.incrementScanCount("a")));

    expect((await store.findById("a"))?.scanCount).toBe(20);
  });

  it("自增不存在的 id 返回 undefined 且不建记录", async () => {
    const store = new JsonFileRecordStore(await createStoreFile());

    expect(await store.incrementScanCount("ghost")).toBeUndefined();
    expect(await store.findAll()).toEqual([]);
  });

  it("deleteById 首次返回 true，再次返回 false", async () => {
    const store = new JsonFileRecordStore(await createStoreFile());
    await store.insert(sampleRecord("a"));
    await store.insert(sampleRecord("b"));

    expect(await store.deleteById("a")).toBe(true);
    expect(await store.deleteById("a")).toBe(false);
    expect((await store.findAll()).map((record) => record.id)).toEqual(["b"]);
  });

  it("文件内容损坏时抛出 StorageError", async () => {
    const filePath = join(await createTempDir("qrgen-store-"), "records.json");
    await writeFile(filePath, "{ not json", "utf8");
    const store = new JsonFileRecordStore(filePath);

    await expect(store.findAll()).rejects.toBeInstanceOf(StorageError);

    await writeFile(filePath, JSON.stringify({ version: 1, records: [{ id: "x" }] }), "utf8");
    await expect(store.findAll()).rejects.toMatchObject({ message: "记录文件结构不合法" });
  });
});
