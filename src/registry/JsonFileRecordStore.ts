import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { z } from "zod";

import { StorageError, describeError } from "../shared/errors.js";
import type { QrRecord, RecordStore } from "./types.js";

const STORE_FILE_VERSION = 1;

const storedRowSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  resourcePath: z.string().min(1).nullable(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  payload: z.string(),
  scanCount: z.number().int().nonnegative()
});

const storeFileSchema = z.object({
  version: z.literal(STORE_FILE_VERSION),
  records: z.array(storedRowSchema)
});

type StoredRow = z.infer<typeof storedRowSchema>;
type StoreFile = z.infer<typeof storeFileSchema>;

function toRow(record: QrRecord): StoredRow {
  return {
    id: record.id,
    label: record.label,
    resourcePath: record.resourcePath,
    createdAt: record.createdAt.toISOString(),
    expiresAt: record.expiresAt.toISOString(),
    payload: record.payload,
    scanCount: record.scanCount
  };
}

function fromRow(row: StoredRow): QrRecord {
  return {
    id: row.id,
    label: row.label,
    resourcePath: row.resourcePath,
    createdAt: new Date(row.createdAt),
    expiresAt: new Date(row.expiresAt),
    payload: row.payload,
    scanCount: row.scanCount
  };
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && Reflect.get(error, "code") === code;
}

/**
 * 以单个 JSON 文档持久化全部记录。所有读-改-写都经由同一队列串行执行，
 * 写入先落临时文件再 rename 覆盖，读者不会看到写了一半的文件。
 */
export class JsonFileRecordStore implements RecordStore {
  private queue: Promise<void> = Promise.resolve();

  public constructor(private readonly filePath: string) {}

  public insert(record: QrRecord): Promise<void> {
    return this.exclusive(async () => {
      const file = await this.readStoreFile();
      if (file.records.some((row) => row.id === record.id)) {
        throw new StorageError(`记录 id 重复：${record.id}`);
      }
      file.records.push(toRow(record));
      await this.writeStoreFile(file);
    });
  }

  public findById(id: string): Promise<QrRecord | undefined> {
    return this.exclusive(async () => {
      const file = await this.readStoreFile();
      const row = file.records.find((item) => item.id === id);
      return row ? fromRow(row) : undefined;
    });
  }

  public findAll(): Promise<QrRecord[]> {
    return this.exclusive(async () => {
      const file = await this.readStoreFile();
      return file.records.map(fromRow);
    });
  }

  public incrementScanCount(id: string): Promise<QrRecord | undefined> {
    return this.exclusive(async () => {
      const file = await this.readStoreFile();
      const row = file.records.find((item) => item.id === id);
      if (!row) {
        return undefined;
      }
      row.scanCount += 1;
      await this.writeStoreFile(file);
      return fromRow(row);
    });
  }

  public deleteById(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const file = await this.readStoreFile();
      const remaining = file.records.filter((item) => item.id !== id);
      if (remaining.length === file.records.length) {
        return false;
      }
      await this.writeStoreFile({ ...file, records: remaining });
      return true;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async readStoreFile(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) {
        return { version: STORE_FILE_VERSION, records: [] };
      }
      throw new StorageError("读取记录文件失败", {
        filePath: this.filePath,
        cause: describeError(error)
      });
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw) as unknown;
    } catch (error: unknown) {
      throw new StorageError("记录文件不是合法 JSON", {
        filePath: this.filePath,
        cause: describeError(error)
      });
    }

    const parsed = storeFileSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new StorageError("记录文件结构不合法", {
        filePath: this.filePath,
        issues: parsed.error.flatten()
      });
    }

    return parsed.data;
  }

  private async writeStoreFile(file: StoreFile): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(file, null, 2), "utf8");
      await rename(tempPath, this.filePath);
    } catch (error: unknown) {
      throw new StorageError("写入记录文件失败", {
        filePath: this.filePath,
        cause: describeError(error)
      });
    }
  }
}
