import { randomUUID } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { ResourceError, describeError } from "../shared/errors.js";
import type { ReclaimOutcome, ResourceStore } from "./types.js";

const MAX_FILE_NAME_LENGTH = 120;

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && Reflect.get(error, "code") === code;
}

/** 去掉目录部分和不安全字符，只保留可作为文件名的一段。 */
export function sanitizeFileName(name: string): string {
  const cleaned = basename(name.replace(/\\/g, "/"))
    .replace(/[^\w.\- ]+/g, "_")
    .replace(/^\.+/, "")
    .trim()
    .slice(0, MAX_FILE_NAME_LENGTH);
  return cleaned || "upload";
}

export class FileResourceStore implements ResourceStore {
  private readonly rootDir: string;

  public constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  public getRootDir(): string {
    return this.rootDir;
  }

  public async save(name: string, content: Uint8Array | Readable): Promise<string> {
    const filePath = join(this.rootDir, `${randomUUID()}_${sanitizeFileName(name)}`);
    const source = content instanceof Readable ? content : Readable.from([content]);

    try {
      await mkdir(this.rootDir, { recursive: true });
      // pipeline 在成功和失败路径上都会关闭两端的句柄
      await pipeline(source, createWriteStream(filePath, { flags: "wx" }));
    } catch (error: unknown) {
      await rm(filePath, { force: true }).catch(() => undefined);
      throw new ResourceError(`上传文件写入失败：${name}`, {
        filePath,
        cause: describeError(error)
      });
    }

    return filePath;
  }

  public async reclaim(path: string): Promise<ReclaimOutcome> {
    try {
      await rm(path);
      return { status: "removed", path };
    } catch (error: unknown) {
      if (isErrnoCode(error, "ENOENT")) {
        return { status: "missing", path };
      }
      return {
        status: "failed",
        path,
        error: error instanceof Error ? error : new Error(String(error))
      };
    }
  }
}
