import { randomUUID } from "node:crypto";
import type { Readable } from "node:stream";

import { AppError, NotFoundError, StorageError, describeError } from "../shared/errors.js";
import { KeyedLock } from "../shared/keyedLock.js";
import { appLogger, createComponentLogger, type AppLogger } from "../shared/logger.js";
import type { QrRecord, ReclaimOutcome, RecordStore, ResourceStore } from "./types.js";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface CreateRecordInput {
  label: string;
  payload: string;
  ttlDays: number;
  resourcePath?: string | null;
}

export interface CreateFromUploadInput {
  name: string;
  content: Uint8Array | Readable;
  ttlDays: number;
}

export interface AnalyticsSnapshot {
  swept: number;
  records: QrRecord[];
}

export interface ExpiringRegistryOptions {
  store: RecordStore;
  resources: ResourceStore;
  logger?: AppLogger;
  clock?: () => Date;
}

function toStorageError(error: unknown, message: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new StorageError(message, { cause: describeError(error) });
}

export function toFileLocator(path: string): string {
  return `file://${path}`;
}

function compareByCreatedAt(left: QrRecord, right: QrRecord): number {
  const diff = left.createdAt.getTime() - right.createdAt.getTime();
  if (diff !== 0) {
    return diff;
  }
  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}

/**
 * 带过期时间的二维码记录表。记录只能由本类创建、自增扫描数和删除；
 * 过期回收是惰性的，由 sweep 或 listForAnalytics 在读路径上触发。
 */
export class ExpiringRegistry {
  private readonly store: RecordStore;
  private readonly resources: ResourceStore;
  private readonly logger: AppLogger;
  private readonly clock: () => Date;
  private readonly locks = new KeyedLock();

  public constructor(options: ExpiringRegistryOptions) {
    this.store = options.store;
    this.resources = options.resources;
    this.logger = createComponentLogger("registry", options.logger ?? appLogger);
    this.clock = options.clock ?? (() => new Date());
  }

  public async create(input: CreateRecordInput): Promise<QrRecord> {
    if (!Number.isFinite(input.ttlDays) || input.ttlDays <= 0) {
      throw AppError.validation(`ttlDays 必须是正数，当前值：${String(input.ttlDays)}`);
    }

    const createdAt = this.clock();
    const expiresAt = new Date(createdAt.getTime() + input.ttlDays * MS_PER_DAY);
    if (!Number.isFinite(expiresAt.getTime())) {
      throw AppError.validation(`ttlDays 过大，过期时间超出可表示范围：${String(input.ttlDays)}`);
    }
    if (expiresAt.getTime() <= createdAt.getTime()) {
      throw AppError.validation(`ttlDays 过小，不足 1 毫秒：${String(input.ttlDays)}`);
    }

    const record: QrRecord = {
      id: randomUUID(),
      label: input.label,
      resourcePath: input.resourcePath ?? null,
      createdAt,
      expiresAt,
      payload: input.payload,
      scanCount: 0
    };

    // 新生成的 id 不会与其他操作竞争，不加锁
    try {
      await this.store.insert(record);
    } catch (error: unknown) {
      throw toStorageError(error, "二维码记录写入失败");
    }

    this.logger.info(
      { recordId: record.id, expiresAt: record.expiresAt.toISOString(), hasResource: record.resourcePath !== null },
      "二维码记录已创建"
    );
    return record;
  }

  /** 上传文件先落盘，再以 file:// 定位串作为 payload 建记录；建记录失败时回收文件。 */
  public async createFromUpload(input: CreateFromUploadInput): Promise<QrRecord> {
    if (!Number.isFinite(input.ttlDays) || input.ttlDays <= 0) {
      throw AppError.validation(`ttlDays 必须是正数，当前值：${String(input.ttlDays)}`);
    }

    const resourcePath = await this.resources.save(input.name, input.content);

    try {
      return await this.create({
        label: input.name,
        payload: toFileLocator(resourcePath),
        ttlDays: input.ttlDays,
        resourcePath
      });
    } catch (error: unknown) {
      this.logReclaim(undefined, await this.resources.reclaim(resourcePath));
      throw error;
    }
  }

  public async get(id: string): Promise<QrRecord> {
    let record: QrRecord | undefined;
    try {
      record = await this.store.findById(id);
    } catch (error: unknown) {
      throw toStorageError(error, "读取二维码记录失败");
    }

    if (!record) {
      throw new NotFoundError(`二维码记录不存在或已过期：${id}`, { id });
    }
    return record;
  }

  public async listAll(): Promise<QrRecord[]> {
    let records: QrRecord[];
    try {
      records = await this.store.findAll();
    } catch (error: unknown) {
      throw toStorageError(error, "读取二维码记录列表失败");
    }
    return records.sort(compareByCreatedAt);
  }

  /**
   * 删除 expiresAt 早于 now 的记录及其上传文件，返回删除条数。
   * 记录先于文件删除；文件回收失败只记录日志。
   */
  public async sweep(now: Date = this.clock()): Promise<number> {
    const candidates = await this.listAll();
    let removed = 0;

    for (const candidate of candidates) {
      if (candidate.expiresAt.getTime() >= now.getTime()) {
        continue;
      }

      const deleted = await this.locks.run(candidate.id, async () => {
        try {
          // 加锁后重新读取，期间可能已被另一轮 sweep 删除
          const current = await this.store.findById(candidate.id);
          if (!current) {
            return false;
          }

          // 记录删除成功后才回收文件，读方不会看到文件已失效的记录
          const removedRecord = await this.store.deleteById(current.id);
          if (removedRecord && current.resourcePath) {
            this.logReclaim(current.id, await this.resources.reclaim(current.resourcePath));
          }
          return removedRecord;
        } catch (error: unknown) {
          throw toStorageError(error, "删除过期二维码记录失败");
        }
      });

      if (deleted) {
        removed += 1;
      }
    }

    if (removed > 0) {
      this.logger.info({ removed, now: now.toISOString() }, "过期二维码记录已回收");
    }
    return removed;
  }

  /** 分析视图的唯一入口：先回收过期记录，保证列表里不出现已过期的条目。 */
  public async listForAnalytics(now: Date = this.clock()): Promise<AnalyticsSnapshot> {
    const swept = await this.sweep(now);
    const records = await this.listAll();
    return { swept, records };
  }

  public async incrementScan(id: string): Promise<QrRecord> {
    const updated = await this.locks.run(id, async () => {
      try {
        return await this.store.incrementScanCount(id);
      } catch (error: unknown) {
        throw toStorageError(error, "扫描计数更新失败");
      }
    });

    if (!updated) {
      throw new NotFoundError(`二维码记录不存在或已过期：${id}`, { id });
    }
    return updated;
  }

  private logReclaim(recordId: string | undefined, outcome: ReclaimOutcome): void {
    switch (outcome.status) {
      case "removed":
        this.logger.debug({ recordId, path: outcome.path }, "上传文件已删除");
        return;
      case "missing":
        this.logger.debug({ recordId, path: outcome.path }, "上传文件已不存在，跳过删除");
        return;
      case "failed":
        this.logger.warn({ err: outcome.error, recordId, path: outcome.path }, "上传文件删除失败，继续回收");
        return;
    }
  }
}
