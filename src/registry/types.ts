import type { Readable } from "node:stream";

export interface QrRecord {
  readonly id: string;
  /** 展示名：文本内容本身，或上传文件的原始文件名。 */
  readonly label: string;
  /** 上传文件在磁盘上的位置；纯文本 / URL 为 null。 */
  readonly resourcePath: string | null;
  readonly createdAt: Date;
  readonly expiresAt: Date;
  /** 编码进二维码的原始字符串。 */
  readonly payload: string;
  readonly scanCount: number;
}

/**
 * 存储协作方。每个方法都必须是原子的；ExpiringRegistry 负责同一 id 上的操作串行化。
 */
export interface RecordStore {
  insert(record: QrRecord): Promise<void>;
  findById(id: string): Promise<QrRecord | undefined>;
  findAll(): Promise<QrRecord[]>;
  /** 返回自增后的记录；id 不存在时返回 undefined，且不得新建记录。 */
  incrementScanCount(id: string): Promise<QrRecord | undefined>;
  deleteById(id: string): Promise<boolean>;
}

export type ReclaimOutcome =
  | { status: "removed"; path: string }
  | { status: "missing"; path: string }
  | { status: "failed"; path: string; error: Error };

/** 上传字节的落盘协作方，只向记录暴露路径。 */
export interface ResourceStore {
  save(name: string, content: Uint8Array | Readable): Promise<string>;
  reclaim(path: string): Promise<ReclaimOutcome>;
}
