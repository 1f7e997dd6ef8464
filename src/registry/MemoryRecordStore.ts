import type { QrRecord, RecordStore } from "./types.js";

function cloneRecord(record: QrRecord): QrRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    expiresAt: new Date(record.expiresAt.getTime())
  };
}

/** 进程内存储，用于测试和临时运行。 */
export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, QrRecord>();

  public async insert(record: QrRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new Error(`记录 id 重复：${record.id}`);
    }
    this.records.set(record.id, cloneRecord(record));
  }

  public async findById(id: string): Promise<QrRecord | undefined> {
    const record = this.records.get(id);
    return record ? cloneRecord(record) : undefined;
  }

  public async findAll(): Promise<QrRecord[]> {
    return [...this.records.values()].map(cloneRecord);
  }

  public async incrementScanCount(id: string): Promise<QrRecord | undefined> {
    const record = this.records.get(id);
    if (!record) {
      return undefined;
    }

    const updated: QrRecord = { ...record, scanCount: record.scanCount + 1 };
    this.records.set(id, updated);
    return cloneRecord(updated);
  }

  public async deleteById(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}
