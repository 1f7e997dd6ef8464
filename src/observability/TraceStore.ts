import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { ToolCode, ToolStatus } from "../shared/errorCodes.js";

export interface TraceStep {
  ts: string;
  action: string;
  target: string;
  note: string;
}

export interface TraceRecord {
  traceId: string;
  toolName: string;
  startedAt: string;
  finishedAt?: string;
  status?: ToolStatus;
  code?: ToolCode;
  message?: string;
  steps: TraceStep[];
  filePath?: string;
}

interface TraceOutcome {
  status: ToolStatus;
  code: ToolCode;
  message: string;
}

/** 单次工具调用的步骤记录，结束时可选落盘为 `<tracesDir>/<traceId>.json`。 */
export class TraceRecorder {
  private readonly steps: TraceStep[] = [];
  private readonly startedAt = new Date().toISOString();

  public constructor(
    public readonly traceId: string,
    public readonly toolName: string,
    private readonly tracesDir?: string
  ) {}

  public record(action: string, target: string, note = ""): void {
    this.steps.push({ ts: new Date().toISOString(), action, target, note });
  }

  public snapshot(): TraceRecord {
    return {
      traceId: this.traceId,
      toolName: this.toolName,
      startedAt: this.startedAt,
      steps: [...this.steps]
    };
  }

  public async complete(outcome: TraceOutcome): Promise<TraceRecord> {
    const finished: TraceRecord = {
      ...this.snapshot(),
      ...outcome,
      finishedAt: new Date().toISOString()
    };

    if (!this.tracesDir) {
      return finished;
    }

    await mkdir(this.tracesDir, { recursive: true });
    const filePath = join(this.tracesDir, `${this.traceId}.json`);
    await writeFile(filePath, JSON.stringify(finished, null, 2), "utf8");
    return { ...finished, filePath };
  }
}

const MAX_IN_MEMORY_TRACES = 50;

export class TraceStore {
  private readonly traces = new Map<string, TraceRecord>();

  public constructor(private readonly tracesDir?: string) {}

  public createTrace(traceId: string, toolName: string): TraceRecorder {
    const recorder = new TraceRecorder(traceId, toolName, this.tracesDir);
    recorder.record("tool.start", toolName);
    return recorder;
  }

  public save(record: TraceRecord): void {
    this.traces.delete(record.traceId);
    this.traces.set(record.traceId, record);

    // Map 保持插入顺序，超出上限时淘汰最早的一条
    if (this.traces.size > MAX_IN_MEMORY_TRACES) {
      const oldest = this.traces.keys().next();
      if (!oldest.done) {
        this.traces.delete(oldest.value);
      }
    }
  }

  public getLatest(): TraceRecord | undefined {
    let latest: TraceRecord | undefined;
    for (const record of this.traces.values()) {
      latest = record;
    }
    return latest;
  }

  public getByTraceId(traceId: string): TraceRecord | undefined {
    return this.traces.get(traceId);
  }
}
