import { z } from "zod";

import { encodeMatrix, type ModuleGrid } from "../../encoder/MatrixEncoder.js";
import type { QrRecord } from "../../registry/types.js";
import { isHexColor } from "../../render/color.js";
import {
  DEFAULT_BACK_COLOR,
  DEFAULT_FILL_COLOR,
  DEFAULT_MODULE_SIZE,
  encodePng,
  renderGrid
} from "../../render/ImageRenderer.js";
import type { AppConfig } from "../../shared/config.js";
import { AppError } from "../../shared/errors.js";
import type { ToolDefinition, ToolHandlerContext, ToolInput } from "../types.js";

const MIN_MODULE_SIZE = 5;
const MAX_MODULE_SIZE = 20;
const MIN_BORDER = 2;
const MAX_BORDER = 10;
const DEFAULT_BORDER = 4;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;

const hexColorSchema = z.string().trim().refine(isHexColor, {
  message: "颜色必须是 #rgb 或 #rrggbb"
});

const renderSettingsSchema = {
  fillColor: hexColorSchema.optional().default(DEFAULT_FILL_COLOR),
  backColor: hexColorSchema.optional().default(DEFAULT_BACK_COLOR),
  moduleSize: z.number().int().min(MIN_MODULE_SIZE).max(MAX_MODULE_SIZE).optional().default(DEFAULT_MODULE_SIZE),
  border: z.number().int().min(MIN_BORDER).max(MAX_BORDER).optional().default(DEFAULT_BORDER),
  errorCorrection: z.enum(["low", "medium", "quartile", "high"]).optional(),
  brandingBase64: z.string().trim().min(1).optional()
};

type RenderSettingsInput = ToolInput<typeof renderSettingsSchema>;

export interface RecordView {
  id: string;
  label: string;
  resourcePath: string | null;
  payload: string;
  createdAt: string;
  expiresAt: string;
  scanCount: number;
}

export interface QrImageView {
  mimeType: "image/png";
  width: number;
  height: number;
  version: number;
  errorCorrection: string;
  pngBase64: string;
}

export function toRecordView(record: QrRecord): RecordView {
  return {
    id: record.id,
    label: record.label,
    resourcePath: record.resourcePath,
    payload: record.payload,
    createdAt: record.createdAt.toISOString(),
    expiresAt: record.expiresAt.toISOString(),
    scanCount: record.scanCount
  };
}

export function decodeBase64Field(value: string, field: string): Buffer {
  const compact = value.replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (!compact || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw AppError.validation(`${field} 不是合法的 base64 内容`);
  }
  return Buffer.from(compact, "base64");
}

function resolveTtlDays(requested: number | undefined, config: AppConfig): number {
  const ttlDays = requested ?? config.defaultTtlDays;
  if (ttlDays > config.maxTtlDays) {
    throw AppError.validation(`ttlDays 不能超过 ${String(config.maxTtlDays)} 天`);
  }
  return ttlDays;
}

function encodeForSettings(payload: string, settings: RenderSettingsInput, config: AppConfig): ModuleGrid {
  return encodeMatrix(payload, {
    errorCorrection: settings.errorCorrection ?? config.defaultErrorCorrection,
    border: settings.border
  });
}

function renderImage(grid: ModuleGrid, settings: RenderSettingsInput, context: ToolHandlerContext): QrImageView {
  const branding = settings.brandingBase64
    ? decodeBase64Field(settings.brandingBase64, "brandingBase64")
    : undefined;

  const image = renderGrid(grid, {
    fillColor: settings.fillColor,
    backColor: settings.backColor,
    moduleSize: settings.moduleSize,
    branding
  });
  const png = encodePng(image);

  context.trace.record(
    "render.png",
    `v${String(grid.version)}`,
    `${String(image.width)}x${String(image.height)}${image.branding ? " branded" : ""}`
  );

  return {
    mimeType: "image/png",
    width: image.width,
    height: image.height,
    version: grid.version,
    errorCorrection: grid.errorCorrection,
    pngBase64: png.toString("base64")
  };
}

const qrCreateSchema = {
  payload: z.string().min(1),
  label: z.string().trim().min(1).optional(),
  ttlDays: z.number().positive().optional(),
  ...renderSettingsSchema
};

export const qrCreateToolDefinition: ToolDefinition<
  typeof qrCreateSchema,
  {
    record: RecordView;
    image: QrImageView;
  }
> = {
  name: "qr_create",
  description: "为文本或 URL 签发一个带有效期的二维码，返回记录与 PNG（base64）。",
  schema: qrCreateSchema,
  handler: async (input, context) => {
    const { config, registry } = context.runtime;
    const ttlDays = resolveTtlDays(input.ttlDays, config);
    // 先编码：内容超出容量时不留下无法渲染的记录
    const grid = encodeForSettings(input.payload, input, config);

    const record = await registry.create({
      label: input.label ?? input.payload,
      payload: input.payload,
      ttlDays
    });
    context.trace.record("registry.create", record.id, `ttlDays=${String(ttlDays)}`);

    return {
      data: {
        record: toRecordView(record),
        image: renderImage(grid, input, context)
      },
      message: "二维码已生成"
    };
  }
};

const qrCreateFromFileSchema = {
  fileName: z.string().trim().min(1).max(255),
  contentBase64: z.string().min(1),
  ttlDays: z.number().positive().optional(),
  ...renderSettingsSchema
};

export const qrCreateFromFileToolDefinition: ToolDefinition<
  typeof qrCreateFromFileSchema,
  {
    record: RecordView;
    image: QrImageView;
  }
> = {
  name: "qr_create_from_file",
  description: "保存上传文件并签发指向该文件的二维码，文件随记录过期一起回收。",
  schema: qrCreateFromFileSchema,
  handler: async (input, context) => {
    const { config, registry } = context.runtime;
    const ttlDays = resolveTtlDays(input.ttlDays, config);
    const content = decodeBase64Field(input.contentBase64, "contentBase64");
    if (content.byteLength > config.maxUploadBytes) {
      throw AppError.validation(`上传文件超过 ${String(config.maxUploadBytes)} 字节上限`, {
        byteLength: content.byteLength
      });
    }

    const record = await registry.createFromUpload({
      name: input.fileName,
      content,
      ttlDays
    });
    context.trace.record("registry.create_from_upload", record.id, input.fileName);

    const grid = encodeForSettings(record.payload, input, config);
    return {
      data: {
        record: toRecordView(record),
        image: renderImage(grid, input, context)
      },
      message: "文件已保存，二维码已生成"
    };
  }
};

const qrRenderPreviewSchema = {
  payload: z.string().min(1),
  ...renderSettingsSchema
};

export const qrRenderPreviewToolDefinition: ToolDefinition<
  typeof qrRenderPreviewSchema,
  {
    image: QrImageView;
  }
> = {
  name: "qr_render_preview",
  description: "仅渲染二维码预览，不写入记录。",
  schema: qrRenderPreviewSchema,
  handler: (input, context) => {
    const grid = encodeForSettings(input.payload, input, context.runtime.config);
    return {
      data: {
        image: renderImage(grid, input, context)
      }
    };
  }
};

const emptySchema = {};

export const qrListAnalyticsToolDefinition: ToolDefinition<
  typeof emptySchema,
  {
    swept: number;
    total: number;
    items: RecordView[];
  }
> = {
  name: "qr_list_analytics",
  description: "回收过期记录后返回全部有效二维码及其扫描次数。",
  schema: emptySchema,
  handler: async (_input, context) => {
    const snapshot = await context.runtime.registry.listForAnalytics();
    context.trace.record("registry.analytics", "all", `swept=${String(snapshot.swept)}`);

    return {
      data: {
        swept: snapshot.swept,
        total: snapshot.records.length,
        items: snapshot.records.map(toRecordView)
      }
    };
  }
};

const qrRecordScanSchema = {
  id: z.string().trim().uuid()
};

export const qrRecordScanToolDefinition: ToolDefinition<
  typeof qrRecordScanSchema,
  {
    record: RecordView;
  }
> = {
  name: "qr_record_scan",
  description: "为指定二维码记录一次扫描。",
  schema: qrRecordScanSchema,
  handler: async (input, context) => {
    const record = await context.runtime.registry.incrementScan(input.id);
    context.trace.record("registry.scan", record.id, `scanCount=${String(record.scanCount)}`);
    return {
      data: {
        record: toRecordView(record)
      }
    };
  }
};

export const qrSweepToolDefinition: ToolDefinition<
  typeof emptySchema,
  {
    removed: number;
  }
> = {
  name: "qr_sweep",
  description: "立即回收已过期的二维码记录及其上传文件。",
  schema: emptySchema,
  handler: async (_input, context) => {
    const removed = await context.runtime.registry.sweep();
    context.trace.record("registry.sweep", "all", `removed=${String(removed)}`);
    return {
      data: {
        removed
      }
    };
  }
};
