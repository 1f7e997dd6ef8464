import { join, resolve } from "node:path";

import type { ErrorCorrectionTier } from "../encoder/MatrixEncoder.js";

const DEFAULT_DATA_DIR = "./qrgen-data";
const DEFAULT_TTL_DAYS = 7;
const DEFAULT_MAX_TTL_DAYS = 30;
const DEFAULT_ERROR_CORRECTION: ErrorCorrectionTier = "quartile";
const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const ERROR_CORRECTION_TIERS: readonly ErrorCorrectionTier[] = ["low", "medium", "quartile", "high"];

function parseNumberEnv(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

function parseErrorCorrectionEnv(
  value: string | undefined,
  fallback: ErrorCorrectionTier
): ErrorCorrectionTier {
  const lower = value?.trim().toLowerCase();
  if (!lower) {
    return fallback;
  }
  return ERROR_CORRECTION_TIERS.find((tier) => tier === lower) ?? fallback;
}

export interface AppConfig {
  dataDir: string;
  storeFile: string;
  resourceDir: string;
  defaultTtlDays: number;
  maxTtlDays: number;
  defaultErrorCorrection: ErrorCorrectionTier;
  maxUploadBytes: number;
  tracesDir: string | undefined;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = resolve(env.QRGEN_DATA_DIR?.trim() || DEFAULT_DATA_DIR);
  const maxTtlDays = parseNumberEnv(env.QRGEN_MAX_TTL_DAYS, DEFAULT_MAX_TTL_DAYS);
  const tracesDir = env.QRGEN_TRACES_DIR?.trim();

  return {
    dataDir,
    storeFile: resolve(env.QRGEN_STORE_FILE?.trim() || join(dataDir, "records.json")),
    resourceDir: resolve(env.QRGEN_RESOURCE_DIR?.trim() || join(dataDir, "uploads")),
    // 默认 TTL 始终不超过上限
    defaultTtlDays: Math.min(parseNumberEnv(env.QRGEN_DEFAULT_TTL_DAYS, DEFAULT_TTL_DAYS), maxTtlDays),
    maxTtlDays,
    defaultErrorCorrection: parseErrorCorrectionEnv(env.QRGEN_ERROR_CORRECTION, DEFAULT_ERROR_CORRECTION),
    maxUploadBytes: parseNumberEnv(env.QRGEN_MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    tracesDir: tracesDir ? resolve(tracesDir) : undefined
  };
}
