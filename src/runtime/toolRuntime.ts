import { TraceStore } from "../observability/TraceStore.js";
import { ExpiringRegistry } from "../registry/ExpiringRegistry.js";
import { FileResourceStore } from "../registry/FileResourceStore.js";
import { JsonFileRecordStore } from "../registry/JsonFileRecordStore.js";
import type { RecordStore, ResourceStore } from "../registry/types.js";
import { loadAppConfig, type AppConfig } from "../shared/config.js";
import { appLogger, type AppLogger } from "../shared/logger.js";

export interface ToolRuntime {
  config: AppConfig;
  registry: ExpiringRegistry;
  traceStore: TraceStore;
  logger: AppLogger;
}

export interface ToolRuntimeOverrides {
  config?: AppConfig;
  store?: RecordStore;
  resources?: ResourceStore;
  clock?: () => Date;
  logger?: AppLogger;
}

export function createToolRuntime(overrides: ToolRuntimeOverrides = {}): ToolRuntime {
  const config = overrides.config ?? loadAppConfig();
  const logger = overrides.logger ?? appLogger;

  return {
    config,
    registry: new ExpiringRegistry({
      store: overrides.store ?? new JsonFileRecordStore(config.storeFile),
      resources: overrides.resources ?? new FileResourceStore(config.resourceDir),
      logger,
      clock: overrides.clock
    }),
    traceStore: new TraceStore(config.tracesDir),
    logger
  };
}
