import { createToolRuntime } from "./runtime/toolRuntime.js";
import { loadAppConfig } from "./shared/config.js";
import { toAppError } from "./shared/errors.js";
import { appLogger } from "./shared/logger.js";
import { loadHttpServerConfig, startHttpServer } from "./server/startHttpServer.js";

async function bootstrap(): Promise<void> {
  // 监听配置非法时在建立运行时之前失败
  const httpConfig = loadHttpServerConfig();
  const config = loadAppConfig();
  const runtime = createToolRuntime({ config });

  appLogger.info(
    {
      storeFile: config.storeFile,
      resourceDir: config.resourceDir,
      defaultTtlDays: config.defaultTtlDays,
      maxTtlDays: config.maxTtlDays,
      errorCorrection: config.defaultErrorCorrection,
      tracesDir: config.tracesDir
    },
    "二维码记录表已就绪"
  );

  await startHttpServer(runtime, httpConfig);
}

void bootstrap().catch((error: unknown) => {
  const appError = toAppError(error);
  appLogger.error(
    {
      err: error,
      code: appError.code,
      details: appError.details
    },
    "二维码 MCP 服务启动失败"
  );
  process.exitCode = 1;
});
