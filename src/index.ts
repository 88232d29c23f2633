import { createApp } from "./app";
import { loadConfig } from "./config";
import { logError, logInfo, setLogLevel } from "./logger";
import { PopplerRasterizer } from "./pdf-rasterizer";
import { resolvePopplerPath, ToolchainLocation } from "./poppler-locator";

function startServer(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const popplerPath = resolvePopplerPath({
    baseDir: config.toolchainBaseDir,
    installScript: config.installScript,
    override: config.popplerPath,
  });

  const app = createApp({
    config,
    toolchain: new ToolchainLocation(config.toolchainBaseDir, popplerPath),
    rasterizer: new PopplerRasterizer(config.rasterDpi),
  });

  const server = app.listen(config.port, () => {
    logInfo(`PDF image worker running on port ${config.port}`);
    logInfo(`Max concurrent jobs: ${config.maxConcurrentJobs}`);
    logInfo(`Queue size: ${config.queueSize}`);
    logInfo(`Poppler path: ${popplerPath ?? "(PATH lookup)"}`);
  });

  server.on("error", (error: Error) => {
    logError("Failed to start server:", error);
    process.exit(1);
  });

  process.on("SIGTERM", () => {
    logInfo("SIGTERM received, closing server");
    server.close();
  });
}

startServer();
