import * as path from "path";
import { fileURLToPath } from "url";
import {
  DEFAULT_MAX_CONCURRENT_JOBS,
  DEFAULT_MAX_IMAGES,
  DEFAULT_MAX_UPLOAD_SIZE,
  DEFAULT_PORT,
  DEFAULT_QUEUE_SIZE,
  DEFAULT_RASTER_DPI,
} from "./constants";
import { isLogLevel, type LogLevel } from "./logger";

export const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));

export interface AppConfig {
  port: number;
  maxConcurrentJobs: number;
  queueSize: number;
  maxUploadSize: number;
  maxImages: number;
  rasterDpi: number;
  /** Manual toolchain override; skips discovery when set. */
  popplerPath?: string;
  toolchainBaseDir: string;
  installScript: string;
  corsOrigin?: string;
  logLevel: LogLevel;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || String(fallback), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const toolchainBaseDir = path.resolve(
    readString(env.TOOLCHAIN_BASE_DIR) ?? PROJECT_ROOT
  );
  const logLevel = readString(env.LOG_LEVEL)?.toLowerCase() ?? "info";

  return {
    port: readInt(env.PORT, DEFAULT_PORT),
    maxConcurrentJobs: readInt(
      env.MAX_CONCURRENT_JOBS,
      DEFAULT_MAX_CONCURRENT_JOBS
    ),
    queueSize: readInt(env.QUEUE_SIZE, DEFAULT_QUEUE_SIZE),
    maxUploadSize: readInt(env.MAX_UPLOAD_SIZE, DEFAULT_MAX_UPLOAD_SIZE),
    maxImages: readInt(env.MAX_IMAGES, DEFAULT_MAX_IMAGES),
    rasterDpi: readInt(env.RASTER_DPI, DEFAULT_RASTER_DPI),
    popplerPath: readString(env.POPPLER_PATH),
    toolchainBaseDir,
    installScript:
      readString(env.POPPLER_INSTALL_SCRIPT) ??
      path.join(toolchainBaseDir, "scripts", "install-poppler.sh"),
    corsOrigin: readString(env.CORS_ORIGIN),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
  };
}
