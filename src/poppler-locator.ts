import * as fs from "fs";
import * as path from "path";
import { spawnSync } from "child_process";
import { POPPLER_INSTALLED_MARKER } from "./constants";
import { errorMessage } from "./errors";
import { logInfo, logWarn } from "./logger";

/** Relative to the toolchain base directory, highest priority first. */
export const POPPLER_CANDIDATE_DIRS: readonly string[] = [
  path.join("poppler", "poppler-23.11.0", "Library", "bin"),
  path.join("poppler", "Library", "bin"),
  path.join("poppler", "bin"),
  path.join("poppler-23.11.0", "Library", "bin"),
];

const INSTALLER_TIMEOUT_MS = 10 * 60 * 1000;

export function findPopplerPath(
  baseDir: string,
  candidates: readonly string[] = POPPLER_CANDIDATE_DIRS
): string | undefined {
  for (const candidate of candidates) {
    const candidatePath = path.join(baseDir, candidate);
    if (fs.existsSync(candidatePath)) {
      logInfo(`Found Poppler at: ${candidatePath}`);
      return candidatePath;
    }
  }
  return undefined;
}

export function parseInstallerOutput(stdout: string): string | undefined {
  for (const line of stdout.split(/\r?\n/)) {
    const markerIndex = line.indexOf(POPPLER_INSTALLED_MARKER);
    if (markerIndex === -1) continue;

    const installedPath = line
      .slice(markerIndex + POPPLER_INSTALLED_MARKER.length)
      .trim();
    if (installedPath) return installedPath;
  }
  return undefined;
}

export function runPopplerInstaller(scriptPath: string): string | undefined {
  if (!fs.existsSync(scriptPath)) {
    logWarn(`Install script not found at ${scriptPath}`);
    return undefined;
  }

  logInfo(`Attempting to install Poppler with ${scriptPath}`);
  const result = spawnSync(scriptPath, [], {
    encoding: "utf8",
    timeout: INSTALLER_TIMEOUT_MS,
  });

  if (result.error) {
    logWarn(`Poppler installer could not run: ${errorMessage(result.error)}`);
    return undefined;
  }

  if (result.status !== 0) {
    logWarn(
      `Poppler installation failed with exit code ${result.status}: ${result.stderr.trim()}`
    );
    return undefined;
  }

  const installedPath = parseInstallerOutput(result.stdout);
  if (!installedPath) {
    logWarn("Could not extract Poppler path from installation output");
  }
  return installedPath;
}

export interface ResolvePopplerOptions {
  baseDir: string;
  installScript: string;
  override?: string;
}

export function resolvePopplerPath(
  options: ResolvePopplerOptions
): string | undefined {
  if (options.override) {
    logInfo(`Using POPPLER_PATH override: ${options.override}`);
    return options.override;
  }

  const found = findPopplerPath(options.baseDir);
  if (found) return found;

  const installed = runPopplerInstaller(options.installScript);
  if (installed) {
    logInfo(`Poppler path set to: ${installed}`);
    return installed;
  }

  logWarn(
    "Poppler not found. PDF to image conversion will rely on binaries from PATH."
  );
  return undefined;
}

/**
 * Process-wide toolchain location shared by the request handlers.
 * Cleared when the recorded directory disappears from disk.
 */
export class ToolchainLocation {
  private popplerPath: string | undefined;

  constructor(
    private readonly baseDir: string,
    initialPath?: string
  ) {
    this.popplerPath = initialPath;
  }

  get(): string | undefined {
    return this.popplerPath;
  }

  /** Per-request lookup: cached value, else a re-probe of the two likeliest candidates. */
  current(): string | undefined {
    if (!this.popplerPath) {
      const found = findPopplerPath(
        this.baseDir,
        POPPLER_CANDIDATE_DIRS.slice(0, 2)
      );
      if (found) {
        this.popplerPath = found;
      }
    }

    if (this.popplerPath && !fs.existsSync(this.popplerPath)) {
      logWarn(`Specified POPPLER_PATH does not exist: ${this.popplerPath}`);
      this.popplerPath = undefined;
    }

    return this.popplerPath;
  }
}
