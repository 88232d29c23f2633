import { spawn } from "child_process";
import { mkdtempSync, readdirSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DEFAULT_RASTER_DPI } from "./constants";
import type { RasterizeOptions, Rasterizer } from "./types";

const PAGE_PREFIX = "page";
const PAGE_FILE_PATTERN = /^page-(\d+)\.png$/;

export function popplerBinary(
  backend: RasterizeOptions["backend"],
  popplerPath?: string
): string {
  return popplerPath ? join(popplerPath, backend) : backend;
}

export function collectPageFiles(dir: string): string[] {
  return readdirSync(dir)
    .map((file) => ({ file, match: PAGE_FILE_PATTERN.exec(file) }))
    .filter(
      (entry): entry is { file: string; match: RegExpExecArray } =>
        entry.match !== null
    )
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => join(dir, entry.file));
}

/** Spawns pdftocairo or pdftoppm, feeding the document through stdin. */
export class PopplerRasterizer implements Rasterizer {
  constructor(private readonly dpi: number = DEFAULT_RASTER_DPI) {}

  rasterize(pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]> {
    const tmpDir = mkdtempSync(join(tmpdir(), "poppler-"));
    const binary = popplerBinary(options.backend, options.popplerPath);

    return new Promise((resolve, reject) => {
      let settled = false;
      let errorOutput = "";
      let timedOut = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const finish = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        try {
          outcome();
        } finally {
          rmSync(tmpDir, { recursive: true, force: true });
        }
      };

      const cli = spawn(
        binary,
        ["-png", "-r", String(this.dpi), "-", join(tmpDir, PAGE_PREFIX)],
        { stdio: ["pipe", "ignore", "pipe"] }
      );

      if (options.timeoutMs !== undefined) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          cli.kill("SIGKILL");
        }, options.timeoutMs);
      }

      cli.stderr.on("data", (chunk: Buffer) => {
        errorOutput += chunk.toString();
      });

      cli.stdin.on("error", (error: Error) => {
        if (!errorOutput) {
          errorOutput = `Failed to write PDF to ${options.backend}: ${error.message}`;
        }
      });
      cli.stdin.end(pdf);

      cli.on("close", (code: number | null) => {
        finish(() => {
          if (timedOut) {
            reject(
              new Error(`Rasterization exceeded ${options.timeoutMs}ms timeout`)
            );
            return;
          }

          if (code !== 0) {
            reject(
              new Error(
                errorOutput.trim() ||
                  `${options.backend} exited with code ${code}`
              )
            );
            return;
          }

          try {
            resolve(
              collectPageFiles(tmpDir).map((file) => readFileSync(file))
            );
          } catch (error: unknown) {
            reject(error);
          }
        });
      });

      cli.on("error", (error: Error) => {
        finish(() => {
          reject(
            new Error(`Failed to spawn ${options.backend}: ${error.message}`)
          );
        });
      });
    });
  }
}
