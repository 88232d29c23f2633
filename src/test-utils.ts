import type { Server } from "http";
import type { Express } from "express";
import sharp from "sharp";
import * as yauzl from "yauzl";
import { loadConfig, type AppConfig } from "./config";
import type { RasterizeOptions, Rasterizer } from "./types";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({}), ...overrides };
}

export interface SolidImageOptions {
  /** Pixels per inch written into the file; webp images carry none. */
  density?: number;
  orientation?: number;
}

export function solidImage(
  width: number,
  height: number,
  format: "png" | "jpeg" | "webp",
  options: SolidImageOptions = {}
): Promise<Buffer> {
  const image = sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 200, g: 40, b: 40 },
    },
  });
  const withMetadata =
    format === "webp"
      ? image
      : image.withMetadata({
          density: options.density ?? 72,
          ...(options.orientation === undefined
            ? {}
            : { orientation: options.orientation }),
        });

  return withMetadata.toFormat(format).toBuffer();
}

/** Replays scripted outcomes; the last one repeats once the script runs out. */
export class FakeRasterizer implements Rasterizer {
  readonly calls: RasterizeOptions[] = [];

  constructor(private readonly outcomes: Array<Buffer[] | Error>) {}

  async rasterize(_pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]> {
    this.calls.push(options);
    const outcome =
      this.outcomes[Math.min(this.calls.length, this.outcomes.length) - 1];
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

/** Holds every rasterization until `release` is called. */
export class GatedRasterizer implements Rasterizer {
  readonly calls: RasterizeOptions[] = [];
  private readonly gate: Promise<void>;
  private open: () => void = () => undefined;

  constructor(private readonly pages: Buffer[]) {
    this.gate = new Promise<void>((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }

  async rasterize(_pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]> {
    this.calls.push(options);
    await this.gate;
    return this.pages;
  }
}

export interface RunningApp {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function startApp(app: Express): Promise<RunningApp> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function readZipEntryNames(zip: Buffer): Promise<string[]> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(zip, { lazyEntries: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error("Could not open zip"));
        return;
      }

      const names: string[] = [];
      zipfile.on("entry", (entry: yauzl.Entry) => {
        names.push(entry.fileName);
        zipfile.readEntry();
      });
      zipfile.on("end", () => resolve(names));
      zipfile.on("error", reject);
      zipfile.readEntry();
    });
  });
}
