import { buildZip, type ArchiveEntry } from "./archive";
import {
  FIRST_ATTEMPT_TIMEOUT_MS,
  RASTERIZATION_FAILED_MESSAGE,
} from "./constants";
import { ClientInputError, ConversionError, errorMessage } from "./errors";
import { firstSuccessful } from "./fallback";
import { encodePage } from "./image-encoder";
import { logInfo, logWarn } from "./logger";
import type {
  ConvertedAsset,
  ImageFormat,
  RasterizeOptions,
  Rasterizer,
} from "./types";

export type RasterVariant = Omit<RasterizeOptions, "popplerPath">;

/** Tried in order; the first variant that renders wins. */
export const RASTER_VARIANTS: readonly RasterVariant[] = [
  { backend: "pdftocairo", timeoutMs: FIRST_ATTEMPT_TIMEOUT_MS },
  { backend: "pdftoppm" },
];

export const IMAGE_FORMATS: readonly ImageFormat[] = ["jpg", "png"];

export function parseImageFormat(value: unknown): ImageFormat {
  if (value === undefined || value === "") return "jpg";
  if (typeof value !== "string") {
    throw new ClientInputError("The format field must be a single value");
  }

  const normalized = value.trim().toLowerCase();
  const format = IMAGE_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new ClientInputError(
      `Unsupported format "${value}". Use ${IMAGE_FORMATS.join(" or ")}`
    );
  }
  return format;
}

export async function rasterizeWithFallback(
  pdf: Buffer,
  rasterizer: Rasterizer,
  popplerPath?: string,
  variants: readonly RasterVariant[] = RASTER_VARIANTS
): Promise<Buffer[]> {
  let pages: Buffer[];
  try {
    pages = await firstSuccessful(
      variants,
      (variant, attempt) => {
        logInfo(
          `Rasterization attempt ${attempt} with ${variant.backend}` +
            (popplerPath ? ` from ${popplerPath}` : "")
        );
        return rasterizer.rasterize(pdf, { ...variant, popplerPath });
      },
      (variant, error, attempt) => {
        logWarn(
          `Rasterization attempt ${attempt} (${variant.backend}) failed: ${errorMessage(error)}`
        );
      }
    );
  } catch {
    throw new ConversionError(RASTERIZATION_FAILED_MESSAGE);
  }

  if (pages.length === 0) {
    throw new ConversionError(
      "Failed to extract images from PDF (no images extracted)"
    );
  }

  logInfo(`Successfully converted PDF to ${pages.length} images`);
  return pages;
}

export function pageEntryName(index: number, format: ImageFormat): string {
  return `page_${index + 1}.${format}`;
}

/** One page becomes a single image; several become a zip of images. */
export async function packagePages(
  pages: readonly Buffer[],
  format: ImageFormat
): Promise<ConvertedAsset> {
  if (pages.length === 1) {
    return {
      kind: "single",
      body: await encodePage(pages[0], format),
      contentType: `image/${format}`,
      filename: `converted.${format}`,
    };
  }

  const entries: ArchiveEntry[] = [];
  for (const [index, page] of pages.entries()) {
    entries.push({
      name: pageEntryName(index, format),
      data: await encodePage(page, format),
    });
  }

  return {
    kind: "archive",
    body: await buildZip(entries),
    contentType: "application/zip",
    filename: "converted.zip",
    entries: entries.map((entry) => entry.name),
  };
}
