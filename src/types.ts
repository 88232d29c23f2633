export type ImageFormat = "jpg" | "png";

export type RasterBackend = "pdftocairo" | "pdftoppm";

export interface RasterizeOptions {
  backend: RasterBackend;
  popplerPath?: string;
  timeoutMs?: number;
}

/** Renders every page of a PDF to a PNG buffer, in page order. */
export interface Rasterizer {
  rasterize(pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]>;
}

export interface SingleAsset {
  kind: "single";
  body: Buffer;
  contentType: string;
  filename: string;
}

export interface ArchiveAsset {
  kind: "archive";
  body: Buffer;
  contentType: "application/zip";
  filename: "converted.zip";
  entries: string[];
}

export type ConvertedAsset = SingleAsset | ArchiveAsset;
