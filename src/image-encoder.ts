import sharp from "sharp";
import { JPEG_QUALITY, PNG_COMPRESSION_LEVEL } from "./constants";
import type { ImageFormat } from "./types";

export function encodePage(page: Buffer, format: ImageFormat): Promise<Buffer> {
  const image = sharp(page);
  return format === "png"
    ? image.png({ compressionLevel: PNG_COMPRESSION_LEVEL }).toBuffer()
    : image.jpeg({ quality: JPEG_QUALITY }).toBuffer();
}
