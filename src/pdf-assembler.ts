import { degrees, PDFDocument, type PDFImage } from "pdf-lib";
import sharp from "sharp";
import { errorMessage } from "./errors";

const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const DEFAULT_DPI = 96;
const POINTS_PER_INCH = 72;

/** EXIF orientations a page rotation can express without re-encoding. */
const PAGE_ROTATION_BY_ORIENTATION: Partial<Record<number, number>> = {
  1: 0,
  3: 180,
  6: 90,
  8: 270,
};

export type EmbeddableKind = "jpeg" | "png" | "other";

interface PlacedImage {
  image: PDFImage;
  rotation: number;
  dpi: number;
}

export function detectImageKind(data: Buffer): EmbeddableKind {
  if (data.subarray(0, JPEG_SIGNATURE.length).equals(JPEG_SIGNATURE)) {
    return "jpeg";
  }
  if (data.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return "png";
  }
  return "other";
}

async function placeImage(doc: PDFDocument, data: Buffer): Promise<PlacedImage> {
  const metadata = await sharp(data).metadata();
  const dpi =
    metadata.density && metadata.density > 0 ? metadata.density : DEFAULT_DPI;
  const rotation = PAGE_ROTATION_BY_ORIENTATION[metadata.orientation ?? 1];
  const kind = detectImageKind(data);

  // pdf-lib scans plain Uint8Arrays more reliably than pooled Buffers
  if (kind === "jpeg" && rotation !== undefined) {
    return { image: await doc.embedJpg(new Uint8Array(data)), rotation, dpi };
  }
  if (kind === "png" && rotation !== undefined) {
    return { image: await doc.embedPng(new Uint8Array(data)), rotation, dpi };
  }

  // mirrored orientations and foreign formats are baked upright into a PNG
  const png = await sharp(data).rotate().png().toBuffer();
  return { image: await doc.embedPng(new Uint8Array(png)), rotation: 0, dpi };
}

/**
 * Concatenates images into one PDF, one page per image, in the given order.
 * Pages are sized from each image's resolution (96 dpi when it has none)
 * and turned to match its EXIF orientation.
 */
export async function assemblePdf(images: readonly Buffer[]): Promise<Buffer> {
  if (images.length === 0) {
    throw new Error("At least one image is required");
  }

  const doc = await PDFDocument.create();
  for (const [index, data] of images.entries()) {
    let placed: PlacedImage;
    try {
      placed = await placeImage(doc, data);
    } catch (error: unknown) {
      throw new Error(
        `Image ${index + 1} could not be read: ${errorMessage(error)}`
      );
    }

    const scale = POINTS_PER_INCH / placed.dpi;
    const width = placed.image.width * scale;
    const height = placed.image.height * scale;
    const page = doc.addPage([width, height]);
    page.drawImage(placed.image, { x: 0, y: 0, width, height });
    if (placed.rotation !== 0) {
      page.setRotation(degrees(placed.rotation));
    }
  }

  return Buffer.from(await doc.save());
}
