import { PDFDocument } from "pdf-lib";
import { describe, expect, it } from "vitest";
import { assemblePdf, detectImageKind } from "./pdf-assembler";
import { solidImage } from "./test-utils";

describe("detectImageKind", () => {
  it("recognises JPEG and PNG signatures", async () => {
    expect(detectImageKind(await solidImage(4, 4, "jpeg"))).toBe("jpeg");
    expect(detectImageKind(await solidImage(4, 4, "png"))).toBe("png");
  });

  it("treats anything else as needing a transcode", async () => {
    expect(detectImageKind(await solidImage(4, 4, "webp"))).toBe("other");
    expect(detectImageKind(Buffer.from([0xff]))).toBe("other");
  });
});

describe("assemblePdf", () => {
  it("creates one page per image in input order", async () => {
    const images = [
      await solidImage(10, 15, "png"),
      await solidImage(20, 25, "jpeg"),
      await solidImage(30, 35, "webp"),
    ];

    const pdf = await PDFDocument.load(await assemblePdf(images));

    expect(pdf.getPageCount()).toBe(3);
    expect(pdf.getPages().map((page) => page.getSize())).toEqual([
      { width: 10, height: 15 },
      { width: 20, height: 25 },
      { width: 22.5, height: 26.25 },
    ]);
  });

  it("sizes pages from the image resolution", async () => {
    const scan = await solidImage(600, 300, "png", { density: 300 });

    const pdf = await PDFDocument.load(await assemblePdf([scan]));

    expect(pdf.getPage(0).getSize()).toEqual({ width: 144, height: 72 });
  });

  it("assumes 96 dpi when an image has no resolution", async () => {
    const pdf = await PDFDocument.load(
      await assemblePdf([await solidImage(96, 48, "webp")])
    );

    expect(pdf.getPage(0).getSize()).toEqual({ width: 72, height: 36 });
  });

  it("turns the page to follow the EXIF orientation", async () => {
    const photo = await solidImage(6, 4, "jpeg", { orientation: 6 });

    const page = (await PDFDocument.load(await assemblePdf([photo]))).getPage(0);

    expect(page.getSize()).toEqual({ width: 6, height: 4 });
    expect(page.getRotation().angle).toBe(90);
  });

  it("leaves upright images unrotated", async () => {
    const page = (
      await PDFDocument.load(await assemblePdf([await solidImage(6, 4, "jpeg")]))
    ).getPage(0);

    expect(page.getRotation().angle).toBe(0);
  });

  it("bakes mirrored orientations into the image", async () => {
    const photo = await solidImage(6, 4, "jpeg", { orientation: 5 });

    const page = (await PDFDocument.load(await assemblePdf([photo]))).getPage(0);

    expect(page.getSize()).toEqual({ width: 4, height: 6 });
    expect(page.getRotation().angle).toBe(0);
  });

  it("produces a PDF header", async () => {
    const pdf = await assemblePdf([await solidImage(8, 8, "jpeg")]);

    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("names the image that could not be read", async () => {
    const images = [await solidImage(8, 8, "png"), Buffer.from("not an image")];

    await expect(assemblePdf(images)).rejects.toThrow(
      /^Image 2 could not be read: /
    );
  });

  it("requires at least one image", async () => {
    await expect(assemblePdf([])).rejects.toThrow(
      "At least one image is required"
    );
  });
});
