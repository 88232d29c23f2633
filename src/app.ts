import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import multer from "multer";
import PQueue from "p-queue";
import type { AppConfig } from "./config";
import {
  FORMAT_FIELD,
  HTTP_STATUS,
  IMAGES_FIELD,
  PDF_FIELD,
} from "./constants";
import {
  ClientInputError,
  ConversionError,
  errorMessage,
  HttpError,
  ServiceBusyError,
} from "./errors";
import { formatMegabytes, logError, logInfo, logWarn } from "./logger";
import { assemblePdf } from "./pdf-assembler";
import {
  packagePages,
  parseImageFormat,
  rasterizeWithFallback,
} from "./pdf-to-images";
import type { ToolchainLocation } from "./poppler-locator";
import type { ConvertedAsset, Rasterizer } from "./types";

export interface AppDependencies {
  config: AppConfig;
  toolchain: ToolchainLocation;
  rasterizer: Rasterizer;
}

function formField(body: unknown, name: string): unknown {
  return typeof body === "object" && body !== null
    ? Reflect.get(body, name)
    : undefined;
}

function uploadedFiles(req: Request, field: string): Express.Multer.File[] {
  return Array.isArray(req.files)
    ? req.files.filter((file) => file.fieldname === field)
    : [];
}

function sendAsset(res: Response, asset: ConvertedAsset): void {
  res
    .status(HTTP_STATUS.OK)
    .attachment(asset.filename)
    .type(asset.contentType)
    .send(asset.body);
}

function sendText(res: Response, status: number, message: string): void {
  res.status(status).type("text/plain").send(message);
}

function sendError(res: Response, operation: string, error: unknown): void {
  if (error instanceof ClientInputError || error instanceof ServiceBusyError) {
    logWarn(`${operation} rejected: ${error.message}`);
    sendText(res, error.status, error.message);
    return;
  }

  logError(`${operation} error: ${errorMessage(error)}`, error);
  if (error instanceof HttpError) {
    sendText(res, error.status, error.message);
    return;
  }
  sendText(
    res,
    HTTP_STATUS.INTERNAL_SERVER_ERROR,
    `Conversion failed: ${errorMessage(error)}`
  );
}

export function createApp({
  config,
  toolchain,
  rasterizer,
}: AppDependencies): Express {
  const app = express();

  const storage = multer.memoryStorage();
  const uploadImages = multer({
    storage,
    limits: { fileSize: config.maxUploadSize, files: config.maxImages },
  });
  const uploadPdf = multer({
    storage,
    limits: { fileSize: config.maxUploadSize },
  });

  const queue = new PQueue({ concurrency: config.maxConcurrentJobs });

  app.use(
    cors({
      origin: config.corsOrigin ?? true,
      exposedHeaders: ["Content-Disposition"],
    })
  );

  app.get("/health/", (_req: Request, res: Response) => {
    sendText(res, HTTP_STATUS.OK, "OK");
  });

  app.post(
    "/jpg-to-pdf/",
    uploadImages.any(),
    async (req: Request, res: Response) => {
      try {
        const images = uploadedFiles(req, IMAGES_FIELD);
        if (images.length === 0) {
          throw new ClientInputError("No images provided");
        }

        const totalBytes = images.reduce((sum, file) => sum + file.size, 0);
        logInfo(
          `Processing ${images.length} images to PDF conversion (${formatMegabytes(totalBytes)})`
        );

        const pdf = await assemblePdf(images.map((file) => file.buffer));

        logInfo(`Conversion successful. Output size: ${formatMegabytes(pdf.length)}`);
        sendAsset(res, {
          kind: "single",
          body: pdf,
          contentType: "application/pdf",
          filename: "converted.pdf",
        });
      } catch (error: unknown) {
        sendError(res, "JPG to PDF conversion", error);
      }
    }
  );

  // availability probe used by clients before uploading
  app.head("/pdf-to-jpg/", (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).end();
  });

  app.post(
    "/pdf-to-jpg/",
    uploadPdf.any(),
    async (req: Request, res: Response) => {
      try {
        const pdfFile = uploadedFiles(req, PDF_FIELD).at(-1);
        if (!pdfFile) {
          throw new ClientInputError("No PDF file uploaded");
        }
        const format = parseImageFormat(formField(req.body, FORMAT_FIELD));

        logInfo(
          `Processing PDF to ${format} conversion for file: ${pdfFile.originalname}`
        );
        logInfo(`PDF file size: ${formatMegabytes(pdfFile.size)}`);

        if (queue.size >= config.queueSize) {
          throw new ServiceBusyError();
        }

        const popplerPath = toolchain.current();
        logInfo(`Current POPPLER_PATH: ${popplerPath ?? "(none)"}`);

        const asset = await queue.add(async () => {
          const pages = await rasterizeWithFallback(
            pdfFile.buffer,
            rasterizer,
            popplerPath
          );
          return packagePages(pages, format);
        });
        if (!asset) {
          throw new ConversionError("Conversion job did not produce output");
        }

        logInfo(
          `Conversion successful. Output size: ${formatMegabytes(asset.body.length)}, Content-Type: ${asset.contentType}`
        );
        if (asset.kind === "archive") {
          logInfo(`Archived pages: ${asset.entries.join(", ")}`);
        }
        sendAsset(res, asset);
      } catch (error: unknown) {
        sendError(res, "PDF to JPG conversion", error);
      }
    }
  );

  app.use((_req: Request, res: Response) => {
    sendText(res, HTTP_STATUS.NOT_FOUND, "Endpoint not found");
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        sendError(
          res,
          "Upload",
          new ClientInputError(
            `Uploaded file exceeds the ${config.maxUploadSize} byte limit`,
            HTTP_STATUS.PAYLOAD_TOO_LARGE
          )
        );
        return;
      }
      if (err.code === "LIMIT_FILE_COUNT") {
        sendError(
          res,
          "Upload",
          new ClientInputError(
            `Too many files uploaded. At most ${config.maxImages} images are accepted`
          )
        );
        return;
      }
      sendError(res, "Upload", new ClientInputError(err.message));
      return;
    }

    logError("Unhandled error:", err);
    sendText(res, HTTP_STATUS.INTERNAL_SERVER_ERROR, "Internal server error");
  });

  return app;
}
