export const DEFAULT_PORT = 8000;
export const DEFAULT_MAX_CONCURRENT_JOBS = 2;
export const DEFAULT_QUEUE_SIZE = 20;
export const DEFAULT_MAX_UPLOAD_SIZE = 50 * 1024 * 1024;
export const DEFAULT_MAX_IMAGES = 100;
export const DEFAULT_RASTER_DPI = 200;

export const FIRST_ATTEMPT_TIMEOUT_MS = 60_000;

export const PNG_COMPRESSION_LEVEL = 1;
export const JPEG_QUALITY = 95;

export const IMAGES_FIELD = "images";
export const PDF_FIELD = "pdf";
export const FORMAT_FIELD = "format";

export const POPPLER_INSTALLED_MARKER = "Poppler installed at:";

export const RASTERIZATION_FAILED_MESSAGE =
  "PDF conversion failed. The PDF might be corrupted, password-protected, or Poppler is not properly installed.";

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;
