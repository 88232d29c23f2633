import { HTTP_STATUS } from "./constants";

export abstract class HttpError extends Error {
  abstract readonly status: number;
}

export class ClientInputError extends HttpError {
  readonly status: number;

  constructor(message: string, status: number = HTTP_STATUS.BAD_REQUEST) {
    super(message);
    this.name = "ClientInputError";
    this.status = status;
  }
}

export class ConversionError extends HttpError {
  readonly status = HTTP_STATUS.INTERNAL_SERVER_ERROR;

  constructor(message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

export class ServiceBusyError extends HttpError {
  readonly status = HTTP_STATUS.SERVICE_UNAVAILABLE;

  constructor(message = "Server is too busy, please try again later") {
    super(message);
    this.name = "ServiceBusyError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
