import { NextFunction, Request, Response } from "express";
import { MulterError } from "multer";
import {
  BackendFailure,
  EmbeddingFailure,
  QuerySpecError,
  ValidationFailure,
} from "../../domain/errors/service.errors";
import { InvalidRequestError } from "../dto/request.parser";

export interface ErrorResponse {
  status: number;
  body: { error: string; kind?: string };
}

function httpStatusOf(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, "status");
  return typeof status === "number" && status >= 400 && status < 600 ? status : undefined;
}

/**
 * Maps the service's typed failures to HTTP statuses.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationFailure) {
    return {
      status: error.kind === "NotFound" ? 404 : 400,
      body: { error: error.message, kind: error.kind },
    };
  }
  if (error instanceof QuerySpecError || error instanceof InvalidRequestError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof EmbeddingFailure) {
    return { status: 502, body: { error: error.message } };
  }
  if (error instanceof BackendFailure) {
    return {
      status: error.isValidationError ? 400 : 502,
      body: { error: error.message, kind: error.kind },
    };
  }
  if (error instanceof MulterError) {
    return { status: 400, body: { error: error.message, kind: error.code } };
  }
  if (error instanceof Error) {
    // body-parser errors carry their own status (e.g. 400 for malformed JSON)
    const status = httpStatusOf(error);
    if (status !== undefined) {
      return { status, body: { error: error.message } };
    }
  }
  return { status: 500, body: { error: "Internal server error" } };
}

export function errorMiddleware(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    console.error(`[ErrorMiddleware] ${req.method} ${req.path} failed:`, err);
  } else {
    console.warn(`[ErrorMiddleware] ${req.method} ${req.path} -> ${status}: ${body.error}`);
  }
  res.status(status).json(body);
}
