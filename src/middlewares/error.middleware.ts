import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sendAppError, sendError } from "../utils/response";

type HttpError = Error & { status: number };

// body-parser and friends reject bad requests with an Error carrying `status`
const isClientHttpError = (err: unknown): err is HttpError =>
  err instanceof Error &&
  "status" in err &&
  typeof err.status === "number" &&
  err.status >= 400 &&
  err.status < 500;

export function notFoundMiddleware(req: Request, res: Response) {
  sendError(res, 404, `Route ${req.method} ${req.path} not found`, "NOT_FOUND");
}

export function errorMiddleware(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof AppError) {
    if (err.status >= 500) {
      logger.error("Request failed", err);
    } else {
      logger.warn(`${err.code}: ${err.message}`);
    }
    sendAppError(res, err);
    return;
  }

  if (isClientHttpError(err)) {
    logger.warn(`Rejected request (${err.status}): ${err.message}`);
    if (err instanceof SyntaxError) {
      sendError(res, err.status, "Malformed JSON body", "VALIDATION_ERROR");
    } else {
      sendError(res, err.status, err.message, "BAD_REQUEST");
    }
    return;
  }

  logger.error("Unhandled error", err);
  sendError(res, 500, "Internal Server Error", "INTERNAL_ERROR");
}
