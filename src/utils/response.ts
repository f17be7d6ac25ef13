import { Response } from "express";
import { AppError } from "./errors";

export interface SuccessEnvelope<T> {
  success: true;
  message: string;
  data: T;
}

export interface ErrorEnvelope {
  success: false;
  message: string;
  error?: string;
}

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data: T,
  status = 200
): Response<SuccessEnvelope<T>> => {
  const body: SuccessEnvelope<T> = { success: true, message, data };
  return res.status(status).json(body);
};

export const sendError = (
  res: Response,
  status: number,
  message: string,
  code?: string
): Response<ErrorEnvelope> => {
  const body: ErrorEnvelope = { success: false, message, error: code };
  return res.status(status).json(body);
};

/** Error envelope carrying the error's own status and code. */
export const sendAppError = (res: Response, error: AppError) =>
  sendError(res, error.status, error.message, error.code);
