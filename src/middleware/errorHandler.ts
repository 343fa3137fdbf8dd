import { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { HttpError } from '../utils/httpError';

export interface ErrorResponse {
  success: false;
  message: string;
  details?: unknown;
}

export function toErrorResponse(err: unknown): { status: number; body: ErrorResponse } {
  if (err instanceof HttpError) {
    const body: ErrorResponse = { success: false, message: err.message };
    if (err.details !== undefined) {
      body.details = err.details;
    }
    return { status: err.status, body };
  }

  if (err instanceof multer.MulterError) {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    return { status, body: { success: false, message: err.message, details: err.field } };
  }

  return { status: 500, body: { success: false, message: 'Internal server error' } };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const { status, body } = toErrorResponse(err);
  if (status === 500) {
    console.error('Unhandled error:', err);
  }
  res.status(status).json(body);
};
