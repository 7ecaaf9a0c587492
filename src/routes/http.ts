import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';
import { ErrorCode, type ApiResponse, type ServiceResult } from '../types/index.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.SLOT_UNAVAILABLE]: 400,
  [ErrorCode.SLOT_TAKEN]: 409,
  [ErrorCode.DUPLICATE_KEY]: 409,
  [ErrorCode.PRECONDITION_FAILED]: 409,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.MISSING_IDEMPOTENCY_KEY]: 400,
  [ErrorCode.IDEMPOTENCY_KEY_MISMATCH]: 422,
  [ErrorCode.PERSISTENCE_FAILURE]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Maps a service outcome to an HTTP status and response envelope.
 * Persistence failures keep their cause out of the body; the service
 * has already logged it.
 */
export function toHttpResponse<T>(
  result: ServiceResult<T>,
  successStatus = 200
): { status: number; body: ApiResponse<T> } {
  switch (result.kind) {
    case 'success':
      return { status: successStatus, body: { success: true, data: result.data, message: result.message } };
    case 'rejected':
    case 'failed':
      return {
        status: STATUS_BY_CODE[result.code],
        body: { success: false, error: { code: result.code, message: result.message } },
      };
  }
}

export function sendResult<T>(res: Response, result: ServiceResult<T>, successStatus = 200): void {
  const { status, body } = toHttpResponse(result, successStatus);
  res.status(status).json(body);
}

export function sendError(
  res: Response,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): void {
  const body: ApiResponse = { success: false, error: { code, message, ...(details ? { details } : {}) } };
  res.status(STATUS_BY_CODE[code]).json(body);
}

/**
 * Parses input with a zod schema. On failure a 400 VALIDATION_ERROR is
 * sent and null returned, so handlers simply stop.
 */
export function parseOrReject<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.infer<S> | null {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  sendError(res, ErrorCode.VALIDATION_ERROR, 'Request validation failed', {
    fields: result.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    })),
  });
  return null;
}

/** Forwards rejected promises from async handlers to the error middleware */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
