import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { sendError } from '../routes/http.js';
import { ErrorCode } from '../types/index.js';

const idempotencyKeySchema = z.string().uuid();

/**
 * Requires an Idempotency-Key header holding a UUID.
 * Clients reuse the same key when retrying the same booking.
 */
export function requireIdempotencyKey(req: Request, res: Response, next: NextFunction): void {
  const header = req.get('Idempotency-Key');

  if (!header) {
    sendError(res, ErrorCode.MISSING_IDEMPOTENCY_KEY, 'Idempotency-Key header is required for this endpoint', {
      hint: 'Generate a UUID for each distinct booking and resend it on retries',
    });
    return;
  }

  const parsed = idempotencyKeySchema.safeParse(header);
  if (!parsed.success) {
    sendError(res, ErrorCode.MISSING_IDEMPOTENCY_KEY, 'Idempotency-Key must be a valid UUID', {
      received: header,
      expected_format: 'xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx',
    });
    return;
  }

  req.idempotencyKey = parsed.data;
  next();
}

declare global {
  namespace Express {
    interface Request {
      idempotencyKey?: string;
    }
  }
}
