import { Router, type Request, type Response } from 'express';
import type { IdempotencyStore } from '../db/sqlite.js';
import { requireIdempotencyKey } from '../middleware/idempotency.js';
import type { BookingService } from '../services/booking.service.js';
import { ErrorCode, type BookingRequest } from '../types/index.js';
import { asyncRoute, parseOrReject, sendError, sendResult, toHttpResponse } from './http.js';
import { appointmentQuerySchema, bookingSchema, conflictQuerySchema, statusBodySchema } from './schemas.js';

export interface AppointmentsRouterDeps {
  service: BookingService;
  idempotency: IdempotencyStore;
}

export function createAppointmentsRouter({ service, idempotency }: AppointmentsRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/appointments/book
   *
   * Headers:
   *   Idempotency-Key: UUID (required), reused by the client on retries
   *
   * Body: patient_id, provider_id, date (YYYY-MM-DD), slot (HH:MM), notes?
   *
   * Responses:
   *   201: Appointment booked
   *   400: Invalid body, or slot not offered by the provider (SLOT_UNAVAILABLE)
   *   404: Unknown patient or provider
   *   409: Slot already booked (SLOT_TAKEN)
   *   422: Idempotency-Key reused with a different body
   *   500: Persistence failure, safe to retry with the same key
   *
   * A retry sent while the first request is still running waits for it
   * and gets the same response.
   */
  router.post(
    '/book',
    requireIdempotencyKey,
    asyncRoute(async (req: Request, res: Response) => {
      const idempotencyKey = req.idempotencyKey;
      if (!idempotencyKey) {
        sendError(res, ErrorCode.MISSING_IDEMPOTENCY_KEY, 'Idempotency-Key header is required for this endpoint');
        return;
      }

      const body = parseOrReject(bookingSchema, req.body, res);
      if (!body) return;
      const request: BookingRequest = body;

      const outcome = await idempotency.execute(idempotencyKey, request, async () => {
        const result = await service.book(request);
        const { status, body: response } = toHttpResponse(result, 201);
        // Persistence failures stay retryable under the same key
        return { status, response, persist: result.kind !== 'failed' };
      });

      if (outcome.mismatch) {
        sendError(
          res,
          ErrorCode.IDEMPOTENCY_KEY_MISMATCH,
          'This Idempotency-Key was already used with different request parameters',
          { hint: 'Generate a new Idempotency-Key for a different booking' }
        );
        return;
      }

      res.status(outcome.status).json(outcome.response);
    })
  );

  router.get(
    '/',
    asyncRoute(async (req: Request, res: Response) => {
      const query = parseOrReject(appointmentQuerySchema, req.query, res);
      if (!query) return;
      sendResult(res, await service.listAppointments({ patientId: query.patient_id, providerId: query.provider_id }));
    })
  );

  /** GET /api/appointments/conflicts?provider_id=&date=&slot= */
  router.get(
    '/conflicts',
    asyncRoute(async (req: Request, res: Response) => {
      const query = parseOrReject(conflictQuerySchema, req.query, res);
      if (!query) return;
      sendResult(res, await service.checkConflict(query.provider_id, query.date, query.slot));
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.getAppointment(req.params.id));
    })
  );

  router.patch(
    '/:id/status',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(statusBodySchema, req.body, res);
      if (!body) return;
      sendResult(res, await service.updateAppointmentStatus(req.params.id, body.status));
    })
  );

  router.post(
    '/:id/cancel',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.cancelAppointment(req.params.id));
    })
  );

  router.post(
    '/:id/confirm',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.confirmAppointment(req.params.id));
    })
  );

  router.post(
    '/:id/complete',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.completeAppointment(req.params.id));
    })
  );

  return router;
}
