import { Router, type Request, type Response } from 'express';
import type { BookingService } from '../services/booking.service.js';
import { asyncRoute, parseOrReject, sendResult } from './http.js';
import { availabilityQuerySchema, providerSchema, providerUpdateSchema, slotLabel } from './schemas.js';

export function createProvidersRouter(service: BookingService): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (_req: Request, res: Response) => {
      sendResult(res, await service.listProviders());
    })
  );

  router.post(
    '/',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(providerSchema, req.body, res);
      if (!body) return;
      sendResult(res, await service.createProvider(body), 201);
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.getProvider(req.params.id));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(providerUpdateSchema, req.body, res);
      if (!body) return;
      sendResult(res, await service.updateProvider(req.params.id, body));
    })
  );

  router.delete(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.deleteProvider(req.params.id));
    })
  );

  /** GET /api/providers/:id/availability?date=YYYY-MM-DD */
  router.get(
    '/:id/availability',
    asyncRoute(async (req: Request, res: Response) => {
      const query = parseOrReject(availabilityQuerySchema, req.query, res);
      if (!query) return;
      sendResult(res, await service.availableSlots(req.params.id, query.date));
    })
  );

  router.get(
    '/:id/appointments',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.listAppointmentsForProvider(req.params.id));
    })
  );

  router.post(
    '/:id/slots/:slot',
    asyncRoute(async (req: Request, res: Response) => {
      const slot = parseOrReject(slotLabel, req.params.slot, res);
      if (slot === null) return;
      sendResult(res, await service.addProviderSlot(req.params.id, slot));
    })
  );

  router.delete(
    '/:id/slots/:slot',
    asyncRoute(async (req: Request, res: Response) => {
      const slot = parseOrReject(slotLabel, req.params.slot, res);
      if (slot === null) return;
      sendResult(res, await service.removeProviderSlot(req.params.id, slot));
    })
  );

  return router;
}
