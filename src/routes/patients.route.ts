import { Router, type Request, type Response } from 'express';
import type { BookingService } from '../services/booking.service.js';
import { asyncRoute, parseOrReject, sendResult } from './http.js';
import { patientSchema, patientUpdateSchema } from './schemas.js';

export function createPatientsRouter(service: BookingService): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (_req: Request, res: Response) => {
      sendResult(res, await service.listPatients());
    })
  );

  /** 409 DUPLICATE_KEY when the national ID is already registered */
  router.post(
    '/',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(patientSchema, req.body, res);
      if (!body) return;
      sendResult(res, await service.createPatient(body), 201);
    })
  );

  router.get(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.getPatient(req.params.id));
    })
  );

  router.put(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      const body = parseOrReject(patientUpdateSchema, req.body, res);
      if (!body) return;
      sendResult(res, await service.updatePatient(req.params.id, body));
    })
  );

  /** 409 PRECONDITION_FAILED while the patient has scheduled or confirmed appointments */
  router.delete(
    '/:id',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.deletePatient(req.params.id));
    })
  );

  router.get(
    '/:id/appointments',
    asyncRoute(async (req: Request, res: Response) => {
      sendResult(res, await service.listAppointmentsForPatient(req.params.id));
    })
  );

  return router;
}
