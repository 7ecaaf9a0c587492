import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { IdempotencyStore } from './db/sqlite.js';
import { createLogger, describeError, type Logger } from './logger.js';
import { createAdminRouter } from './routes/admin.route.js';
import { createAppointmentsRouter } from './routes/appointments.route.js';
import { sendError } from './routes/http.js';
import { createPatientsRouter } from './routes/patients.route.js';
import { createProvidersRouter } from './routes/providers.route.js';
import type { BookingService } from './services/booking.service.js';
import { ErrorCode } from './types/index.js';

export interface AppDeps {
  service: BookingService;
  idempotency: IdempotencyStore;
  backupDir: string;
  logger?: Logger;
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp({ service, idempotency, backupDir, logger = createLogger('http') }: AppDeps): Express {
  const app = express();

  app.use(express.json());

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('Request handled', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.use('/api/appointments', createAppointmentsRouter({ service, idempotency }));
  app.use('/api/patients', createPatientsRouter(service));
  app.use('/api/providers', createProvidersRouter(service));
  app.use('/api/admin', createAdminRouter({ service, backupDir }));

  app.use((req: Request, res: Response) => {
    sendError(res, ErrorCode.NOT_FOUND, `Endpoint ${req.method} ${req.path} not found`);
  });

  // Express recognises error handlers by their four parameters
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      sendError(res, ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON');
      return;
    }
    logger.error('Unhandled error', { error: describeError(err) });
    sendError(res, ErrorCode.INTERNAL_ERROR, 'An internal server error occurred');
  });

  return app;
}
