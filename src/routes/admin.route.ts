import { Router, type Request, type Response } from 'express';
import type { BookingService } from '../services/booking.service.js';
import type { ApiResponse, CacheStats } from '../types/index.js';
import { asyncRoute, sendResult } from './http.js';

export interface AdminRouterDeps {
  service: BookingService;
  backupDir: string;
}

export function createAdminRouter({ service, backupDir }: AdminRouterDeps): Router {
  const router = Router();

  router.get(
    '/stats',
    asyncRoute(async (_req: Request, res: Response) => {
      sendResult(res, await service.getStatistics());
    })
  );

  router.get('/cache', (_req: Request, res: Response) => {
    const response: ApiResponse<CacheStats> = { success: true, data: service.cacheStats() };
    res.json(response);
  });

  router.post('/cache/clear', (_req: Request, res: Response) => {
    service.clearCache();
    const response: ApiResponse<CacheStats> = { success: true, data: service.cacheStats(), message: 'Cache cleared' };
    res.json(response);
  });

  router.post('/cache/purge', (_req: Request, res: Response) => {
    const removed = service.purgeExpiredCache();
    const response: ApiResponse<{ removed: number }> = {
      success: true,
      data: { removed },
      message: `${removed} expired entr${removed === 1 ? 'y' : 'ies'} removed`,
    };
    res.json(response);
  });

  router.post(
    '/backups',
    asyncRoute(async (_req: Request, res: Response) => {
      sendResult(res, await service.backupAll(backupDir), 201);
    })
  );

  router.get(
    '/backups',
    asyncRoute(async (_req: Request, res: Response) => {
      sendResult(res, await service.listBackups(backupDir));
    })
  );

  return router;
}
