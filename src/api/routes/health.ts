import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler';

/**
 * GET /api/health
 * Health check endpoint for monitoring
 */
export function createHealthRouter(checkStore?: () => Promise<void>): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      let storeStatus = 'not-configured';

      if (checkStore) {
        try {
          await checkStore();
          storeStatus = 'connected';
        } catch (err) {
          console.error('[Health] Store check failed:', err);
          storeStatus = 'error';
        }
      }

      const isHealthy = storeStatus !== 'error';

      res.status(isHealthy ? 200 : 503).json({
        status: isHealthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        store: storeStatus,
        version: process.env.npm_package_version || '1.0.0',
      });
    })
  );

  return router;
}
