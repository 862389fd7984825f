import express, { Request, Response } from 'express';
import type { DatabaseHealth } from '../config/database';
import { asyncHandler } from '../middleware/error-handler';

export type HealthProbe = () => Promise<DatabaseHealth | null>;

export function createHealthRouter(probe: HealthProbe): express.Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const database = await probe();
    const degraded = database !== null && database.status !== 'healthy';

    res.status(degraded ? 503 : 200).json({
      status: degraded ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      storage: database ?? { status: 'in-memory' },
      service: 'slotline-booking-assistant'
    });
  }));

  return router;
}
