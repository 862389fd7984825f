import express, { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler';
import type { BookingAssistant } from '../services/ai/BookingAssistant';

export function createServiceRouter(assistant: BookingAssistant): express.Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    res.json(await assistant.listServices());
  }));

  router.get('/:serviceId', asyncHandler(async (req: Request, res: Response) => {
    res.json(await assistant.getService(req.params.serviceId));
  }));

  // Body is validated by the catalog schema inside addService.
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const service = await assistant.addService(req.body);
    res.status(201).json(service);
  }));

  return router;
}
