import express, { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/error-handler';
import type { BookingAssistant } from '../services/ai/BookingAssistant';
import { parseBody } from '../utils/validation';

const sendMessageSchema = z.object({
  message: z.string().max(2000)
});

export function createSessionRouter(assistant: BookingAssistant): express.Router {
  const router = express.Router();

  router.post('/', asyncHandler(async (_req: Request, res: Response) => {
    const result = await assistant.startSession();
    res.status(201).json(result);
  }));

  router.post('/:sessionId/messages', asyncHandler(async (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const { message } = parseBody(sendMessageSchema, req.body);
    const result = await assistant.sendMessage(sessionId, message);
    res.json(result);
  }));

  router.get('/:sessionId', asyncHandler(async (req: Request, res: Response) => {
    const details = await assistant.getSession(req.params.sessionId);
    res.json(details);
  }));

  return router;
}
