import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { errorHandler } from './middleware/error-handler';
import { createBookingRouter } from './routes/booking.routes';
import { createHealthRouter } from './routes/health.routes';
import type { HealthProbe } from './routes/health.routes';
import { createServiceRouter } from './routes/service.routes';
import { createSessionRouter } from './routes/session.routes';
import type { BookingAssistant } from './services/ai/BookingAssistant';

export function createApp(assistant: BookingAssistant, healthProbe: HealthProbe): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));

  app.use('/api/health', createHealthRouter(healthProbe));
  app.use('/api/sessions', createSessionRouter(assistant));
  app.use('/api/services', createServiceRouter(assistant));
  app.use('/api/bookings', createBookingRouter(assistant));

  app.get('/', (_req, res) => {
    res.json({
      message: 'Slotline Booking Assistant API',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: '/api/health',
        sessions: '/api/sessions',
        messages: '/api/sessions/:sessionId/messages',
        services: '/api/services',
        bookings: '/api/bookings'
      }
    });
  });

  app.use(errorHandler);

  return app;
}
