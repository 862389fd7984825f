import express, { Request, Response } from 'express';
import { asyncHandler } from '../middleware/error-handler';
import type { BookingAssistant } from '../services/ai/BookingAssistant';

export function createBookingRouter(assistant: BookingAssistant): express.Router {
  const router = express.Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const { status } = req.query;
    const bookings = await assistant.listBookings();
    if (status === 'confirmed' || status === 'cancelled') {
      res.json(bookings.filter(b => b.status === status));
      return;
    }
    res.json(bookings);
  }));

  router.delete('/:bookingId', asyncHandler(async (req: Request, res: Response) => {
    const booking = await assistant.cancelBooking(req.params.bookingId);
    res.json({ message: 'Booking cancelled successfully', booking });
  }));

  return router;
}
