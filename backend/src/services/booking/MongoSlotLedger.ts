import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import BookingModel, { toBooking } from '../../models/Booking';
import type { IBookingDocument } from '../../models/Booking';
import type { Booking } from '../../types/booking';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { BookingNotFoundError, SlotConflictError } from '../../utils/errors';
import type { SlotAvailabilityLedger } from './SlotAvailabilityLedger';

const CREATION_ORDER = { createdAt: 1, _id: 1 } as const;

/**
 * Bookings in MongoDB. The partial unique index on the bookings collection
 * makes the insert itself the critical section: when two processes race for
 * a slot the loser gets a duplicate-key error, reported as SlotConflictError.
 */
export class MongoSlotLedger implements SlotAvailabilityLedger {
  constructor(private readonly clock: Clock = systemClock) {}

  async isAvailable(serviceId: string, date: string, time: string): Promise<boolean> {
    const existing = await BookingModel.exists({ serviceId, date, time, status: 'confirmed' });
    return !existing;
  }

  async confirm(userName: string, serviceId: string, date: string, time: string): Promise<Booking> {
    if (!(await this.isAvailable(serviceId, date, time))) {
      throw new SlotConflictError(serviceId, date, time);
    }

    try {
      const created = await BookingModel.create({
        _id: uuidv4(),
        userName,
        serviceId,
        date,
        time,
        status: 'confirmed',
        createdAt: this.clock.now()
      });
      return toBooking(created.toObject());
    } catch (error) {
      if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
        throw new SlotConflictError(serviceId, date, time);
      }
      throw error;
    }
  }

  async cancelAllForUser(userName: string): Promise<Booking[]> {
    const confirmed = await this.listConfirmedForUser(userName);
    if (confirmed.length === 0) {
      return [];
    }

    await BookingModel.updateMany(
      { _id: { $in: confirmed.map(b => b.id) }, status: 'confirmed' },
      { $set: { status: 'cancelled' } }
    );
    return confirmed.map(b => ({ ...b, status: 'cancelled' as const }));
  }

  async listConfirmedForUser(userName: string): Promise<Booking[]> {
    const docs = await BookingModel.find({ userName, status: 'confirmed' })
      .sort(CREATION_ORDER)
      .lean<IBookingDocument[]>();
    return docs.map(toBooking);
  }

  async cancel(bookingId: string): Promise<Booking> {
    const doc = await BookingModel.findByIdAndUpdate(
      bookingId,
      { $set: { status: 'cancelled' } },
      { new: true }
    ).lean<IBookingDocument>();
    if (!doc) {
      throw new BookingNotFoundError(bookingId);
    }
    return toBooking(doc);
  }

  async listAll(): Promise<Booking[]> {
    const docs = await BookingModel.find().sort(CREATION_ORDER).lean<IBookingDocument[]>();
    return docs.map(toBooking);
  }
}
