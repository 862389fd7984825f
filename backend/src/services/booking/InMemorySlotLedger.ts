import { v4 as uuidv4 } from 'uuid';
import type { Booking } from '../../types/booking';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { BookingNotFoundError, SlotConflictError } from '../../utils/errors';
import { KeyedMutex } from '../../utils/KeyedMutex';
import type { SlotAvailabilityLedger } from './SlotAvailabilityLedger';
import { slotKey } from './SlotAvailabilityLedger';

export class InMemorySlotLedger implements SlotAvailabilityLedger {
  // Insertion order is creation order.
  private readonly bookings: Booking[] = [];
  private readonly slotLocks = new KeyedMutex();

  constructor(private readonly clock: Clock = systemClock) {}

  async isAvailable(serviceId: string, date: string, time: string): Promise<boolean> {
    return !this.findConfirmed(serviceId, date, time);
  }

  async confirm(userName: string, serviceId: string, date: string, time: string): Promise<Booking> {
    return this.slotLocks.runExclusive(slotKey(serviceId, date, time), async () => {
      if (this.findConfirmed(serviceId, date, time)) {
        throw new SlotConflictError(serviceId, date, time);
      }

      const booking: Booking = {
        id: uuidv4(),
        userName,
        serviceId,
        date,
        time,
        status: 'confirmed',
        createdAt: this.clock.now()
      };
      this.bookings.push(booking);
      return { ...booking };
    });
  }

  async cancelAllForUser(userName: string): Promise<Booking[]> {
    const cancelled: Booking[] = [];
    for (const booking of this.bookings) {
      if (booking.userName === userName && booking.status === 'confirmed') {
        booking.status = 'cancelled';
        cancelled.push({ ...booking });
      }
    }
    return cancelled;
  }

  async listConfirmedForUser(userName: string): Promise<Booking[]> {
    return this.bookings
      .filter(b => b.userName === userName && b.status === 'confirmed')
      .map(b => ({ ...b }));
  }

  async cancel(bookingId: string): Promise<Booking> {
    const booking = this.bookings.find(b => b.id === bookingId);
    if (!booking) {
      throw new BookingNotFoundError(bookingId);
    }
    booking.status = 'cancelled';
    return { ...booking };
  }

  async listAll(): Promise<Booking[]> {
    return this.bookings.map(b => ({ ...b }));
  }

  private findConfirmed(serviceId: string, date: string, time: string): Booking | undefined {
    return this.bookings.find(b =>
      b.status === 'confirmed' &&
      b.serviceId === serviceId &&
      b.date === date &&
      b.time === time
    );
  }
}
