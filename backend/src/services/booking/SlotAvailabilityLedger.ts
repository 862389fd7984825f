import type { Booking } from '../../types/booking';

/**
 * Authoritative record of bookings. No two confirmed bookings may share a
 * (serviceId, date, time) slot; `confirm` is the only way to claim one.
 */
export interface SlotAvailabilityLedger {
  isAvailable(serviceId: string, date: string, time: string): Promise<boolean>;
  /** Fails with SlotConflictError when the slot already holds a confirmed booking. */
  confirm(userName: string, serviceId: string, date: string, time: string): Promise<Booking>;
  /** Cancels every confirmed booking of the user and returns them, oldest first. */
  cancelAllForUser(userName: string): Promise<Booking[]>;
  /** Oldest first. */
  listConfirmedForUser(userName: string): Promise<Booking[]>;
  /** Fails with BookingNotFoundError. Cancelling twice is harmless. */
  cancel(bookingId: string): Promise<Booking>;
  listAll(): Promise<Booking[]>;
}

export function slotKey(serviceId: string, date: string, time: string): string {
  return `${serviceId}|${date}|${time}`;
}
