import mongoose, { Schema } from 'mongoose';
import type { Booking, BookingStatus } from '../types/booking';

export interface IBookingDocument {
  _id: string;
  userName: string;
  serviceId: string;
  date: string;
  time: string;
  status: BookingStatus;
  createdAt: Date;
}

const BookingSchema = new Schema<IBookingDocument>({
  _id: {
    type: String,
    required: true
  },
  userName: {
    type: String,
    required: true,
    trim: true
  },
  serviceId: {
    type: String,
    required: true,
    ref: 'Service'
  },
  date: {
    type: String,
    required: true,
    match: /^\d{4}-\d{2}-\d{2}$/
  },
  time: {
    type: String,
    required: true,
    match: /^(0[1-9]|1[0-2]):[0-5]\d (AM|PM)$/
  },
  status: {
    type: String,
    required: true,
    enum: ['confirmed', 'cancelled'],
    default: 'confirmed'
  },
  createdAt: {
    type: Date,
    required: true
  }
}, {
  collection: 'bookings',
  versionKey: false
});

// Slot exclusivity: at most one confirmed booking per (service, date, time).
BookingSchema.index(
  { serviceId: 1, date: 1, time: 1 },
  { unique: true, partialFilterExpression: { status: 'confirmed' } }
);
BookingSchema.index({ userName: 1, status: 1, createdAt: 1 });

export function toBooking(doc: IBookingDocument): Booking {
  return {
    id: doc._id,
    userName: doc.userName,
    serviceId: doc.serviceId,
    date: doc.date,
    time: doc.time,
    status: doc.status,
    createdAt: doc.createdAt
  };
}

export const BookingModel = mongoose.model<IBookingDocument>('Booking', BookingSchema);
export default BookingModel;
