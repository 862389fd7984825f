export type BookingStatus = 'confirmed' | 'cancelled';

export interface Service {
  id: string;
  name: string;
  durationMinutes: number;
  price: number;
  availableSlots: string[];
  createdAt: Date;
}

export interface NewService {
  name: string;
  durationMinutes: number;
  price: number;
  availableSlots: string[];
}

export interface Booking {
  id: string;
  userName: string;
  serviceId: string;
  date: string;
  time: string;
  status: BookingStatus;
  createdAt: Date;
}

export interface BookingView extends Booking {
  serviceName: string | null;
}
