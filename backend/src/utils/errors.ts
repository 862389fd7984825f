export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly meta: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    statusCode: number = 500,
    meta: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.meta = meta;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super('Session not found', 'SESSION_NOT_FOUND', 404, { sessionId });
  }
}

export class ServiceNotFoundError extends AppError {
  constructor(serviceId: string) {
    super('Service not found', 'SERVICE_NOT_FOUND', 404, { serviceId });
  }
}

export class BookingNotFoundError extends AppError {
  constructor(bookingId: string) {
    super('Booking not found', 'BOOKING_NOT_FOUND', 404, { bookingId });
  }
}

export class SlotConflictError extends AppError {
  constructor(serviceId: string, date: string, time: string) {
    super('Time slot is not available', 'SLOT_CONFLICT', 409, { serviceId, date, time });
  }
}

export class DuplicateServiceError extends AppError {
  constructor(name: string) {
    super(`A service named "${name}" already exists`, 'DUPLICATE_SERVICE', 409, { name });
  }
}

export class ValidationError extends AppError {
  constructor(message: string, meta: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', 400, meta);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Illegal dialogue transition ${from} -> ${to}`, 'INVALID_TRANSITION', 500, { from, to });
  }
}

export class ConfigError extends AppError {
  constructor(message: string, meta: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', 500, meta);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
