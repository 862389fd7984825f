import { z } from 'zod';
import type { NewService, Service } from '../../types/booking';
import { normalizeSlotLabel } from '../../utils/timeLabels';
import { ValidationError } from '../../utils/errors';

export interface ServiceCatalog {
  /** Every service, oldest first. */
  listAll(): Promise<Service[]>;
  get(serviceId: string): Promise<Service | null>;
  /** Case-insensitive exact name lookup. */
  findByName(name: string): Promise<Service | null>;
  /** Fails with DuplicateServiceError when the name is taken. */
  add(input: NewService): Promise<Service>;
}

export const newServiceSchema = z.object({
  name: z.string().trim().min(1, 'Service name is required'),
  durationMinutes: z.number().int('Duration must be whole minutes').positive('Duration must be positive'),
  price: z.number().nonnegative('Price cannot be negative'),
  availableSlots: z.array(z.string()).min(1, 'At least one slot is required')
});

/**
 * Validates untrusted service input and canonicalises its slot labels,
 * dropping repeats while keeping the given order.
 */
export function parseNewService(input: unknown): NewService {
  const parsed = newServiceSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid service', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const slots: string[] = [];
  for (const raw of parsed.data.availableSlots) {
    const label = normalizeSlotLabel(raw);
    if (!label) {
      throw new ValidationError(`Invalid slot "${raw}", expected a time like "09:00 AM"`, { slot: raw });
    }
    if (!slots.includes(label)) {
      slots.push(label);
    }
  }

  return { ...parsed.data, availableSlots: slots };
}

export function sameServiceName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
