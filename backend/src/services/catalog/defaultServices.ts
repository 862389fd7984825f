import type { NewService } from '../../types/booking';
import type { ServiceCatalog } from './ServiceCatalog';

export const DEFAULT_SERVICES: NewService[] = [
  {
    name: 'Haircut',
    durationMinutes: 30,
    price: 25,
    availableSlots: ['09:00 AM', '10:00 AM', '11:00 AM', '02:00 PM', '03:00 PM', '04:00 PM']
  },
  {
    name: 'Consultation',
    durationMinutes: 60,
    price: 50,
    availableSlots: ['09:00 AM', '11:00 AM', '02:00 PM', '04:00 PM']
  },
  {
    name: 'Massage',
    durationMinutes: 90,
    price: 80,
    availableSlots: ['09:00 AM', '11:00 AM', '02:00 PM']
  }
];

/** Adds the default services to an empty catalog; a populated one is left alone. */
export async function seedCatalog(
  catalog: ServiceCatalog,
  services: NewService[] = DEFAULT_SERVICES
): Promise<number> {
  const existing = await catalog.listAll();
  if (existing.length > 0) {
    return 0;
  }

  for (const service of services) {
    await catalog.add(service);
  }
  return services.length;
}
