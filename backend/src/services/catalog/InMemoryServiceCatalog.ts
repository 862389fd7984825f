import { v4 as uuidv4 } from 'uuid';
import type { NewService, Service } from '../../types/booking';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { DuplicateServiceError } from '../../utils/errors';
import type { ServiceCatalog } from './ServiceCatalog';
import { parseNewService, sameServiceName } from './ServiceCatalog';

function copyService(service: Service): Service {
  return { ...service, availableSlots: [...service.availableSlots] };
}

export class InMemoryServiceCatalog implements ServiceCatalog {
  private readonly services: Service[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  async listAll(): Promise<Service[]> {
    return this.services.map(copyService);
  }

  async get(serviceId: string): Promise<Service | null> {
    const service = this.services.find(s => s.id === serviceId);
    return service ? copyService(service) : null;
  }

  async findByName(name: string): Promise<Service | null> {
    const service = this.services.find(s => sameServiceName(s.name, name));
    return service ? copyService(service) : null;
  }

  async add(input: NewService): Promise<Service> {
    const data = parseNewService(input);
    if (this.services.some(s => sameServiceName(s.name, data.name))) {
      throw new DuplicateServiceError(data.name);
    }

    const service: Service = {
      id: uuidv4(),
      ...data,
      createdAt: this.clock.now()
    };
    this.services.push(service);
    return copyService(service);
  }
}
