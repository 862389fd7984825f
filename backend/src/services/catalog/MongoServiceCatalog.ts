import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import ServiceModel, { toService } from '../../models/Service';
import type { IServiceDocument } from '../../models/Service';
import type { NewService, Service } from '../../types/booking';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { DuplicateServiceError } from '../../utils/errors';
import type { ServiceCatalog } from './ServiceCatalog';
import { parseNewService } from './ServiceCatalog';

export class MongoServiceCatalog implements ServiceCatalog {
  constructor(private readonly clock: Clock = systemClock) {}

  async listAll(): Promise<Service[]> {
    const docs = await ServiceModel.find().sort({ createdAt: 1, _id: 1 }).lean<IServiceDocument[]>();
    return docs.map(toService);
  }

  async get(serviceId: string): Promise<Service | null> {
    const doc = await ServiceModel.findById(serviceId).lean<IServiceDocument>();
    return doc ? toService(doc) : null;
  }

  async findByName(name: string): Promise<Service | null> {
    const doc = await ServiceModel.findOne({ nameKey: name.trim().toLowerCase() }).lean<IServiceDocument>();
    return doc ? toService(doc) : null;
  }

  async add(input: NewService): Promise<Service> {
    const data = parseNewService(input);

    try {
      const created = await ServiceModel.create({
        _id: uuidv4(),
        ...data,
        nameKey: data.name.toLowerCase(),
        createdAt: this.clock.now()
      });
      return toService(created.toObject());
    } catch (error) {
      if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
        throw new DuplicateServiceError(data.name);
      }
      throw error;
    }
  }
}
