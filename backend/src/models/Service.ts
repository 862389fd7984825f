import mongoose, { Schema } from 'mongoose';
import type { Service } from '../types/booking';

export interface IServiceDocument {
  _id: string;
  name: string;
  nameKey: string;
  durationMinutes: number;
  price: number;
  availableSlots: string[];
  createdAt: Date;
}

const ServiceSchema = new Schema<IServiceDocument>({
  _id: {
    type: String,
    required: true
  },
  name: {
    type: String,
    required: true,
    trim: true
  },
  nameKey: {
    type: String,
    required: true
  },
  durationMinutes: {
    type: Number,
    required: true,
    min: 1
  },
  price: {
    type: Number,
    required: true,
    min: 0
  },
  availableSlots: {
    type: [String],
    required: true,
    validate: {
      validator: (slots: string[]) => slots.length > 0,
      message: 'A service needs at least one slot'
    }
  },
  createdAt: {
    type: Date,
    required: true
  }
}, {
  collection: 'services',
  versionKey: false
});

ServiceSchema.index({ nameKey: 1 }, { unique: true });
ServiceSchema.index({ createdAt: 1 });

export function toService(doc: IServiceDocument): Service {
  return {
    id: doc._id,
    name: doc.name,
    durationMinutes: doc.durationMinutes,
    price: doc.price,
    availableSlots: [...doc.availableSlots],
    createdAt: doc.createdAt
  };
}

export const ServiceModel = mongoose.model<IServiceDocument>('Service', ServiceSchema);
export default ServiceModel;
