import mongoose, { Schema } from 'mongoose';
import { DIALOGUE_STATES } from '../types/conversation';
import type { ConversationSession, ConversationTurn, DialogueState } from '../types/conversation';
import type { Service } from '../types/booking';

export interface ISelectedServiceDocument {
  id: string;
  name: string;
  durationMinutes: number;
  price: number;
  availableSlots: string[];
  createdAt: Date;
}

export interface IConversationSessionDocument {
  _id: string;
  state: DialogueState;
  userName: string | null;
  selectedService: ISelectedServiceDocument | null;
  selectedDate: string | null;
  selectedTime: string | null;
  conversationHistory: ConversationTurn[];
  createdAt: Date;
}

const SelectedServiceSchema = new Schema<ISelectedServiceDocument>({
  id: { type: String, required: true },
  name: { type: String, required: true },
  durationMinutes: { type: Number, required: true },
  price: { type: Number, required: true },
  availableSlots: { type: [String], required: true },
  createdAt: { type: Date, required: true }
}, { _id: false });

const TurnSchema = new Schema<ConversationTurn>({
  speaker: {
    type: String,
    required: true,
    enum: ['user', 'assistant']
  },
  text: {
    type: String,
    default: ''
  },
  at: {
    type: Date,
    required: true
  }
}, { _id: false });

const ConversationSessionSchema = new Schema<IConversationSessionDocument>({
  _id: {
    type: String,
    required: true
  },
  state: {
    type: String,
    required: true,
    enum: [...DIALOGUE_STATES],
    default: 'greeting'
  },
  userName: {
    type: String,
    default: null
  },
  selectedService: {
    type: SelectedServiceSchema,
    default: null
  },
  selectedDate: {
    type: String,
    default: null
  },
  selectedTime: {
    type: String,
    default: null
  },
  conversationHistory: {
    type: [TurnSchema],
    default: []
  },
  createdAt: {
    type: Date,
    required: true
  }
}, {
  collection: 'conversation_sessions',
  versionKey: false
});

function toSelectedService(doc: ISelectedServiceDocument): Service {
  return {
    id: doc.id,
    name: doc.name,
    durationMinutes: doc.durationMinutes,
    price: doc.price,
    availableSlots: [...doc.availableSlots],
    createdAt: doc.createdAt
  };
}

export function toConversationSession(doc: IConversationSessionDocument): ConversationSession {
  return {
    id: doc._id,
    state: doc.state,
    userName: doc.userName,
    selectedService: doc.selectedService ? toSelectedService(doc.selectedService) : null,
    selectedDate: doc.selectedDate,
    selectedTime: doc.selectedTime,
    conversationHistory: doc.conversationHistory.map(turn => ({
      speaker: turn.speaker,
      text: turn.text,
      at: turn.at
    })),
    createdAt: doc.createdAt
  };
}

export function toSessionDocument(session: ConversationSession): IConversationSessionDocument {
  return {
    _id: session.id,
    state: session.state,
    userName: session.userName,
    selectedService: session.selectedService ? { ...session.selectedService } : null,
    selectedDate: session.selectedDate,
    selectedTime: session.selectedTime,
    conversationHistory: session.conversationHistory.map(turn => ({ ...turn })),
    createdAt: session.createdAt
  };
}

export const ConversationSessionModel = mongoose.model<IConversationSessionDocument>(
  'ConversationSession',
  ConversationSessionSchema
);
export default ConversationSessionModel;
