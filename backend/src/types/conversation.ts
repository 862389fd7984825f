import type { Service } from './booking';

export const DIALOGUE_STATES = [
  'greeting',
  'name',
  'service',
  'datetime',
  'confirmation',
  'completed',
  'ended'
] as const;

export type DialogueState = typeof DIALOGUE_STATES[number];

export type IntentLabel =
  | 'greeting'
  | 'booking'
  | 'availability'
  | 'cancel'
  | 'update'
  | 'show_bookings'
  | 'help'
  | 'confirm'
  | 'deny'
  | 'unknown';

export type Speaker = 'user' | 'assistant';

export interface ConversationTurn {
  speaker: Speaker;
  text: string;
  at: Date;
}

export interface ConversationSession {
  id: string;
  state: DialogueState;
  userName: string | null;
  selectedService: Service | null;
  selectedDate: string | null;
  selectedTime: string | null;
  conversationHistory: ConversationTurn[];
  createdAt: Date;
}

export interface SessionSnapshot {
  userName: string | null;
  selectedServiceName: string | null;
  selectedDate: string | null;
  selectedTime: string | null;
}

export function toSessionSnapshot(session: ConversationSession): SessionSnapshot {
  return {
    userName: session.userName,
    selectedServiceName: session.selectedService ? session.selectedService.name : null,
    selectedDate: session.selectedDate,
    selectedTime: session.selectedTime
  };
}
