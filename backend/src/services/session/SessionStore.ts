import type { ConversationSession } from '../../types/conversation';

/**
 * Owns conversation sessions. `get` hands out a copy; changes only become
 * visible to the next reader once they are passed to `save`.
 */
export interface SessionStore {
  create(): Promise<ConversationSession>;
  /** Fails with SessionNotFoundError. */
  get(sessionId: string): Promise<ConversationSession>;
  save(session: ConversationSession): Promise<void>;
}

export function newSession(id: string, createdAt: Date): ConversationSession {
  return {
    id,
    state: 'greeting',
    userName: null,
    selectedService: null,
    selectedDate: null,
    selectedTime: null,
    conversationHistory: [],
    createdAt
  };
}
