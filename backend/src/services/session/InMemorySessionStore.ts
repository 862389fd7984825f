import { v4 as uuidv4 } from 'uuid';
import type { ConversationSession } from '../../types/conversation';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { SessionNotFoundError } from '../../utils/errors';
import type { SessionStore } from './SessionStore';
import { newSession } from './SessionStore';

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  constructor(private readonly clock: Clock = systemClock) {}

  async create(): Promise<ConversationSession> {
    const session = newSession(uuidv4(), this.clock.now());
    this.sessions.set(session.id, structuredClone(session));
    return session;
  }

  async get(sessionId: string): Promise<ConversationSession> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return structuredClone(session);
  }

  async save(session: ConversationSession): Promise<void> {
    if (!this.sessions.has(session.id)) {
      throw new SessionNotFoundError(session.id);
    }
    this.sessions.set(session.id, structuredClone(session));
  }
}
