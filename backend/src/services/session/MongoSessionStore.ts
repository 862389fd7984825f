import { v4 as uuidv4 } from 'uuid';
import ConversationSessionModel, {
  toConversationSession,
  toSessionDocument
} from '../../models/ConversationSession';
import type { IConversationSessionDocument } from '../../models/ConversationSession';
import type { ConversationSession } from '../../types/conversation';
import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { SessionNotFoundError } from '../../utils/errors';
import type { SessionStore } from './SessionStore';
import { newSession } from './SessionStore';

export class MongoSessionStore implements SessionStore {
  constructor(private readonly clock: Clock = systemClock) {}

  async create(): Promise<ConversationSession> {
    const session = newSession(uuidv4(), this.clock.now());
    await ConversationSessionModel.create(toSessionDocument(session));
    return session;
  }

  async get(sessionId: string): Promise<ConversationSession> {
    const doc = await ConversationSessionModel.findById(sessionId).lean<IConversationSessionDocument>();
    if (!doc) {
      throw new SessionNotFoundError(sessionId);
    }
    return toConversationSession(doc);
  }

  async save(session: ConversationSession): Promise<void> {
    const { _id, ...fields } = toSessionDocument(session);
    const result = await ConversationSessionModel.updateOne({ _id }, { $set: fields });
    if (result.matchedCount === 0) {
      throw new SessionNotFoundError(session.id);
    }
  }
}
