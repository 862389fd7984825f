import type { BookingView, Booking, NewService, Service } from '../../types/booking';
import { toSessionSnapshot } from '../../types/conversation';
import type { ConversationTurn, DialogueState, SessionSnapshot } from '../../types/conversation';
import type { Clock } from '../../utils/clock';
import { ServiceNotFoundError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { SlotAvailabilityLedger } from '../booking/SlotAvailabilityLedger';
import type { ServiceCatalog } from '../catalog/ServiceCatalog';
import { parseNewService } from '../catalog/ServiceCatalog';
import type { SessionStore } from '../session/SessionStore';
import { KeyedMutex } from '../../utils/KeyedMutex';
import type { DialogueStateMachine } from './DialogueStateMachine';

export interface StartSessionResult {
  sessionId: string;
  greetingText: string;
  state: DialogueState;
}

export interface SendMessageResult {
  replyText: string;
  state: DialogueState;
  sessionSnapshot: SessionSnapshot;
}

export interface SessionDetails extends SessionSnapshot {
  sessionId: string;
  state: DialogueState;
  conversationHistory: ConversationTurn[];
  createdAt: Date;
}

export interface BookingAssistantDependencies {
  sessions: SessionStore;
  catalog: ServiceCatalog;
  ledger: SlotAvailabilityLedger;
  dialogue: DialogueStateMachine;
  clock: Clock;
}

/**
 * Entry point for the transport layer. Each `sendMessage` call is one turn,
 * run under the session's lock so that turns of one session never interleave.
 */
export class BookingAssistant {
  private readonly sessions: SessionStore;
  private readonly catalog: ServiceCatalog;
  private readonly ledger: SlotAvailabilityLedger;
  private readonly dialogue: DialogueStateMachine;
  private readonly clock: Clock;
  private readonly sessionLocks = new KeyedMutex();

  constructor(dependencies: BookingAssistantDependencies) {
    this.sessions = dependencies.sessions;
    this.catalog = dependencies.catalog;
    this.ledger = dependencies.ledger;
    this.dialogue = dependencies.dialogue;
    this.clock = dependencies.clock;
  }

  async startSession(): Promise<StartSessionResult> {
    const session = await this.sessions.create();
    createLogger({ sessionId: session.id }).info('Session started');
    return {
      sessionId: session.id,
      greetingText: this.dialogue.openingMessage(),
      state: session.state
    };
  }

  async sendMessage(sessionId: string, text: string): Promise<SendMessageResult> {
    return this.sessionLocks.runExclusive(sessionId, async () => {
      const logger = createLogger({ sessionId });
      const session = await this.sessions.get(sessionId);
      const message = text.trim();
      const previousState = session.state;

      const reply = await this.dialogue.handle(session, message, logger);

      const at = this.clock.now();
      session.conversationHistory.push(
        { speaker: 'user', text: message, at },
        { speaker: 'assistant', text: reply, at }
      );
      await this.sessions.save(session);

      if (session.state !== previousState) {
        logger.info({ from: previousState, to: session.state }, 'Dialogue state changed');
      }

      return {
        replyText: reply,
        state: session.state,
        sessionSnapshot: toSessionSnapshot(session)
      };
    });
  }

  async getSession(sessionId: string): Promise<SessionDetails> {
    const session = await this.sessions.get(sessionId);
    return {
      sessionId: session.id,
      state: session.state,
      ...toSessionSnapshot(session),
      conversationHistory: session.conversationHistory,
      createdAt: session.createdAt
    };
  }

  async listServices(): Promise<Service[]> {
    return this.catalog.listAll();
  }

  async getService(serviceId: string): Promise<Service> {
    const service = await this.catalog.get(serviceId);
    if (!service) {
      throw new ServiceNotFoundError(serviceId);
    }
    return service;
  }

  async addService(input: unknown): Promise<Service> {
    const service: NewService = parseNewService(input);
    return this.catalog.add(service);
  }

  async listBookings(): Promise<BookingView[]> {
    const [bookings, services] = await Promise.all([this.ledger.listAll(), this.catalog.listAll()]);
    const names = new Map(services.map(s => [s.id, s.name]));
    return bookings.map(booking => ({
      ...booking,
      serviceName: names.get(booking.serviceId) ?? null
    }));
  }

  async cancelBooking(bookingId: string): Promise<Booking> {
    const booking = await this.ledger.cancel(bookingId);
    createLogger({ bookingId }).info('Booking cancelled by management');
    return booking;
  }
}
