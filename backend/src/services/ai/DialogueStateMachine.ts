import { DateTime } from 'luxon';
import type { Booking, Service } from '../../types/booking';
import type { ConversationSession, DialogueState, IntentLabel } from '../../types/conversation';
import type { DateFallbackPolicy } from '../../config';
import type { Clock } from '../../utils/clock';
import { InvalidTransitionError, SlotConflictError } from '../../utils/errors';
import { log } from '../../utils/logger';
import type { Logger } from '../../utils/logger';
import { formatPrice } from '../../utils/timeLabels';
import type { SlotAvailabilityLedger } from '../booking/SlotAvailabilityLedger';
import type { ServiceCatalog } from '../catalog/ServiceCatalog';
import type { DateTimeParser, ParsedDateTime } from './DateTimeParser';
import { IntentClassifier } from './IntentClassifier';
import { extractName } from './NameExtractor';

/** Edges a session may take besides staying where it is. */
export const DIALOGUE_TRANSITIONS: Readonly<Record<DialogueState, readonly DialogueState[]>> = {
  greeting: ['name', 'datetime', 'ended'],
  name: ['service', 'greeting', 'datetime', 'ended'],
  service: ['datetime', 'greeting', 'ended'],
  datetime: ['confirmation', 'service', 'greeting', 'ended'],
  confirmation: ['completed', 'service', 'datetime', 'greeting', 'ended'],
  completed: ['greeting', 'datetime', 'ended'],
  ended: []
};

export function canTransition(from: DialogueState, to: DialogueState): boolean {
  return from === to || DIALOGUE_TRANSITIONS[from].includes(to);
}

export interface DialogueOptions {
  businessName: string;
  /** Zone used to work out "tomorrow" for the next-day fallback. */
  timezone: string;
  dateFallback: DateFallbackPolicy;
}

export interface DialogueDependencies {
  catalog: ServiceCatalog;
  ledger: SlotAvailabilityLedger;
  parser: DateTimeParser;
  clock: Clock;
  classifier?: IntentClassifier;
}

type ActiveState = Exclude<DialogueState, 'ended'>;

type StateHandler = (
  session: ConversationSession,
  input: string,
  intent: IntentLabel,
  logger: Logger
) => Promise<string>;

const SESSION_ENDED_REPLY = 'The session has ended. Please start a new session to continue.';
const DATETIME_REPROMPT = "I couldn't understand the date and time. Please try something like 'tomorrow at 2 PM'.";
const FALLBACK_TIME_LABEL = '09:00 AM';

/**
 * Drives one conversation turn: goodbye first, then the global intents
 * (show bookings, cancel, update), then the handler of the current state.
 * Mutates the session it is given and returns the reply text.
 */
export class DialogueStateMachine {
  private readonly catalog: ServiceCatalog;
  private readonly ledger: SlotAvailabilityLedger;
  private readonly parser: DateTimeParser;
  private readonly clock: Clock;
  private readonly classifier: IntentClassifier;
  private readonly handlers: Record<ActiveState, StateHandler>;

  constructor(dependencies: DialogueDependencies, private readonly options: DialogueOptions) {
    this.catalog = dependencies.catalog;
    this.ledger = dependencies.ledger;
    this.parser = dependencies.parser;
    this.clock = dependencies.clock;
    this.classifier = dependencies.classifier ?? new IntentClassifier();
    this.handlers = {
      greeting: session => this.handleGreeting(session),
      name: (session, input) => this.handleName(session, input),
      service: (session, input) => this.handleService(session, input),
      datetime: (session, input, _intent, logger) => this.handleDateTime(session, input, logger),
      confirmation: (session, _input, intent, logger) => this.handleConfirmation(session, intent, logger),
      completed: async () => this.getCompletedMessage()
    };
  }

  openingMessage(): string {
    return `Welcome to ${this.options.businessName}! Say hi to get started.`;
  }

  async handle(session: ConversationSession, input: string, logger: Logger = log): Promise<string> {
    if (this.classifier.isGoodbye(input)) {
      this.transition(session, 'ended');
      return `Goodbye! Thank you for using ${this.options.businessName}. Have a great day!`;
    }

    const state = session.state;
    if (state === 'ended') {
      return SESSION_ENDED_REPLY;
    }

    const intent = this.classifier.classify(input);
    logger.debug({ state, intent }, 'Intent classified');

    switch (intent) {
      case 'show_bookings':
        return this.showBookings(session);
      case 'cancel':
        return this.cancelBookings(session, logger);
      case 'update':
        return this.updateBooking(session, logger);
      default:
        return this.handlers[state](session, input, intent, logger);
    }
  }

  private transition(session: ConversationSession, to: DialogueState): void {
    if (!canTransition(session.state, to)) {
      throw new InvalidTransitionError(session.state, to);
    }
    session.state = to;
  }

  private clearSelection(session: ConversationSession): void {
    session.selectedService = null;
    session.selectedDate = null;
    session.selectedTime = null;
  }

  // Global intents

  private async showBookings(session: ConversationSession): Promise<string> {
    const bookings = session.userName ? await this.ledger.listConfirmedForUser(session.userName) : [];
    if (bookings.length === 0) {
      return 'You have no active bookings.';
    }

    const lines: string[] = [];
    for (const booking of bookings) {
      lines.push(`- ${await this.serviceName(booking)} on ${booking.date} at ${booking.time}`);
    }
    return `Here are your current bookings:\n${lines.join('\n')}`;
  }

  private async cancelBookings(session: ConversationSession, logger: Logger): Promise<string> {
    const cancelled = session.userName ? await this.ledger.cancelAllForUser(session.userName) : [];
    if (cancelled.length === 0) {
      return 'You have no active bookings to cancel.';
    }

    logger.info({ bookingIds: cancelled.map(b => b.id) }, 'Bookings cancelled by caller');
    this.clearSelection(session);
    this.transition(session, 'greeting');
    return 'Your bookings have been cancelled successfully.';
  }

  private async updateBooking(session: ConversationSession, logger: Logger): Promise<string> {
    const startOver = "You have no bookings to update. Let's create a new booking.";
    if (!session.userName) {
      return startOver;
    }

    const [first] = await this.ledger.listConfirmedForUser(session.userName);
    if (!first) {
      return startOver;
    }

    const service = await this.catalog.get(first.serviceId);
    if (!service) {
      logger.warn({ bookingId: first.id, serviceId: first.serviceId }, 'Booking refers to an unknown service');
      return startOver;
    }

    await this.ledger.cancel(first.id);
    logger.info({ bookingId: first.id }, 'Booking released for rescheduling');

    session.selectedService = service;
    session.selectedDate = null;
    session.selectedTime = null;
    this.transition(session, 'datetime');
    return `Your previous booking is cancelled. Let's book a new slot for ${service.name}. Which date and time do you prefer?`;
  }

  // State handlers

  private async handleGreeting(session: ConversationSession): Promise<string> {
    this.transition(session, 'name');
    return `Welcome to ${this.options.businessName}! I'm your booking assistant. What's your name?`;
  }

  private async handleName(session: ConversationSession, input: string): Promise<string> {
    const name = extractName(input);
    if (!name) {
      return "I didn't catch your name. Could you tell me again?";
    }

    session.userName = name;
    this.transition(session, 'service');
    const services = await this.catalog.listAll();
    return `Nice to meet you, ${name}! ${this.getServiceSelectionMessage(services)}`;
  }

  private async handleService(session: ConversationSession, input: string): Promise<string> {
    const services = await this.catalog.listAll();
    const lowered = input.toLowerCase();
    const selected = services.find(s => lowered.includes(s.name.toLowerCase()));

    if (!selected) {
      const names = services.map(s => s.name).join(', ');
      return `I didn't recognize that service. Available services: ${names}. Which one would you like?`;
    }

    session.selectedService = selected;
    this.transition(session, 'datetime');
    return `Great choice! ${selected.name} costs $${formatPrice(selected.price)} and takes ${selected.durationMinutes} minutes.\n` +
           `Available slots: ${selected.availableSlots.join(', ')}\n` +
           `What date and time would you prefer? (e.g., 'tomorrow at 2 PM')`;
  }

  private async handleDateTime(session: ConversationSession, input: string, logger: Logger): Promise<string> {
    const service = session.selectedService;
    if (!service) {
      this.transition(session, 'service');
      return 'Which service would you like to book?';
    }

    const parsed = this.resolveDateTime(input, logger);
    if (!parsed) {
      return DATETIME_REPROMPT;
    }

    const { date, timeLabel } = parsed;
    if (this.isPastDate(date)) {
      return `Sorry, ${date} has already passed. Which upcoming date and time would you like?`;
    }

    if (!service.availableSlots.includes(timeLabel)) {
      return `Sorry, ${service.name} isn't offered at ${timeLabel}. Please choose from: ${service.availableSlots.join(', ')}`;
    }

    if (!(await this.ledger.isAvailable(service.id, date, timeLabel))) {
      return this.getTakenMessage(service, date, timeLabel, await this.openSlots(service, date));
    }

    session.selectedDate = date;
    session.selectedTime = timeLabel;
    this.transition(session, 'confirmation');
    return `Perfect! Here's your booking:\n\n` +
           `Name: ${session.userName ?? ''}\n` +
           `Service: ${service.name}\n` +
           `Date: ${date}\n` +
           `Time: ${timeLabel}\n` +
           `Duration: ${service.durationMinutes} minutes\n` +
           `Price: $${formatPrice(service.price)}\n\n` +
           `Shall I confirm this booking?`;
  }

  private async handleConfirmation(
    session: ConversationSession,
    intent: IntentLabel,
    logger: Logger
  ): Promise<string> {
    if (intent === 'deny') {
      this.clearSelection(session);
      this.transition(session, 'service');
      return "No problem! Let's start over. Which service would you like?";
    }

    if (intent !== 'confirm') {
      return "Please say 'yes' to confirm or 'no' to start over.";
    }

    const { userName, selectedService, selectedDate, selectedTime } = session;
    if (!userName || !selectedService || !selectedDate || !selectedTime) {
      this.clearSelection(session);
      this.transition(session, 'service');
      return "Some booking details went missing. Let's start over. Which service would you like?";
    }

    let booking: Booking;
    try {
      booking = await this.ledger.confirm(userName, selectedService.id, selectedDate, selectedTime);
    } catch (error) {
      if (error instanceof SlotConflictError) {
        logger.info({ serviceId: selectedService.id, date: selectedDate, time: selectedTime }, 'Slot taken before confirmation');
        session.selectedDate = null;
        session.selectedTime = null;
        this.transition(session, 'datetime');
        return `Sorry, ${selectedTime} on ${selectedDate} was just booked by someone else. Which other date and time would you like?`;
      }
      throw error;
    }

    logger.info({ bookingId: booking.id }, 'Booking confirmed');
    this.transition(session, 'completed');
    return `Excellent! Your booking is confirmed!\n` +
           `Booking ID: ${booking.id.slice(0, 8)}\n` +
           `Service: ${selectedService.name}\n` +
           `Date: ${selectedDate}\n` +
           `Time: ${selectedTime}\n` +
           `Thank you for booking with ${this.options.businessName}!`;
  }

  // Helpers

  private resolveDateTime(input: string, logger: Logger): ParsedDateTime | null {
    try {
      return this.parser.parseDateTime(input, this.clock.now());
    } catch (error) {
      logger.warn({ err: error, policy: this.options.dateFallback }, 'Date/time parsing failed');
      return this.options.dateFallback === 'next-day-9am' ? this.nextDayDefault(logger) : null;
    }
  }

  private nextDayDefault(logger: Logger): ParsedDateTime | null {
    try {
      const date = DateTime.fromJSDate(this.clock.now(), { zone: this.options.timezone })
        .plus({ days: 1 })
        .toISODate();
      return date ? { date, timeLabel: FALLBACK_TIME_LABEL } : null;
    } catch (error) {
      logger.warn({ err: error }, 'Clock unavailable for the next-day fallback');
      return null;
    }
  }

  private isPastDate(date: string): boolean {
    const today = DateTime.fromJSDate(this.clock.now(), { zone: this.options.timezone }).toISODate();
    // ISO dates compare chronologically as strings.
    return today !== null && date < today;
  }

  private async openSlots(service: Service, date: string): Promise<string[]> {
    const open: string[] = [];
    for (const slot of service.availableSlots) {
      if (await this.ledger.isAvailable(service.id, date, slot)) {
        open.push(slot);
      }
    }
    return open;
  }

  private async serviceName(booking: Booking): Promise<string> {
    const service = await this.catalog.get(booking.serviceId);
    return service ? service.name : 'Unknown service';
  }

  private getServiceSelectionMessage(services: Service[]): string {
    if (services.length === 0) {
      return 'Sorry, no services are available at the moment.';
    }

    const serviceList = services
      .map(s => `- ${s.name} ($${formatPrice(s.price)}, ${s.durationMinutes} min)`)
      .join('\n');
    return `Here are our available services:\n${serviceList}\n\nWhich service would you like to book?`;
  }

  private getTakenMessage(service: Service, date: string, time: string, open: string[]): string {
    if (open.length === 0) {
      return `Sorry, ${time} on ${date} is already booked, and ${service.name} has no other openings that day. Please pick another date.`;
    }
    return `Sorry, ${time} on ${date} is already booked. Still open that day: ${open.join(', ')}`;
  }

  private getCompletedMessage(): string {
    return "Your booking is all set. Say 'my bookings' to review it, 'change' to pick a new time, or 'cancel' to cancel it. " +
           'To make another booking, please start a new session.';
  }
}
