import type { AppConfig } from './config';
import { InMemorySlotLedger } from './services/booking/InMemorySlotLedger';
import { MongoSlotLedger } from './services/booking/MongoSlotLedger';
import type { SlotAvailabilityLedger } from './services/booking/SlotAvailabilityLedger';
import { InMemoryServiceCatalog } from './services/catalog/InMemoryServiceCatalog';
import { MongoServiceCatalog } from './services/catalog/MongoServiceCatalog';
import type { ServiceCatalog } from './services/catalog/ServiceCatalog';
import { InMemorySessionStore } from './services/session/InMemorySessionStore';
import { MongoSessionStore } from './services/session/MongoSessionStore';
import type { SessionStore } from './services/session/SessionStore';
import { BookingAssistant } from './services/ai/BookingAssistant';
import { RuleBasedDateTimeParser } from './services/ai/DateTimeParser';
import type { DateTimeParser } from './services/ai/DateTimeParser';
import { DialogueStateMachine } from './services/ai/DialogueStateMachine';
import { IntentClassifier } from './services/ai/IntentClassifier';
import type { Clock } from './utils/clock';
import { guardedClock, systemClock } from './utils/clock';

export interface Repositories {
  sessions: SessionStore;
  catalog: ServiceCatalog;
  ledger: SlotAvailabilityLedger;
}

export interface AssistantOverrides {
  clock?: Clock;
  parser?: DateTimeParser;
  classifier?: IntentClassifier;
  repositories?: Repositories;
}

export function createRepositories(config: AppConfig, sourceClock: Clock = systemClock): Repositories {
  const clock = guardedClock(sourceClock);
  if (config.storage === 'mongo') {
    return {
      sessions: new MongoSessionStore(clock),
      catalog: new MongoServiceCatalog(clock),
      ledger: new MongoSlotLedger(clock)
    };
  }
  return {
    sessions: new InMemorySessionStore(clock),
    catalog: new InMemoryServiceCatalog(clock),
    ledger: new InMemorySlotLedger(clock)
  };
}

export function createAssistant(config: AppConfig, overrides: AssistantOverrides = {}): {
  assistant: BookingAssistant;
  repositories: Repositories;
} {
  const clock = guardedClock(overrides.clock ?? systemClock);
  const repositories = overrides.repositories ?? createRepositories(config, clock);
  const dialogue = new DialogueStateMachine(
    {
      catalog: repositories.catalog,
      ledger: repositories.ledger,
      parser: overrides.parser ?? new RuleBasedDateTimeParser(config.assistant.timezone),
      clock,
      classifier: overrides.classifier ?? new IntentClassifier()
    },
    config.assistant
  );

  const assistant = new BookingAssistant({ ...repositories, dialogue, clock });
  return { assistant, repositories };
}
