import type { AppConfig, DateFallbackPolicy } from '../src/config';
import { createAssistant, createRepositories } from '../src/container';
import type { DateTimeParser } from '../src/services/ai/DateTimeParser';
import type { BookingAssistant } from '../src/services/ai/BookingAssistant';
import { seedCatalog } from '../src/services/catalog/defaultServices';
import type { Clock } from '../src/utils/clock';

// Monday
export const REFERENCE_NOW = new Date('2026-10-19T12:00:00Z');
export const TOMORROW = '2026-10-20';

export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date = REFERENCE_NOW) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advanceMinutes(minutes: number): void {
    this.current += minutes * 60_000;
  }
}

export function testConfig(dateFallback: DateFallbackPolicy = 'reprompt'): AppConfig {
  return {
    port: 0,
    nodeEnv: 'test',
    logLevel: 'silent',
    storage: 'memory',
    assistant: {
      businessName: 'Slotline',
      timezone: 'UTC',
      dateFallback
    }
  };
}

export async function buildTestAssistant(options: {
  parser?: DateTimeParser;
  dateFallback?: DateFallbackPolicy;
  clock?: Clock;
} = {}) {
  const clock = options.clock ?? new FixedClock();
  const config = testConfig(options.dateFallback);
  const repositories = createRepositories(config, clock);
  const { assistant } = createAssistant(config, { clock, parser: options.parser, repositories });
  await seedCatalog(repositories.catalog);
  return { assistant, clock, ...repositories };
}

/** Starts a session and walks it to the `datetime` state for the given service. */
export async function reachDateTime(
  assistant: BookingAssistant,
  name: string,
  service: string = 'Haircut'
): Promise<string> {
  const { sessionId } = await assistant.startSession();
  await assistant.sendMessage(sessionId, 'Hi');
  await assistant.sendMessage(sessionId, `my name is ${name}`);
  await assistant.sendMessage(sessionId, service);
  return sessionId;
}
