import { log } from './logger';
import type { Logger } from './logger';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/**
 * Wraps a clock so a failing read falls back to system time instead of
 * aborting the turn that asked for it.
 */
export function guardedClock(clock: Clock, logger: Logger = log): Clock {
  return {
    now: () => {
      try {
        return clock.now();
      } catch (error) {
        logger.warn({ err: error }, 'Clock unavailable, falling back to system time');
        return new Date();
      }
    }
  };
}
