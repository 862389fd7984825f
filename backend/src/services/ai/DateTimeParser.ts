import { DateTime } from 'luxon';
import { formatTimeLabel, to24Hour } from '../../utils/timeLabels';

export interface ParsedDateTime {
  /** `YYYY-MM-DD` */
  date: string;
  /** Canonical slot label, `hh:mm AM|PM`. */
  timeLabel: string;
}

/**
 * Turns free text such as "tomorrow at 2 PM" into a calendar date and a slot
 * label. Returns null when no time of day can be read from the text.
 */
export interface DateTimeParser {
  parseDateTime(text: string, referenceNow: Date): ParsedDateTime | null;
}

interface ClockTime {
  hour: number;
  minute: number;
}

interface DateRule {
  pattern: RegExp;
  resolve(match: RegExpMatchArray, today: DateTime): DateTime | null;
}

interface TimeRule {
  pattern: RegExp;
  resolve(match: RegExpMatchArray): ClockTime | null;
}

const MONTH_NAMES =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';

const MONTH_INDEX: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12
};

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

function calendarDate(today: DateTime, year: number, month: number, day: number): DateTime | null {
  const date = DateTime.fromObject({ year, month, day }, { zone: today.zone });
  return date.isValid ? date : null;
}

/** A date given without a year means its next occurrence. */
function upcoming(today: DateTime, month: number, day: number): DateTime | null {
  const thisYear = calendarDate(today, today.year, month, day);
  if (thisYear && thisYear.toMillis() >= today.toMillis()) {
    return thisYear;
  }
  return calendarDate(today, today.year + 1, month, day);
}

function monthFromName(name: string): number {
  return MONTH_INDEX[name.slice(0, 3)];
}

const DATE_RULES: DateRule[] = [
  {
    pattern: /\bday after tomorrow\b/,
    resolve: (_match, today) => today.plus({ days: 2 })
  },
  {
    pattern: /\btomorrow\b/,
    resolve: (_match, today) => today.plus({ days: 1 })
  },
  {
    pattern: /\b(?:today|tonight)\b/,
    resolve: (_match, today) => today
  },
  {
    pattern: /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/,
    resolve: (match, today) => calendarDate(today, Number(match[1]), Number(match[2]), Number(match[3]))
  },
  {
    pattern: /\b(\d{1,2})\/(\d{1,2})(?:\/(\d{4}|\d{2}))?\b/,
    resolve: (match, today) => {
      const month = Number(match[1]);
      const day = Number(match[2]);
      if (!match[3]) {
        return upcoming(today, month, day);
      }
      const year = match[3].length === 2 ? 2000 + Number(match[3]) : Number(match[3]);
      return calendarDate(today, year, month, day);
    }
  },
  {
    pattern: new RegExp(`\\b${MONTH_NAMES}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4})\\b)?`),
    resolve: (match, today) => {
      const month = monthFromName(match[1]);
      const day = Number(match[2]);
      return match[3] ? calendarDate(today, Number(match[3]), month, day) : upcoming(today, month, day);
    }
  },
  {
    pattern: new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH_NAMES}\\b(?:,?\\s+(\\d{4})\\b)?`),
    resolve: (match, today) => {
      const day = Number(match[1]);
      const month = monthFromName(match[2]);
      return match[3] ? calendarDate(today, Number(match[3]), month, day) : upcoming(today, month, day);
    }
  },
  {
    pattern: /\b(?:(?:next|this|on)\s+)?(monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/,
    resolve: (match, today) => {
      const target = WEEKDAYS.indexOf(match[1]) + 1;
      const ahead = (target - today.weekday + 7) % 7 || 7;
      return today.plus({ days: ahead });
    }
  }
];

const TIME_RULES: TimeRule[] = [
  {
    pattern: /\b(\d{1,2})(?::([0-5]\d))?\s*([ap])\.?m\b\.?/,
    resolve: match => {
      const hour12 = Number(match[1]);
      if (hour12 < 1 || hour12 > 12) return null;
      return {
        hour: to24Hour(hour12, match[3] === 'a' ? 'am' : 'pm'),
        minute: match[2] ? Number(match[2]) : 0
      };
    }
  },
  {
    pattern: /\bnoon\b/,
    resolve: () => ({ hour: 12, minute: 0 })
  },
  {
    pattern: /\bmidnight\b/,
    resolve: () => ({ hour: 0, minute: 0 })
  },
  {
    pattern: /\b([01]?\d|2[0-3]):([0-5]\d)\b/,
    resolve: match => ({ hour: withoutMeridiem(Number(match[1])), minute: Number(match[2]) })
  },
  {
    pattern: /\bat\s+(\d{1,2})\b(?![:/.-]\d)/,
    resolve: match => {
      const hour = Number(match[1]);
      if (hour > 23) return null;
      return { hour: withoutMeridiem(hour), minute: 0 };
    }
  }
];

// No am/pm given: 1-7 is read as afternoon, anything else as a 24-hour clock.
function withoutMeridiem(hour: number): number {
  return hour >= 1 && hour <= 7 ? hour + 12 : hour;
}

export class RuleBasedDateTimeParser implements DateTimeParser {
  constructor(private readonly zone: string = 'UTC') {}

  parseDateTime(text: string, referenceNow: Date): ParsedDateTime | null {
    let remaining = text.toLowerCase().trim();
    if (!remaining) return null;

    const today = DateTime.fromJSDate(referenceNow, { zone: this.zone }).startOf('day');
    if (!today.isValid) return null;

    let date: DateTime | null = today;
    for (const rule of DATE_RULES) {
      const match = remaining.match(rule.pattern);
      if (match) {
        date = rule.resolve(match, today);
        remaining = remaining.replace(match[0], ' ');
        break;
      }
    }
    if (!date) return null;

    let time: ClockTime | null = null;
    for (const rule of TIME_RULES) {
      const match = remaining.match(rule.pattern);
      if (match) {
        time = rule.resolve(match);
        break;
      }
    }
    if (!time) return null;

    const isoDate = date.toISODate();
    if (!isoDate) return null;

    return { date: isoDate, timeLabel: formatTimeLabel(time.hour, time.minute) };
  }
}
