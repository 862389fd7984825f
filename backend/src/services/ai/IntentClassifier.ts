import type { IntentLabel } from '../../types/conversation';

export type KeywordIntent = Exclude<IntentLabel, 'unknown'>;

export interface IntentRule {
  intent: KeywordIntent;
  keywords: readonly string[];
}

/**
 * `word`: a keyword must stand on its own, so "book" does not fire inside
 * "bookings" and "hi" does not fire inside "this". Inflected replies such as
 * "okay" or "nope" are listed as keywords of their own.
 * `substring`: plain containment.
 */
export type KeywordMatchMode = 'word' | 'substring';

export interface IntentClassifierOptions {
  rules?: readonly IntentRule[];
  goodbyePhrases?: readonly string[];
  matchMode?: KeywordMatchMode;
}

/** Checked top to bottom; the first rule with a hit wins. */
export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  { intent: 'greeting', keywords: ['hi', 'hello', 'hey', 'good morning', 'good afternoon'] },
  { intent: 'booking', keywords: ['book', 'appointment', 'schedule', 'reserve'] },
  { intent: 'availability', keywords: ['available', 'slots', 'when', 'time'] },
  { intent: 'cancel', keywords: ['cancel', 'cancellation', 'remove', 'delete'] },
  { intent: 'update', keywords: ['change', 'update', 'reschedule'] },
  { intent: 'show_bookings', keywords: ['show my bookings', 'my bookings', 'list bookings', 'current bookings'] },
  { intent: 'help', keywords: ['help', 'assist', 'what can you do'] },
  { intent: 'confirm', keywords: ['yes', 'yeah', 'yep', 'confirm', 'confirmed', 'ok', 'okay', 'sure', 'correct'] },
  { intent: 'deny', keywords: ['no', 'nope', 'cancel', 'wrong', 'incorrect'] }
];

export const DEFAULT_GOODBYE_PHRASES: readonly string[] = ['bye', 'goodbye', 'see you', 'exit', 'quit'];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

type KeywordMatcher = (normalized: string) => boolean;

function compileMatcher(keywords: readonly string[], mode: KeywordMatchMode): KeywordMatcher {
  const normalizedKeywords = keywords.map(k => k.toLowerCase().trim()).filter(k => k.length > 0);

  if (mode === 'substring') {
    return text => normalizedKeywords.some(keyword => text.includes(keyword));
  }

  const patterns = normalizedKeywords.map(
    keyword => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, 'u')
  );
  return text => patterns.some(pattern => pattern.test(text));
}

export class IntentClassifier {
  private readonly rules: ReadonlyArray<{ intent: KeywordIntent; matches: KeywordMatcher }>;
  private readonly goodbye: KeywordMatcher;

  constructor(options: IntentClassifierOptions = {}) {
    const mode = options.matchMode ?? 'word';
    this.rules = (options.rules ?? DEFAULT_INTENT_RULES).map(rule => ({
      intent: rule.intent,
      matches: compileMatcher(rule.keywords, mode)
    }));
    this.goodbye = compileMatcher(options.goodbyePhrases ?? DEFAULT_GOODBYE_PHRASES, mode);
  }

  classify(text: string): IntentLabel {
    const normalized = text.toLowerCase().trim();
    for (const rule of this.rules) {
      if (rule.matches(normalized)) {
        return rule.intent;
      }
    }
    return 'unknown';
  }

  isGoodbye(text: string): boolean {
    return this.goodbye(text.toLowerCase().trim());
  }
}
