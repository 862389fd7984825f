const SLOT_LABEL = /^(\d{1,2}):([0-5]\d)\s*([ap])\.?m\.?$/i;

/** Canonical slot label, e.g. `formatTimeLabel(14, 0)` is `02:00 PM`. */
export function formatTimeLabel(hour: number, minute: number): string {
  const meridiem = hour < 12 ? 'AM' : 'PM';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${String(hour12).padStart(2, '0')}:${String(minute).padStart(2, '0')} ${meridiem}`;
}

export function to24Hour(hour12: number, meridiem: 'am' | 'pm'): number {
  if (meridiem === 'am') {
    return hour12 === 12 ? 0 : hour12;
  }
  return hour12 === 12 ? 12 : hour12 + 12;
}

/**
 * Accepts `9:00 am`, `09:00 PM`, `9:30p.m.` and returns the canonical label,
 * or null when the text is not a 12-hour clock time.
 */
export function normalizeSlotLabel(label: string): string | null {
  const match = label.trim().match(SLOT_LABEL);
  if (!match) return null;

  const hour12 = Number(match[1]);
  if (hour12 < 1 || hour12 > 12) return null;

  const meridiem = match[3].toLowerCase() === 'a' ? 'am' : 'pm';
  return formatTimeLabel(to24Hour(hour12, meridiem), Number(match[2]));
}

/** Prices print the way the catalog has always shown them: `25.0`, `19.99`. */
export function formatPrice(price: number): string {
  return Number.isInteger(price) ? price.toFixed(1) : String(price);
}
