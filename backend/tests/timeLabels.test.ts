import { describe, test, expect } from 'vitest';
import { formatPrice, formatTimeLabel, normalizeSlotLabel } from '../src/utils/timeLabels';

describe('time labels', () => {
  test('formats 24-hour clock times as slot labels', () => {
    expect(formatTimeLabel(9, 0)).toBe('09:00 AM');
    expect(formatTimeLabel(0, 5)).toBe('12:05 AM');
    expect(formatTimeLabel(12, 0)).toBe('12:00 PM');
    expect(formatTimeLabel(16, 30)).toBe('04:30 PM');
  });

  test('normalises loosely written slot labels', () => {
    expect(normalizeSlotLabel('9:00 am')).toBe('09:00 AM');
    expect(normalizeSlotLabel('02:30PM')).toBe('02:30 PM');
    expect(normalizeSlotLabel('12:15 a.m.')).toBe('12:15 AM');
    expect(normalizeSlotLabel('13:00 PM')).toBeNull();
    expect(normalizeSlotLabel('14:00')).toBeNull();
  });

  test('prints whole prices with one decimal', () => {
    expect(formatPrice(25)).toBe('25.0');
    expect(formatPrice(19.99)).toBe('19.99');
    expect(formatPrice(0)).toBe('0.0');
  });
});
