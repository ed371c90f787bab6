import { describe, expect, it } from 'vitest';
import {
  addDays,
  consecutiveDates,
  diffDays,
  formatLongDate,
  parseIsoDate,
  toIsoDate,
  weekdayName,
} from './dates';

describe('dates', () => {
  it('parses strict ISO dates at UTC midnight', () => {
    expect(parseIsoDate('2030-03-05')?.toISOString()).toBe('2030-03-05T00:00:00.000Z');
    expect(parseIsoDate('2030-02-30')).toBeNull();
    expect(parseIsoDate('2030-3-5')).toBeNull();
    expect(parseIsoDate('05/03/2030')).toBeNull();
  });

  it('does day arithmetic across month ends', () => {
    const start = new Date(Date.UTC(2030, 0, 30));
    expect(toIsoDate(addDays(start, 3))).toBe('2030-02-02');
    expect(diffDays(start, new Date(Date.UTC(2030, 1, 2, 18)))).toBe(3);
    expect(consecutiveDates(start, 3).map(toIsoDate)).toEqual(['2030-01-30', '2030-01-31', '2030-02-01']);
  });

  it('formats long dates and weekday names', () => {
    const d = new Date(Date.UTC(2025, 2, 5));
    expect(formatLongDate(d)).toBe('March 05, 2025');
    expect(weekdayName(d)).toBe('Wednesday');
  });
});
