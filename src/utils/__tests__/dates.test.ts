import { describe, it, expect } from 'vitest';
import { daysAgo, startOfMonth, toIsoDate } from '../dates.js';

describe('dates', () => {
  it('formats local dates as YYYY-MM-DD', () => {
    expect(toIsoDate(new Date(2024, 0, 5, 23, 30))).toBe('2024-01-05');
  });

  it('returns the first day of the month', () => {
    expect(startOfMonth(new Date(2024, 2, 17, 9))).toBe('2024-03-01');
  });

  it('counts days back across a leap February', () => {
    expect(daysAgo(30, new Date(2024, 2, 15, 9))).toBe('2024-02-14');
    expect(daysAgo(0, new Date(2024, 2, 15, 9))).toBe('2024-03-15');
  });
});
