import { describe, it, expect } from 'vitest';
import { isDateFormat, normalizeDate } from '../../src/parsing/dates.js';

describe('normalizeDate', () => {
  it('should read US month-first dates', () => {
    expect(normalizeDate('03/05/2024')).toBe('2024-03-05');
    expect(normalizeDate('3/5/2024')).toBe('2024-03-05');
  });

  it('should fall through to day-first when month-first is impossible', () => {
    expect(normalizeDate('25/12/2024')).toBe('2024-12-25');
  });

  it('should try the format hint first', () => {
    expect(normalizeDate('03/05/2024', 'dd/MM/yyyy')).toBe('2024-05-03');
  });

  it('should fall back to the known formats when the hint is not a valid pattern', () => {
    expect(normalizeDate('2024-03-05', 'YYYY-MM-DD')).toBe('2024-03-05');
    expect(normalizeDate('03/05/2024', 'dd/MM/yyyy hello')).toBe('2024-03-05');
  });

  it('should read ISO dates and timestamps', () => {
    expect(normalizeDate('2024-03-05')).toBe('2024-03-05');
    expect(normalizeDate('2024-03-05T10:15:00Z')).toBe('2024-03-05');
  });

  it('should read month names', () => {
    expect(normalizeDate('March 5, 2024')).toBe('2024-03-05');
    expect(normalizeDate('Mar 5, 2024')).toBe('2024-03-05');
  });

  it('should read epoch seconds and milliseconds in UTC', () => {
    expect(normalizeDate(1709600000)).toBe('2024-03-05');
    expect(normalizeDate('1709600000000')).toBe('2024-03-05');
  });

  it('should return null for values that are not dates', () => {
    expect(normalizeDate('not a date')).toBeNull();
    expect(normalizeDate('')).toBeNull();
    expect(normalizeDate(null)).toBeNull();
    expect(normalizeDate({ when: 'today' })).toBeNull();
    expect(normalizeDate(-5)).toBeNull();
  });
});

describe('isDateFormat', () => {
  it('should accept date-fns patterns', () => {
    expect(isDateFormat('yyyy-MM-dd')).toBe(true);
    expect(isDateFormat('MM/dd/yyyy')).toBe(true);
    expect(isDateFormat('d MMM yyyy')).toBe(true);
  });

  it('should reject week-year tokens, unescaped letters and blanks', () => {
    expect(isDateFormat('YYYY-MM-DD')).toBe(false);
    expect(isDateFormat('yyyy-MM-dd hello')).toBe(false);
    expect(isDateFormat(' ')).toBe(false);
  });
});
