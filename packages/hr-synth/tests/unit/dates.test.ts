/**
 * Calendar helpers - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  addDays,
  addYears,
  daysInMonth,
  diffDays,
  isIsoDate,
  isoDate,
  maxDate,
  minDate,
  parseIsoDate,
  toIsoDate,
  yearOf
} from '../../src/dates.js';

describe('dates', () => {
  it('should accept only real calendar dates', () => {
    expect(isIsoDate('2020-02-29')).toBe(true);
    expect(isIsoDate('2021-02-29')).toBe(false);
    expect(isIsoDate('2020-13-01')).toBe(false);
    expect(isIsoDate('2020-1-01')).toBe(false);
  });

  it('should throw RangeError for invalid dates', () => {
    expect(() => parseIsoDate('2021-02-30')).toThrow(RangeError);
  });

  it('should normalize Date inputs to their UTC day', () => {
    expect(toIsoDate(new Date(Date.UTC(2020, 0, 5, 23, 30)))).toBe('2020-01-05');
    expect(toIsoDate('2020-01-05')).toBe('2020-01-05');
    expect(() => toIsoDate(new Date('not a date'))).toThrow(RangeError);
  });

  it('should add days across month and year ends', () => {
    expect(addDays('2020-12-31', 1)).toBe('2021-01-01');
    expect(addDays('2020-03-01', -1)).toBe('2020-02-29');
  });

  it('should fall back to Feb 28 when adding years to Feb 29', () => {
    expect(addYears('2020-02-29', 1)).toBe('2021-02-28');
    expect(addYears('2020-02-29', 4)).toBe('2024-02-29');
    expect(addYears('2024-06-15', -30)).toBe('1994-06-15');
  });

  it('should count whole days between dates', () => {
    expect(diffDays('2020-01-01', '2020-03-01')).toBe(60);
    expect(diffDays('2020-03-01', '2020-01-01')).toBe(-60);
  });

  it('should expose small calendar utilities', () => {
    expect(daysInMonth(2020, 2)).toBe(29);
    expect(daysInMonth(2021, 2)).toBe(28);
    expect(isoDate(2021, 4, 1)).toBe('2021-04-01');
    expect(yearOf('2019-07-04')).toBe(2019);
    expect(maxDate('2020-01-02', '2019-12-31')).toBe('2020-01-02');
    expect(minDate('2020-01-02', '2019-12-31')).toBe('2019-12-31');
  });
});
