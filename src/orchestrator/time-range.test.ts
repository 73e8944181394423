import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  monthsBackWindow,
  fixedWindow,
  isWithinWindow,
  isBeforeWindow,
  lastDayOf,
  windowLengthDays,
  InvalidWindowError,
} from './time-range.js';

describe('time-range', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('monthsBackWindow', () => {
    it('ends one month ago and starts monthsBack months before that', () => {
      const range = monthsBackWindow(1, new Date('2024-03-15T13:45:00Z'));

      expect(range.from).toBe('2024-01-15T00:00:00.000Z');
      expect(range.to).toBe('2024-02-15T00:00:00.000Z');
    });

    it('uses the current time by default', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-10T08:00:00Z'));

      const range = monthsBackWindow(3);

      expect(range.from).toBe('2024-02-10T00:00:00.000Z');
      expect(range.to).toBe('2024-05-10T00:00:00.000Z');
    });

    it('rejects a non-positive month count', () => {
      expect(() => monthsBackWindow(0)).toThrow(InvalidWindowError);
    });

    it('returns a frozen window', () => {
      const range = monthsBackWindow(1, new Date('2024-03-15T00:00:00Z'));
      expect(Object.isFrozen(range)).toBe(true);
    });
  });

  describe('fixedWindow', () => {
    it('normalizes dates to ISO timestamps', () => {
      const range = fixedWindow('2024-01-01', '2024-02-01');

      expect(range.from).toBe('2024-01-01T00:00:00.000Z');
      expect(range.to).toBe('2024-02-01T00:00:00.000Z');
    });

    it('rejects start after end', () => {
      expect(() => fixedWindow('2024-02-01', '2024-01-01')).toThrow(
        'Window start must be before end'
      );
    });

    it('rejects an empty window', () => {
      expect(() => fixedWindow('2024-01-01', '2024-01-01')).toThrow(InvalidWindowError);
    });

    it('rejects unparseable bounds', () => {
      expect(() => fixedWindow('soon', '2024-01-01')).toThrow('Invalid window bounds');
    });
  });

  describe('isWithinWindow', () => {
    const window = fixedWindow('2024-01-01', '2024-02-01');

    it('includes the start instant', () => {
      expect(isWithinWindow(window, '2024-01-01T00:00:00Z')).toBe(true);
    });

    it('excludes the end instant', () => {
      expect(isWithinWindow(window, '2024-02-01T00:00:00Z')).toBe(false);
    });

    it('excludes a timestamp one day before the start', () => {
      expect(isWithinWindow(window, '2023-12-31T00:00:00Z')).toBe(false);
    });

    it('treats missing timestamps as outside', () => {
      expect(isWithinWindow(window, null)).toBe(false);
      expect(isWithinWindow(window, undefined)).toBe(false);
      expect(isWithinWindow(window, 'not a date')).toBe(false);
    });
  });

  describe('isBeforeWindow', () => {
    const window = fixedWindow('2024-01-01', '2024-02-01');

    it('is true only before the start', () => {
      expect(isBeforeWindow(window, '2023-12-31T23:59:59Z')).toBe(true);
      expect(isBeforeWindow(window, '2024-01-01T00:00:00Z')).toBe(false);
      expect(isBeforeWindow(window, null)).toBe(false);
    });
  });

  describe('lastDayOf', () => {
    it('excludes the end day when the window ends at midnight', () => {
      expect(lastDayOf(fixedWindow('2024-01-01', '2024-02-01'))).toBe('2024-01-31');
    });

    it('includes the end day when the window ends mid-day', () => {
      expect(lastDayOf(fixedWindow('2024-01-01', '2024-02-01T12:00:00Z'))).toBe('2024-02-01');
    });
  });

  describe('windowLengthDays', () => {
    it('counts whole days', () => {
      expect(windowLengthDays(fixedWindow('2024-01-01', '2024-02-01'))).toBe(31);
    });
  });
});
