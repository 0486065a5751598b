// src/utils/presentation.test.ts
import { describe, it, expect } from 'vitest';
import { formatDate, formatRange, formatTime, ordinalSuffix } from './presentation.js';

const options = { now: new Date('2026-10-19T17:00:00Z'), timeZone: 'America/Los_Angeles' };

describe('presentation', () => {
  describe('ordinalSuffix', () => {
    it.each([
      [1, 'st'],
      [2, 'nd'],
      [3, 'rd'],
      [4, 'th'],
      [11, 'th'],
      [12, 'th'],
      [13, 'th'],
      [21, 'st'],
      [22, 'nd'],
      [23, 'rd'],
      [30, 'th'],
      [31, 'st'],
    ])('should give %i the suffix %s', (day, suffix) => {
      expect(ordinalSuffix(day)).toBe(suffix);
    });
  });

  describe('formatDate', () => {
    it('should format ISO dates', () => {
      expect(formatDate('2026-03-01')).toBe('March 1st, 2026');
      expect(formatDate('2026-11-12')).toBe('November 12th, 2026');
    });

    it('should use the wall-clock date written in a date-time', () => {
      expect(formatDate('2026-10-22T23:30:00-07:00')).toBe('October 22nd, 2026');
    });

    it('should resolve relative expressions', () => {
      expect(formatDate('tomorrow', options)).toBe('October 20th, 2026');
      expect(formatDate('friday', options)).toBe('October 23rd, 2026');
    });

    it('should return unrecognised input unchanged', () => {
      expect(formatDate('xyzzy', options)).toBe('xyzzy');
      expect(formatDate('2026-02-30')).toBe('2026-02-30');
    });
  });

  describe('formatTime', () => {
    it('should format the wall clock of a date-time', () => {
      expect(formatTime('2026-10-20T15:00:00-07:00')).toBe('3:00 PM');
      expect(formatTime('2026-10-20T00:05:00')).toBe('12:05 AM');
    });

    it('should convert 24-hour times', () => {
      expect(formatTime('09:05')).toBe('9:05 AM');
      expect(formatTime('12:00')).toBe('12:00 PM');
      expect(formatTime('17:45')).toBe('5:45 PM');
    });

    it('should normalise conversational times', () => {
      expect(formatTime('3pm')).toBe('3:00 PM');
      expect(formatTime('3:30 pm')).toBe('3:30 PM');
      expect(formatTime('11 AM')).toBe('11:00 AM');
    });

    it('should pass through anything else', () => {
      expect(formatTime('noon')).toBe('noon');
      expect(formatTime('2026-10-20')).toBe('2026-10-20');
    });
  });

  describe('formatRange', () => {
    it('should join two times', () => {
      expect(formatRange('2026-10-20T15:00:00-07:00', '2026-10-20T16:30:00-07:00')).toBe(
        '3:00 PM - 4:30 PM'
      );
    });

    it('should say All day when either end has no time', () => {
      expect(formatRange('2026-10-20', '2026-10-21')).toBe('All day');
      expect(formatRange('2026-10-20T09:00:00', '2026-10-21')).toBe('All day');
    });
  });
});
