// src/services/portalSession.test.ts
import { describe, it, expect } from 'vitest';
import { monthDistance, parseBlockText, parseDatepickerHeader } from './portalSession.js';

describe('portalSession helpers', () => {
  describe('parseDatepickerHeader', () => {
    it('should read month and year', () => {
      expect(parseDatepickerHeader('October 2026')).toEqual({ year: 2026, month: 10 });
      expect(parseDatepickerHeader('  January\n 2027 ')).toEqual({ year: 2027, month: 1 });
    });

    it('should return null for anything else', () => {
      expect(parseDatepickerHeader(null)).toBeNull();
      expect(parseDatepickerHeader('2026')).toBeNull();
      expect(parseDatepickerHeader('Someday 2026')).toBeNull();
    });
  });

  describe('parseBlockText', () => {
    it('should split the time range from the label', () => {
      expect(parseBlockText('09:00 - 10:00 Busy')).toEqual({
        startTime: '09:00',
        endTime: '10:00',
        label: 'Busy',
      });
    });

    it('should pad single-digit hours', () => {
      expect(parseBlockText('9:30-11:00 Out of office')).toEqual({
        startTime: '09:30',
        endTime: '11:00',
        label: 'Out of office',
      });
    });

    it('should return null without a time range', () => {
      expect(parseBlockText('All day')).toBeNull();
      expect(parseBlockText(null)).toBeNull();
    });
  });

  describe('monthDistance', () => {
    it('should count steps across years', () => {
      expect(monthDistance({ year: 2026, month: 11 }, { year: 2027, month: 2 })).toBe(3);
      expect(monthDistance({ year: 2026, month: 10 }, { year: 2026, month: 10 })).toBe(0);
      expect(monthDistance({ year: 2027, month: 1 }, { year: 2026, month: 12 })).toBe(-1);
    });
  });
});
