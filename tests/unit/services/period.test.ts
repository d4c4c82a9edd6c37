/**
 * Calendar Helper Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  formatPeriod,
  monthKeyOf,
  parsePeriod,
  parseTimestamp,
  periodOf,
} from '@/services/period.js';

import { expectSuccess } from '../../helpers/test-utils.js';

describe('period', () => {
  describe('parseTimestamp()', () => {
    it('should read a timestamp without offset as UTC', () => {
      const date = expectSuccess(parseTimestamp('2060-04-01T00:00'));

      expect(date.toISOString()).toBe('2060-04-01T00:00:00.000Z');
    });

    it('should honour an explicit offset', () => {
      const date = expectSuccess(parseTimestamp('2060-04-01T01:30:00+02:00'));

      expect(date.toISOString()).toBe('2060-03-31T23:30:00.000Z');
    });

    it('should accept 29 February in a leap year', () => {
      const date = expectSuccess(parseTimestamp('2060-02-29T00:00'));

      expect(periodOf(date)).toBe('2060-02');
    });

    it('should reject 29 February outside a leap year', () => {
      expect(parseTimestamp('2061-02-29T00:00').success).toBe(false);
    });

    it('should accept seconds and milliseconds', () => {
      const date = expectSuccess(parseTimestamp('2060-04-01T12:00:05.250Z'));

      expect(date.toISOString()).toBe('2060-04-01T12:00:05.250Z');
    });

    it.each([
      '2060-04-01',
      'yesterday',
      '2060-13-01T00:00',
      '2060-02-30T00:00',
      '2060-04-31T00:00',
      '2060-04-01T24:00',
      '2060-04-01T12:60',
      '',
    ])(
      'should reject %j',
      (raw) => {
        const result = parseTimestamp(raw);

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.code).toBe('VALIDATION_ERROR');
          expect(result.error.message).toBe(`Invalid timestamp: ${raw}`);
        }
      }
    );
  });

  describe('monthKeyOf() / periodOf()', () => {
    it('should use the UTC calendar month', () => {
      const date = new Date('2060-04-30T23:59:59Z');

      expect(monthKeyOf(date)).toEqual({ year: 2060, month: 4 });
      expect(periodOf(date)).toBe('2060-04');
    });
  });

  describe('formatPeriod()', () => {
    it('should zero-pad the month', () => {
      expect(formatPeriod({ year: 2060, month: 1 })).toBe('2060-01');
    });
  });

  describe('parsePeriod()', () => {
    it('should parse YYYY-MM', () => {
      expect(expectSuccess(parsePeriod('2060-12'))).toEqual({
        year: 2060,
        month: 12,
      });
    });

    it.each(['2060-00', '2060-13', '2060-4', '2060/04'])(
      'should reject %j',
      (raw) => {
        const result = parsePeriod(raw);

        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.message).toBe(`Invalid period: ${raw}`);
        }
      }
    );
  });
});
