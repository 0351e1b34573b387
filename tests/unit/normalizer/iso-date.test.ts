import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { parseIsoDate } from '../../../src/lib/normalizer/iso-date.js';

describe('parseIsoDate', () => {
  // A host zone with DST, so local-time parsing would show up as an offset
  beforeAll(() => {
    vi.stubEnv('TZ', 'America/New_York');
  });

  afterAll(() => {
    vi.unstubAllEnvs();
  });

  describe('values without an offset', () => {
    it('should read a naive timestamp as UTC', () => {
      expect(parseIsoDate('2023-05-01T00:00:00')).toEqual(new Date(Date.UTC(2023, 4, 1)));
    });

    it('should read a date-only value as UTC midnight', () => {
      expect(parseIsoDate('2024-02-29')).toEqual(new Date(Date.UTC(2024, 1, 29)));
    });

    it('should accept a space between date and time', () => {
      expect(parseIsoDate('2023-05-01 10:15:30')).toEqual(
        new Date(Date.UTC(2023, 4, 1, 10, 15, 30)),
      );
    });

    it('should accept minute precision', () => {
      expect(parseIsoDate('2025-05-01T23:59')).toEqual(new Date(Date.UTC(2025, 4, 1, 23, 59)));
    });

    it.each([
      ['2023-05-01T10', Date.UTC(2023, 4, 1, 10)],
      ['20230501T100000', Date.UTC(2023, 4, 1, 10)],
      ['2023-05', Date.UTC(2023, 4, 1)],
      ['20230501', Date.UTC(2023, 4, 1)],
    ])('should read the reduced form %s as UTC', (value, expected) => {
      expect(parseIsoDate(value)?.getTime()).toBe(expected);
    });

    it('should not shift a time that falls in a local DST gap', () => {
      expect(parseIsoDate('2023-03-12T02:30:00')?.getTime()).toBe(
        Date.UTC(2023, 2, 12, 2, 30),
      );
    });

    it('should keep fractional seconds', () => {
      expect(parseIsoDate('2023-05-01T10:15:30.250')).toEqual(
        new Date(Date.UTC(2023, 4, 1, 10, 15, 30, 250)),
      );
    });
  });

  describe('values with an offset', () => {
    it('should honour a Z suffix', () => {
      expect(parseIsoDate('2024-01-02T03:04:05Z')).toEqual(
        new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
      );
    });

    it('should apply a numeric offset', () => {
      expect(parseIsoDate('2023-05-01T02:00:00+02:00')).toEqual(
        new Date(Date.UTC(2023, 4, 1, 0, 0, 0)),
      );
    });
  });

  describe('invalid values', () => {
    it.each(['not-a-date', '', '2023-13-01', '2023-02-30', 'someday'])(
      'should return null for %j',
      (value) => {
        expect(parseIsoDate(value)).toBeNull();
      },
    );
  });
});
