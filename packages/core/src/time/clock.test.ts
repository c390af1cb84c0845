import { describe, it, expect } from 'vitest';
import { createClockReader, isValidTimeZone } from './clock.js';
import { parseTimestamp } from './timestamp.js';

describe('createClockReader (naive)', () => {
  const read = createClockReader({ kind: 'naive' });

  it('should read the wall clock as written, ignoring the offset', () => {
    expect(read(parseTimestamp('2025-01-08T08:30:00-05:00'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 30,
    });
    expect(read(parseTimestamp('2025-01-08T08:30:00+09:00'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 30,
    });
  });

  it('should map Sunday to 7', () => {
    // 2025-01-12 is a Sunday
    expect(read(parseTimestamp('2025-01-12T10:00:00')).weekday).toBe(7);
  });
});

describe('createClockReader (zoned)', () => {
  const read = createClockReader({ kind: 'zoned', timeZone: 'America/New_York' });

  it('should convert UTC text to Eastern standard time', () => {
    // 13:00 UTC on Wednesday 2025-01-08 is 08:00 EST
    expect(read(parseTimestamp('2025-01-08T13:00:00Z'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 0,
    });
  });

  it('should number every day of a week Monday first', () => {
    // 2025-01-06 is a Monday
    const days = [6, 7, 8, 9, 10, 11, 12].map(
      (day) => read(parseTimestamp(`2025-01-${String(day).padStart(2, '0')}T17:00:00Z`)).weekday,
    );
    expect(days).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should treat text without an offset as UTC', () => {
    expect(read(parseTimestamp('2025-01-08T13:30:00'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 30,
    });
  });

  it('should apply daylight saving time in summer', () => {
    // 12:00 UTC on Wednesday 2025-07-09 is 08:00 EDT
    expect(read(parseTimestamp('2025-07-09T12:00:00Z'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 0,
    });
  });

  it('should roll the weekday back across midnight', () => {
    // 03:00 UTC Thursday is 22:00 Wednesday in New York (EST)
    expect(read(parseTimestamp('2025-01-09T03:00:00Z'))).toEqual({
      weekday: 3,
      hour: 22,
      minute: 0,
    });
  });

  it('should report midnight as hour 0', () => {
    expect(read(parseTimestamp('2025-01-08T05:00:00Z')).hour).toBe(0);
  });

  it('should respect source offsets before converting', () => {
    expect(read(parseTimestamp('2025-01-08T08:00:00-05:00'))).toEqual({
      weekday: 3,
      hour: 8,
      minute: 0,
    });
  });
});

describe('isValidTimeZone', () => {
  it('should accept IANA zones', () => {
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('UTC')).toBe(true);
  });

  it('should reject unknown zones', () => {
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
