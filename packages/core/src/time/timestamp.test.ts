import { describe, it, expect } from 'vitest';
import { parseTimestamp, TimestampParseError, toInstantMs } from './timestamp.js';

describe('parseTimestamp', () => {
  it('should parse RFC 3339 with a negative offset', () => {
    expect(parseTimestamp('2025-01-08T08:30:00-05:00')).toEqual({
      year: 2025,
      month: 1,
      day: 8,
      hour: 8,
      minute: 30,
      second: 0,
      millisecond: 0,
      offsetMinutes: -300,
    });
  });

  it('should parse a UTC designator', () => {
    expect(parseTimestamp('2025-01-08T13:00:00Z').offsetMinutes).toBe(0);
  });

  it('should parse a space separator without an offset', () => {
    const parsed = parseTimestamp('2025-01-08 17:45:12');
    expect(parsed.hour).toBe(17);
    expect(parsed.minute).toBe(45);
    expect(parsed.second).toBe(12);
    expect(parsed.offsetMinutes).toBeUndefined();
  });

  it('should parse fractional seconds and compact offsets', () => {
    const parsed = parseTimestamp('2025-01-08T08:00:00.25+0130');
    expect(parsed.millisecond).toBe(250);
    expect(parsed.offsetMinutes).toBe(90);
  });

  it('should read a date without a time as midnight', () => {
    const parsed = parseTimestamp('2025-01-08');
    expect(parsed.hour).toBe(0);
    expect(parsed.minute).toBe(0);
  });

  it('should reject text that is not a timestamp', () => {
    expect(() => parseTimestamp('yesterday')).toThrow(TimestampParseError);
    expect(() => parseTimestamp('')).toThrow(TimestampParseError);
  });

  it('should reject impossible calendar dates', () => {
    expect(() => parseTimestamp('2025-02-30T08:00:00Z')).toThrow(
      "invalid timestamp '2025-02-30T08:00:00Z': day 30 out of range",
    );
    expect(() => parseTimestamp('2025-13-01T08:00:00Z')).toThrow('month 13 out of range');
  });

  it('should reject impossible clock times', () => {
    expect(() => parseTimestamp('2025-01-08T24:00:00Z')).toThrow('time of day out of range');
  });
});

describe('toInstantMs', () => {
  it('should apply the offset', () => {
    expect(toInstantMs(parseTimestamp('2025-01-08T08:00:00-05:00'))).toBe(
      Date.UTC(2025, 0, 8, 13, 0, 0),
    );
  });

  it('should read text without an offset as UTC', () => {
    expect(toInstantMs(parseTimestamp('2025-01-08T08:00:00'))).toBe(Date.UTC(2025, 0, 8, 8, 0, 0));
  });
});
