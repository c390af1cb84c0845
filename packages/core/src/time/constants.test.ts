import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TIME_ZONE,
  HALF_HOUR_MINUTES,
  HOURS_PER_DAY,
  MINUTES_PER_HOUR,
  WEEKDAY_NAMES,
} from './constants.js';

describe('time constants', () => {
  it('MINUTES_PER_HOUR should be 60', () => {
    expect(MINUTES_PER_HOUR).toBe(60);
  });

  it('HOURS_PER_DAY should be 24', () => {
    expect(HOURS_PER_DAY).toBe(24);
  });

  it('HALF_HOUR_MINUTES should keep the hour and the half hour', () => {
    expect(HALF_HOUR_MINUTES).toEqual([0, 30]);
  });

  it('WEEKDAY_NAMES should start on Monday and end on Sunday', () => {
    expect(WEEKDAY_NAMES).toHaveLength(7);
    expect(WEEKDAY_NAMES[0]).toBe('Monday');
    expect(WEEKDAY_NAMES[6]).toBe('Sunday');
  });

  it('DEFAULT_TIME_ZONE should be US/Eastern', () => {
    expect(DEFAULT_TIME_ZONE).toBe('America/New_York');
  });
});
