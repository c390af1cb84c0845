import { describe, it, expect } from 'vitest';
import {
  ALL_WEEKDAYS,
  dayNameToWeekday,
  isWeekdayNumber,
  weekdayFromJsDay,
  weekdayLabel,
  weekdayName,
} from './weekday.js';

describe('weekdayLabel', () => {
  it('should number Monday as 1', () => {
    expect(weekdayLabel(1)).toBe('1 - Monday');
  });

  it('should label Wednesday as 3', () => {
    expect(weekdayLabel(3)).toBe('3 - Wednesday');
  });

  it('should number Sunday as 7', () => {
    expect(weekdayLabel(7)).toBe('7 - Sunday');
  });

  it('should sort labels Monday to Sunday', () => {
    const labels = ALL_WEEKDAYS.map(weekdayLabel);
    expect([...labels].reverse().sort()).toEqual(labels);
  });

  it('should throw for out-of-range weekdays', () => {
    expect(() => weekdayLabel(0)).toThrow(
      'weekday must be an integer in range [1, 7] (1=Monday, 7=Sunday), got 0',
    );
    expect(() => weekdayLabel(8)).toThrow();
  });
});

describe('weekdayName', () => {
  it('should return English names', () => {
    expect(weekdayName(5)).toBe('Friday');
    expect(weekdayName(6)).toBe('Saturday');
  });
});

describe('weekdayFromJsDay', () => {
  it('should map Sunday (0) to 7', () => {
    expect(weekdayFromJsDay(0)).toBe(7);
  });

  it('should keep Monday through Saturday', () => {
    expect(weekdayFromJsDay(1)).toBe(1);
    expect(weekdayFromJsDay(6)).toBe(6);
  });

  it('should map a whole JavaScript week', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(weekdayFromJsDay)).toEqual([7, 1, 2, 3, 4, 5, 6]);
  });

  it('should throw for invalid indices', () => {
    expect(() => weekdayFromJsDay(7)).toThrow();
  });
});

describe('isWeekdayNumber', () => {
  it('should accept 1 to 7 only', () => {
    expect(isWeekdayNumber(1)).toBe(true);
    expect(isWeekdayNumber(7)).toBe(true);
    expect(isWeekdayNumber(0)).toBe(false);
    expect(isWeekdayNumber(2.5)).toBe(false);
  });
});

describe('dayNameToWeekday', () => {
  it('should accept full names in any case', () => {
    expect(dayNameToWeekday('Monday')).toBe(1);
    expect(dayNameToWeekday('SUNDAY')).toBe(7);
  });

  it('should accept abbreviations', () => {
    expect(dayNameToWeekday('tue')).toBe(2);
    expect(dayNameToWeekday('tues')).toBe(2);
    expect(dayNameToWeekday('thurs')).toBe(4);
    expect(dayNameToWeekday('sat')).toBe(6);
  });

  it('should reject unknown names', () => {
    expect(() => dayNameToWeekday('someday')).toThrow('invalid day name: someday');
  });
});
