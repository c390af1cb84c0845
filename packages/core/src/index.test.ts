import { describe, it, expect } from 'vitest';
import {
  aggregateByTime,
  aggregateByWeekdayAndTime,
  buildItineraries,
  parseSamples,
} from './index.js';

describe('core package', () => {
  it('runs the pipeline from CSV text to chart rows', () => {
    const samples = parseSamples(
      [
        '2025-01-08T13:00:00Z,10',
        '2025-01-08T13:00:00Z,20',
        '2025-01-08T13:15:00Z,99',
        '2025-01-08T13:30:00Z,5',
      ].join('\n'),
      { timeMode: { kind: 'zoned', timeZone: 'America/New_York' } },
      'to.csv',
    );

    const byTime = aggregateByTime(samples);
    expect(byTime.map((r) => [r.timeOfDay, r.commuteTime, r.count])).toEqual([
      ['08:00', 15, 2],
      ['08:30', 5, 1],
    ]);
    expect(byTime[0].stdDev).toBeCloseTo(7.0711, 4);
    expect(byTime[1].stdDev).toBeUndefined();

    expect(aggregateByWeekdayAndTime(samples).map((r) => r.weekdayLabel)).toEqual([
      '3 - Wednesday',
      '3 - Wednesday',
    ]);
  });

  it('builds the default itinerary from the unsuffixed pair', () => {
    expect(buildItineraries(['to.csv', 'from.csv']).map((i) => i.name)).toEqual(['Commute']);
  });
});
