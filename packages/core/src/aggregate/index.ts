/**
 * Commute duration aggregation per time-of-day and per weekday bucket.
 */

export * from './stats.js';
export * from './aggregate.js';
