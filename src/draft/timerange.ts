import { SEC } from '../config.js';
import { JobError } from '../utils/errors.js';

export interface Timerange {
  start: number;
  duration: number;
}

export function timerange(start: number, duration: number): Timerange {
  if (!Number.isInteger(start) || !Number.isInteger(duration)) {
    throw new JobError('InvalidTimerange', `Timerange must be integral microseconds (start=${start}, duration=${duration})`);
  }
  if (start < 0) {
    throw new JobError('InvalidTimerange', `Timerange start must be >= 0 (got ${start})`);
  }
  return { start, duration };
}

export const end = (range: Timerange): number => range.start + range.duration;

export const overlaps = (a: Timerange, b: Timerange): boolean =>
  a.start < end(b) && b.start < end(a);

/**
 * Seconds to microseconds, truncating. toFixed(3) first so that values like
 * 2.3 (2299999.9999999995 after multiplying) land on the intended integer.
 */
export function secondsToUnits(seconds: number): number {
  return Math.trunc(Number((seconds * SEC).toFixed(3)));
}

export const unitsToSeconds = (units: number): number => units / SEC;
