/**
 * Timestamp utilities for consistent time handling across the application
 *
 * All timestamps are stored internally as numbers (milliseconds since epoch)
 * Conversion to ISO strings only happens at API boundaries
 */

import type { Timestamp } from '../types/timestamp.js';

export const TimestampUtil = {
  now: (): Timestamp => Date.now(),

  toISO: (ts: Timestamp): string => new Date(ts).toISOString(),
  toISOOrNull: (ts: Timestamp | undefined): string | null =>
    ts === undefined ? null : new Date(ts).toISOString(),

  addMilliseconds: (ts: Timestamp, ms: number): Timestamp => ts + ms,

  isValid: (value: unknown): value is Timestamp =>
    typeof value === 'number' && Number.isFinite(value) && value > 0 && value < 253402300800000,

  // Redis stores numbers as strings; empty or missing fields mean "not set"
  parseOptional: (value: string | undefined | null): Timestamp | undefined => {
    if (value === undefined || value === null || value === '') return undefined;
    const ts = Number(value);
    if (!TimestampUtil.isValid(ts)) {
      throw new Error(`Cannot parse timestamp from '${value}'`);
    }
    return ts;
  },
} as const;

export type { Timestamp } from '../types/timestamp.js';
