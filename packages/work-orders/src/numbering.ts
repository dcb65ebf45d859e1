import { randomInt } from 'node:crypto';
import { DateTime } from 'luxon';

export const MAX_NUMBER_ATTEMPTS = 10;

export type SuffixSource = () => number;

const randomSuffix: SuffixSource = () => randomInt(0, 10_000);

/** `PREFIX-yyyyMMdd-NNNN` with the date on the business wall clock. */
export const formatWorkOrderNumber = (prefix: string, at: Date, timezone: string, suffix: number): string => {
  const day = DateTime.fromJSDate(at, { zone: timezone }).toFormat('yyyyMMdd');
  return `${prefix}-${day}-${String(suffix).padStart(4, '0')}`;
};

export const generateWorkOrderNumber = (
  prefix: string,
  at: Date,
  timezone: string,
  nextSuffix: SuffixSource = randomSuffix
): string => formatWorkOrderNumber(prefix, at, timezone, nextSuffix() % 10_000);
