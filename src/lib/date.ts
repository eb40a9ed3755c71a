/**
 * Date codec: a `Date` travels as its ISO-8601 string.
 */

import type { CodecCore } from '../core.js';
import { CodecError } from '../errors.js';

function dateToString(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new CodecError('Cannot encode an invalid Date', { code: 'structural_mismatch' });
  }
  return date.toISOString();
}

function stringToDate(text: string): Date {
  const date = new Date(text);
  if (Number.isNaN(date.getTime())) {
    throw new CodecError(`Invalid date: ${text}`, { code: 'structural_mismatch', context: { value: text } });
  }
  return date;
}

export function registerDateCodec<E>(core: CodecCore<E>): void {
  core.registerStringProxyCodec(Date, dateToString, stringToDate);
}
