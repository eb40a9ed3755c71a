import { describe, it, expect } from 'vitest';
import {
  CodecError,
  OperationNotImplementedError,
  PrimitiveCodec,
  isCodecError,
  wrapError,
} from '../src/index.js';
import { catchError } from './helpers.js';

class Incomplete extends PrimitiveCodec<number, string> {
  decodePrim(enc: string): number {
    return Number(enc);
  }
}

describe('CodecError', () => {
  it('should default to a generic code', () => {
    const err = new CodecError('failed');

    expect(err.code).toBe('codec_failure');
    expect(err.name).toBe('CodecError');
    expect(err.context).toEqual({});
  });

  it('should serialise with its cause', () => {
    const inner = new CodecError('inner', { code: 'unknown_type', context: { type: 'X' } });
    const outer = new CodecError('outer', { code: 'structural_mismatch', cause: inner });

    expect(outer.toJSON()).toEqual({
      name: 'CodecError',
      code: 'structural_mismatch',
      message: 'outer',
      context: {},
      cause: { name: 'CodecError', code: 'unknown_type', message: 'inner', context: { type: 'X' } },
    });
  });

  it('should serialise a foreign cause by name and message', () => {
    const err = new CodecError('outer', { cause: new TypeError('bad') });

    expect(err.toJSON().cause).toEqual({ name: 'TypeError', message: 'bad' });
  });

  it('should be recognised by isCodecError', () => {
    expect(isCodecError(new CodecError('x'))).toBe(true);
    expect(isCodecError(new Error('x'))).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass codec errors through unchanged', () => {
    const err = new CodecError('x', { code: 'unknown_type' });

    expect(wrapError(err, 'context')).toBe(err);
  });

  it('should wrap foreign errors with their message', () => {
    const cause = new RangeError('out of range');
    const err = wrapError(cause, 'Failed to decode field x', { field: 'x' });

    expect(err.message).toBe('Failed to decode field x: out of range');
    expect(err.code).toBe('codec_failure');
    expect(err.cause).toBe(cause);
    expect(err.context).toEqual({ field: 'x' });
  });

  it('should wrap thrown non-errors', () => {
    expect(wrapError('boom', 'Failed').message).toBe('Failed: boom');
  });
});

describe('OperationNotImplementedError', () => {
  it('should be raised by a primitive codec without an encoder', () => {
    const err = catchError(() => new Incomplete().encode(1, ''));

    expect(err).toBeInstanceOf(OperationNotImplementedError);
    expect(err).toMatchObject({
      code: 'not_implemented',
      message: 'Operation not implemented: Incomplete.encodeBare',
    });
  });

  it('should still decode', () => {
    expect(new Incomplete().decode('42')).toBe(42);
  });
});
