import { CodecError, OperationNotImplementedError } from './errors.js';
import type { TypeLike, TypeRef } from './types.js';

/**
 * Paired encode/decode logic for values of type `T` on carrier `E`.
 *
 * Base codecs may assume a present value: absence is handled by the
 * null-safe wrapper.
 */
export interface Codec<T, E> {
  /**
   * Encode `value` under the parent node `enc`. The returned node is the
   * authoritative encoding; carriers may append in place or build a new node.
   */
  encode(value: T, enc: E): E;

  /**
   * Decode a value from `enc`. `type` carries the declared or tagged type when
   * the caller knows it, so that the right type constructor can be chosen.
   */
  decode(enc: E, type?: TypeRef<T>): T;
}

export function isCodec<T, E>(value: Codec<T, E> | TypeLike<T>): value is Codec<T, E> {
  return typeof value === 'object' && 'encode' in value && 'decode' in value;
}

/**
 * Leaf codec for a primitive kind. A carrier overrides either
 * `encodePrim(value, enc)`, which writes under a parent, or
 * `encodePrim(value)` via `encodeBare`, which produces a standalone node;
 * the other form is routed to the one provided.
 */
export abstract class PrimitiveCodec<T, E> implements Codec<T, E> {
  encode(value: T, enc: E): E {
    return this.encodePrim(value, enc);
  }

  decode(enc: E): T {
    return this.decodePrim(enc);
  }

  encodePrim(value: T, _enc: E): E {
    return this.encodeBare(value);
  }

  encodeBare(_value: T): E {
    throw new OperationNotImplementedError(`${this.constructor.name}.encodeBare`);
  }

  abstract decodePrim(enc: E): T;
}

/**
 * Writes and recognises the carrier's sentinel for an absent value.
 */
export abstract class NullCodec<E> implements Codec<null, E> {
  /** Whether `enc` holds the null marker. Stream carriers consume the marker. */
  abstract isNull(enc: E): boolean;

  abstract encode(value: null, enc: E): E;

  /** Mark a present value before its codec writes it. */
  encodePresent(enc: E): E {
    return enc;
  }

  decode(enc: E): null {
    if (!this.isNull(enc)) {
      throw new CodecError('Expected a null marker', { code: 'structural_mismatch' });
    }
    return null;
  }
}

/**
 * A codec forwarding to one that is not built yet. Recursive types use it to
 * refer to themselves while their codec is under construction.
 */
export interface ForwardingCodec<T, E> extends Codec<T, E> {
  readonly installed: boolean;
  install(target: Codec<T, E>): void;
}

export function forwardingCodec<T, E>(typeName: string): ForwardingCodec<T, E> {
  let target: Codec<T, E> | undefined;
  const get = (): Codec<T, E> => {
    if (!target) {
      throw new CodecError(`Codec for ${typeName} used before it was built`, {
        code: 'uninitialised_reference',
        context: { type: typeName },
      });
    }
    return target;
  };

  return {
    get installed() {
      return target !== undefined;
    },
    install(codec) {
      target = codec;
    },
    encode: (value, enc) => get().encode(value, enc),
    decode: (enc, type) => get().decode(enc, type),
  };
}

/**
 * Encode `U` through the codec of a representation type `T`.
 */
export function transform<T, U, E>(
  codec: Codec<T, E>,
  decode: (value: T) => U,
  encode: (value: U) => T
): Codec<U, E> {
  return {
    encode: (value, enc) => codec.encode(encode(value), enc),
    decode: (enc) => decode(codec.decode(enc)),
  };
}
