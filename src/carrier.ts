import type { Codec, NullCodec, PrimitiveCodec } from './codec.js';
import type { PrimitiveKind, PrimitiveValues } from './types.js';

export type PrimitiveCodecs<E> = {
  readonly [K in PrimitiveKind]: PrimitiveCodec<PrimitiveValues[K], E>;
};

/**
 * Child encoder callback. `enc` is the node the child is written under.
 */
export type EncodeChild<E> = (index: number, enc: E) => E;

export interface Tagged<E> {
  /** Type name recorded with the value, if any. */
  readonly typeName: string | undefined;
  /** Node holding the value itself. */
  readonly value: E;
}

/**
 * What a concrete carrier supplies to the engine: leaf codecs plus the
 * structural operations composite codecs are built from.
 */
export interface Carrier<E> {
  /** Short name used in logs and errors. */
  readonly name: string;

  readonly nullCodec: NullCodec<E>;
  readonly primitives: PrimitiveCodecs<E>;
  readonly stringCodec: Codec<string, E>;

  /** Homogeneous sequence of `count` children. */
  encodeEntries(enc: E, count: number, encodeEntry: EncodeChild<E>): E;
  decodeEntries(enc: E): Iterable<E>;

  /** String-keyed children, in the order of `names`. */
  encodeNamedEntries(enc: E, names: readonly string[], encodeEntry: EncodeChild<E>): E;
  decodeNamedEntries(enc: E): Iterable<readonly [string, E]>;

  /** Fixed set of named fields, in the order of `names`. */
  encodeFields(enc: E, names: readonly string[], encodeField: EncodeChild<E>): E;
  /**
   * Child node for a field. Fields are requested in the order they were
   * encoded, which lets stream carriers read them sequentially.
   */
  decodeField(enc: E, name: string): E;

  /** Value optionally accompanied by a type name. */
  encodeTagged(enc: E, typeName: string | undefined, encodeValue: (enc: E) => E): E;
  decodeTagged(enc: E): Tagged<E>;
}
