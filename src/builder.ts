import { isCodec, type Codec } from './codec.js';
import { CodecError } from './errors.js';
import type { ObjectField } from './object.js';
import type { TypeLike, TypeRef } from './types.js';

/**
 * Core services the builder needs to turn its fields into a codec.
 */
export interface ObjectCodecFactory<E> {
  /** Codec for a declared field type; dynamic when the type is not final. */
  fieldCodec<A>(type: TypeLike<A>): Codec<A, E>;
  /** Null-safe wrapper for an explicit field codec. */
  makeNullSafeCodec<A>(codec: Codec<A, E>): Codec<A | null, E>;
  /** Finish the codec from the accumulated fields and construction function. */
  buildObjectCodec<T>(
    type: TypeRef<T>,
    fields: readonly ObjectField<T, E, unknown[]>[],
    construct: (args: unknown[]) => T
  ): Codec<T, E>;
}

type Terminal<T, E> = (codec: Codec<T, E>) => void;

/**
 * Accumulates the fields of an object codec. Every `field` or `nullField`
 * call yields a builder whose `Args` tuple has grown by the field's type, and
 * `map` takes a construction function of exactly those parameters.
 *
 * @example
 * ```ts
 * const codec = core
 *   .objectCodec(Types.of(Point))
 *   .field('x', (p) => p.x, Types.int)
 *   .field('y', (p) => p.y, Types.int)
 *   .map((x, y) => new Point(x, y));
 * ```
 */
export class ObjectCodecBuilder<T, E, Args extends unknown[] = []> {
  readonly #factory: ObjectCodecFactory<E>;
  readonly #type: TypeRef<T>;
  readonly #fields: readonly ObjectField<T, E, unknown[]>[];
  readonly #onBuild: Terminal<T, E> | undefined;

  constructor(
    factory: ObjectCodecFactory<E>,
    type: TypeRef<T>,
    fields: readonly ObjectField<T, E, unknown[]>[] = [],
    onBuild?: Terminal<T, E>
  ) {
    this.#factory = factory;
    this.#type = type;
    this.#fields = fields;
    this.#onBuild = onBuild;
  }

  /** Number of fields declared so far. */
  get arity(): number {
    return this.#fields.length;
  }

  /**
   * Add a field read with `getter` and encoded with `codec`, or with the codec
   * resolved for a declared type.
   */
  field<A>(name: string, getter: (value: T) => A, codec: Codec<A, E> | TypeLike<A>): ObjectCodecBuilder<T, E, [...Args, A]> {
    const resolved = isCodec(codec) ? codec : this.#factory.fieldCodec(codec);
    return this.#append<A, [...Args, A]>(name, getter, resolved);
  }

  /**
   * Add a field that may be absent. Absence decodes as `null`.
   */
  nullField<A>(
    name: string,
    getter: (value: T) => A | null | undefined,
    codec: Codec<A, E> | TypeLike<A>
  ): ObjectCodecBuilder<T, E, [...Args, A | null]> {
    const base = isCodec(codec) ? codec : this.#factory.fieldCodec(codec);
    const resolved = this.#factory.makeNullSafeCodec(base);
    return this.#append<A | null, [...Args, A | null]>(name, (value) => getter(value) ?? null, resolved);
  }

  /**
   * Bind the construction function; its parameters receive the decoded
   * fields in declaration order.
   */
  map(construct: (...args: Args) => T): Codec<T, E> {
    return this.#build((args) => construct(...args));
  }

  /**
   * Positional form of `map`: the decoded fields arrive as one array.
   */
  mapArgs(construct: (args: Args) => T): Codec<T, E> {
    return this.#build(construct);
  }

  #append<A, B extends unknown[]>(
    name: string,
    getter: (value: T) => A,
    codec: Codec<A, E>
  ): ObjectCodecBuilder<T, E, B> {
    const field: ObjectField<T, E, unknown[]> = {
      name,
      encodeField: (value, enc) => codec.encode(getter(value), enc),
      decodeField(acc, enc) {
        acc.push(codec.decode(enc));
        return acc;
      },
    };
    return new ObjectCodecBuilder<T, E, B>(this.#factory, this.#type, [...this.#fields, field], this.#onBuild);
  }

  #build(construct: (args: Args) => T): Codec<T, E> {
    const arity = this.#fields.length;
    const codec = this.#factory.buildObjectCodec(this.#type, this.#fields, (args) => {
      if (!isArgs<Args>(args, arity)) {
        throw new CodecError(`Expected ${arity} decoded fields, got ${args.length}`, {
          code: 'structural_mismatch',
        });
      }
      return construct(args);
    });
    this.#onBuild?.(codec);
    return codec;
  }
}

/**
 * The accumulator holds one decoded value per field, pushed in field order,
 * which is exactly the `Args` tuple.
 */
function isArgs<Args extends unknown[]>(args: unknown[], arity: number): args is Args {
  return args.length === arity;
}
