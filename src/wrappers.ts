import type { Carrier } from './carrier.js';
import type { Codec } from './codec.js';
import { CodecError } from './errors.js';
import type { Logger } from './logger.js';
import { runtimeTypeOf, type TypeLike, type TypeRef } from './types.js';

/**
 * The part of a codec core that dispatch by runtime type needs.
 */
export interface TypeResolver<E> {
  readonly carrier: Carrier<E>;
  readonly logger: Logger;
  typeName(type: TypeLike): string;
  /** Name for a type tag; fails for types another core could not resolve. */
  tagName(type: TypeLike): string;
  nameToType(name: string): TypeRef;
  getNullUnsafeCodec<T>(type: TypeLike<T>): Codec<T, E>;
}

/**
 * Wrap `codec` so that `null` and `undefined` are written as the carrier's
 * null marker and read back as `null`.
 */
export function nullSafe<T, E>(carrier: Carrier<E>, codec: Codec<T, E>): Codec<T | null, E> {
  const nullCodec = carrier.nullCodec;
  return {
    encode(value, enc) {
      if (value === null || value === undefined) return nullCodec.encode(null, enc);
      return codec.encode(value, nullCodec.encodePresent(enc));
    },
    decode(enc) {
      if (nullCodec.isNull(enc)) return null;
      return codec.decode(enc);
    },
  };
}

/**
 * Wrap a codec for a non-final declared type so that values of another
 * runtime type are tagged with that type's name and encoded by that type's
 * own codec. Untagged nodes decode as the declared type.
 *
 * Without `codec`, the declared type's codec is resolved on first use; a
 * declared type of `unknown` has no codec and its values are always tagged.
 */
export function dynamicCodec<E>(
  resolver: TypeResolver<E>,
  declared: TypeRef,
  codec?: Codec<unknown, E>
): Codec<unknown, E> {
  const { carrier, logger } = resolver;
  const declaredName = resolver.typeName(declared);

  let declaredCodec = codec;
  const getDeclaredCodec = (): Codec<unknown, E> => {
    if (declared.kind === 'unknown') {
      throw new CodecError('Untagged value where a type tag is required', {
        code: 'structural_mismatch',
        context: { carrier: carrier.name },
      });
    }
    declaredCodec ??= resolver.getNullUnsafeCodec(declared);
    return declaredCodec;
  };

  return {
    encode(value, enc) {
      const runtime = runtimeTypeOf(value);
      const runtimeName = resolver.typeName(runtime);
      if (runtimeName === declaredName) {
        return carrier.encodeTagged(enc, undefined, (child) => getDeclaredCodec().encode(value, child));
      }
      const tag = resolver.tagName(runtime);
      logger.trace({ type: tag, declared: declaredName }, 'type tag written');
      const runtimeCodec = resolver.getNullUnsafeCodec(runtime);
      return carrier.encodeTagged(enc, tag, (child) => runtimeCodec.encode(value, child));
    },
    decode(enc) {
      const tagged = carrier.decodeTagged(enc);
      if (tagged.typeName === undefined) {
        return getDeclaredCodec().decode(tagged.value, declared);
      }
      const type = resolver.nameToType(tagged.typeName);
      return resolver.getNullUnsafeCodec(type).decode(tagged.value, type);
    },
  };
}

