import type { Carrier } from './carrier.js';
import type { Codec } from './codec.js';
import { CodecError } from './errors.js';
import {
  enumMemberNames,
  type EnumObject,
  type PrimitiveArrayValues,
  type PrimitiveKind,
  type PrimitiveValues,
} from './types.js';

// ============================================================================
// Primitive arrays
// ============================================================================

type ArrayAdapter<K extends PrimitiveKind> = {
  toElements(array: PrimitiveArrayValues[K]): PrimitiveValues[K][];
  fromElements(values: PrimitiveValues[K][]): PrimitiveArrayValues[K];
};

const arrayAdapters: { [K in PrimitiveKind]: ArrayAdapter<K> } = {
  boolean: { toElements: (a) => a, fromElements: (v) => v },
  byte: { toElements: (a) => Array.from(a), fromElements: (v) => Int8Array.from(v) },
  char: {
    toElements: (a) => Array.from(a, (code) => String.fromCharCode(code)),
    fromElements: (v) => Uint16Array.from(v, (c) => c.charCodeAt(0)),
  },
  short: { toElements: (a) => Array.from(a), fromElements: (v) => Int16Array.from(v) },
  int: { toElements: (a) => Array.from(a), fromElements: (v) => Int32Array.from(v) },
  long: { toElements: (a) => Array.from(a), fromElements: (v) => BigInt64Array.from(v) },
  float: { toElements: (a) => Array.from(a), fromElements: (v) => Float32Array.from(v) },
  double: { toElements: (a) => Array.from(a), fromElements: (v) => Float64Array.from(v) },
};

/**
 * Array of a primitive kind, e.g. `Int32Array` for `int[]`. Elements are
 * written bare through the carrier's leaf codec.
 */
export function primitiveArray<K extends PrimitiveKind, E>(
  carrier: Carrier<E>,
  kind: K
): Codec<PrimitiveArrayValues[K], E> {
  const adapter: ArrayAdapter<K> = arrayAdapters[kind];
  const element = carrier.primitives[kind];
  return {
    encode(value, enc) {
      const elements = adapter.toElements(value);
      return carrier.encodeEntries(enc, elements.length, (i, child) => element.encodePrim(elements[i], child));
    },
    decode(enc) {
      const elements: PrimitiveValues[K][] = [];
      for (const child of carrier.decodeEntries(enc)) {
        elements.push(element.decodePrim(child));
      }
      return adapter.fromElements(elements);
    },
  };
}

// ============================================================================
// Enums
// ============================================================================

/**
 * Enum member encoded by its name.
 */
export function enumCodec<E>(carrier: Carrier<E>, name: string, values: EnumObject): Codec<unknown, E> {
  const names = enumMemberNames(values);
  const nameOf = new Map<unknown, string>(names.map((member) => [values[member], member]));

  return {
    encode(value, enc) {
      const member = nameOf.get(value);
      if (member === undefined) {
        throw new CodecError(`${String(value)} is not a member of enum ${name}`, {
          code: 'structural_mismatch',
          context: { type: name, value: String(value) },
        });
      }
      return carrier.stringCodec.encode(member, enc);
    },
    decode(enc) {
      const member = carrier.stringCodec.decode(enc);
      if (!names.includes(member)) {
        throw new CodecError(`Unknown member ${member} of enum ${name}`, {
          code: 'structural_mismatch',
          context: { type: name, member },
        });
      }
      return values[member];
    },
  };
}

// ============================================================================
// Containers
// ============================================================================

/**
 * `T[]`. The element codec decides how absent elements are handled.
 */
export function array<T, E>(carrier: Carrier<E>, element: Codec<T, E>): Codec<T[], E> {
  return {
    encode: (value, enc) => carrier.encodeEntries(enc, value.length, (i, child) => element.encode(value[i], child)),
    decode(enc) {
      const result: T[] = [];
      for (const child of carrier.decodeEntries(enc)) {
        result.push(element.decode(child));
      }
      return result;
    },
  };
}

/**
 * `Set<T>`, encoded as a sequence in insertion order.
 */
export function set<T, E>(carrier: Carrier<E>, element: Codec<T, E>): Codec<Set<T>, E> {
  const inner = array(carrier, element);
  return {
    encode: (value, enc) => inner.encode([...value], enc),
    decode: (enc) => new Set(inner.decode(enc)),
  };
}

const ENTRY_FIELDS = ['key', 'value'] as const;

/**
 * `Map<K, V>` with arbitrary keys, encoded as a sequence of key/value pairs.
 */
export function map<K, V, E>(carrier: Carrier<E>, key: Codec<K, E>, value: Codec<V, E>): Codec<Map<K, V>, E> {
  return {
    encode(entries, enc) {
      const pairs = [...entries];
      return carrier.encodeEntries(enc, pairs.length, (i, child) => {
        const [k, v] = pairs[i];
        return carrier.encodeFields(child, ENTRY_FIELDS, (field, fieldEnc) =>
          field === 0 ? key.encode(k, fieldEnc) : value.encode(v, fieldEnc)
        );
      });
    },
    decode(enc) {
      const result = new Map<K, V>();
      for (const child of carrier.decodeEntries(enc)) {
        const k = key.decode(carrier.decodeField(child, 'key'));
        const v = value.decode(carrier.decodeField(child, 'value'));
        result.set(k, v);
      }
      return result;
    },
  };
}

/**
 * String-keyed map held in a plain object.
 */
export function record<V, E>(carrier: Carrier<E>, value: Codec<V, E>): Codec<Record<string, V>, E> {
  return {
    encode(entries, enc) {
      const names = Object.keys(entries);
      return carrier.encodeNamedEntries(enc, names, (i, child) => value.encode(entries[names[i]], child));
    },
    decode(enc) {
      const result: Record<string, V> = {};
      for (const [name, child] of carrier.decodeNamedEntries(enc)) {
        // Own property even for names such as __proto__.
        Object.defineProperty(result, name, {
          value: value.decode(child),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return result;
    },
  };
}
