import type { Carrier, PrimitiveCodecs, Tagged } from './carrier.js';
import { NullCodec, PrimitiveCodec, type Codec } from './codec.js';
import { resolveConfig, type CodecConfig } from './config.js';
import { CodecCore, type CodecCoreOptions } from './core.js';
import { CodecError } from './errors.js';
import { checkPrimitive, type PrimitiveKind, type TypeLike } from './types.js';

export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function mismatch(expected: string, actual: JsonValue): CodecError {
  return new CodecError(`Expected ${expected}, got ${describe(actual)}`, {
    code: 'structural_mismatch',
    context: { expected, actual: describe(actual) },
  });
}

function setEntry(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

class JsonNullCodec extends NullCodec<JsonValue> {
  isNull(enc: JsonValue): boolean {
    return enc === null;
  }

  encode(): JsonValue {
    return null;
  }
}

class JsonPrimitiveCodec<T> extends PrimitiveCodec<T, JsonValue> {
  readonly #kind: PrimitiveKind;
  readonly #toJson: (value: T) => JsonValue;
  readonly #fromJson: (enc: JsonValue) => T;

  constructor(kind: PrimitiveKind, toJson: (value: T) => JsonValue, fromJson: (enc: JsonValue) => T) {
    super();
    this.#kind = kind;
    this.#toJson = toJson;
    this.#fromJson = fromJson;
  }

  encodeBare(value: T): JsonValue {
    checkPrimitive(this.#kind, value);
    return this.#toJson(value);
  }

  decodePrim(enc: JsonValue): T {
    return this.#fromJson(enc);
  }
}

function integer(kind: PrimitiveKind, min: number, max: number): PrimitiveCodec<number, JsonValue> {
  return new JsonPrimitiveCodec<number>(
    kind,
    (value) => value,
    (enc) => {
      if (typeof enc !== 'number' || !Number.isInteger(enc) || enc < min || enc > max) {
        throw mismatch(kind, enc);
      }
      return enc;
    }
  );
}

const NON_FINITE: Record<string, number> = { NaN: NaN, Infinity: Infinity, '-Infinity': -Infinity };

function floating(kind: PrimitiveKind): PrimitiveCodec<number, JsonValue> {
  return new JsonPrimitiveCodec<number>(
    kind,
    (value) => (Number.isFinite(value) ? value : String(value)),
    (enc) => {
      if (typeof enc === 'number') return enc;
      if (typeof enc === 'string' && Object.hasOwn(NON_FINITE, enc)) return NON_FINITE[enc];
      throw mismatch(kind, enc);
    }
  );
}

const primitives: PrimitiveCodecs<JsonValue> = {
  boolean: new JsonPrimitiveCodec<boolean>(
    'boolean',
    (value) => value,
    (enc) => {
      if (typeof enc !== 'boolean') throw mismatch('boolean', enc);
      return enc;
    }
  ),
  byte: integer('byte', -0x80, 0x7f),
  char: new JsonPrimitiveCodec<string>(
    'char',
    (value) => value,
    (enc) => {
      if (typeof enc !== 'string' || enc.length !== 1) throw mismatch('char', enc);
      return enc;
    }
  ),
  short: integer('short', -0x8000, 0x7fff),
  int: integer('int', -0x80000000, 0x7fffffff),
  long: new JsonPrimitiveCodec<bigint>(
    'long',
    (value) => value.toString(),
    (enc) => {
      if (typeof enc === 'number' && Number.isSafeInteger(enc)) return BigInt(enc);
      if (typeof enc !== 'string' || !/^-?\d+$/.test(enc)) throw mismatch('long', enc);
      return BigInt.asIntN(64, BigInt(enc));
    }
  ),
  float: floating('float'),
  double: floating('double'),
};

const stringCodec: Codec<string, JsonValue> = {
  encode: (value) => value,
  decode(enc) {
    if (typeof enc !== 'string') throw mismatch('string', enc);
    return enc;
  },
};

type TagLayout = Pick<CodecConfig, 'typeTagKey' | 'valueKey'>;

function encodeObject(names: readonly string[], encodeChild: (index: number, enc: JsonValue) => JsonValue): JsonObject {
  const result: JsonObject = {};
  names.forEach((name, i) => setEntry(result, name, encodeChild(i, null)));
  return result;
}

/**
 * Tree carrier over JSON values. Children are built bottom-up and returned,
 * so the parent node handed to a codec is never written to.
 *
 * - `null` is the null marker
 * - objects and string-keyed maps are JSON objects, sequences are arrays
 * - `long` is a decimal string, `char` a one-character string, and
 *   non-finite floats are the strings 'NaN', 'Infinity' and '-Infinity'
 * - a tagged value is `{ [typeTagKey]: name, [valueKey]: value }`
 */
export function createJsonCarrier(layout: TagLayout): Carrier<JsonValue> {
  const { typeTagKey, valueKey } = layout;

  return {
    name: 'json',
    nullCodec: new JsonNullCodec(),
    primitives,
    stringCodec,

    encodeEntries: (_enc, count, encodeEntry) => Array.from({ length: count }, (_, i) => encodeEntry(i, null)),

    decodeEntries(enc) {
      if (!Array.isArray(enc)) throw mismatch('array', enc);
      return enc;
    },

    encodeNamedEntries: (_enc, names, encodeEntry) => encodeObject(names, encodeEntry),

    decodeNamedEntries(enc) {
      if (!isJsonObject(enc)) throw mismatch('object', enc);
      return Object.entries(enc);
    },

    encodeFields: (_enc, names, encodeField) => encodeObject(names, encodeField),

    decodeField(enc, name) {
      if (!isJsonObject(enc)) throw mismatch('object', enc);
      if (!Object.hasOwn(enc, name)) {
        throw new CodecError(`Missing field ${name}`, { code: 'structural_mismatch', context: { field: name } });
      }
      return enc[name];
    },

    encodeTagged(_enc, typeName, encodeValue) {
      const value = encodeValue(null);
      if (typeName === undefined) return value;
      const tagged: JsonObject = {};
      setEntry(tagged, typeTagKey, typeName);
      setEntry(tagged, valueKey, value);
      return tagged;
    },

    decodeTagged(enc): Tagged<JsonValue> {
      if (isJsonObject(enc) && Object.keys(enc).length === 2 && Object.hasOwn(enc, valueKey)) {
        const typeName = enc[typeTagKey];
        if (typeof typeName === 'string') {
          return { typeName, value: enc[valueKey] };
        }
      }
      return { typeName: undefined, value: enc };
    },
  };
}

/**
 * Codec core over JSON values.
 *
 * @example
 * ```ts
 * const core = new JsonCodecCore();
 * const text = core.stringify(Types.of(Person), person);
 * const copy = core.parse(Types.of(Person), text);
 * ```
 */
export class JsonCodecCore extends CodecCore<JsonValue> {
  constructor(options: CodecCoreOptions = {}) {
    const { logger: _logger, ...config } = options;
    super(createJsonCarrier(resolveConfig(config)), options);
  }

  toJson<T>(type: TypeLike<T>, value: T | null | undefined): JsonValue {
    return this.encode(type, value, null);
  }

  fromJson<T>(type: TypeLike<T>, json: JsonValue): T | null {
    return this.decode(type, json);
  }

  stringify<T>(type: TypeLike<T>, value: T | null | undefined, space?: number): string {
    return JSON.stringify(this.toJson(type, value), null, space);
  }

  parse<T>(type: TypeLike<T>, text: string): T | null {
    let json: JsonValue;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new CodecError('Invalid JSON text', { code: 'structural_mismatch', cause: err });
    }
    return this.fromJson(type, json);
  }
}
