import { ByteBuffer } from './buffer.js';
import type { Carrier, PrimitiveCodecs, Tagged } from './carrier.js';
import { NullCodec, PrimitiveCodec, type Codec } from './codec.js';
import { CodecCore, type CodecCoreOptions } from './core.js';
import { CodecError } from './errors.js';
import { checkPrimitive, type PrimitiveKind, type TypeLike } from './types.js';

const ABSENT = 0;
const PRESENT = 1;

function readFlag(enc: ByteBuffer, what: string): boolean {
  const offset = enc.readPosition;
  const flag = enc.readU8();
  if (flag !== ABSENT && flag !== PRESENT) {
    throw new CodecError(`Invalid ${what} flag ${flag} at offset ${offset}`, {
      code: 'structural_mismatch',
      context: { offset, flag },
    });
  }
  return flag === PRESENT;
}

class ByteNullCodec extends NullCodec<ByteBuffer> {
  isNull(enc: ByteBuffer): boolean {
    return !readFlag(enc, 'null marker');
  }

  encode(_value: null, enc: ByteBuffer): ByteBuffer {
    enc.writeU8(ABSENT);
    return enc;
  }

  encodePresent(enc: ByteBuffer): ByteBuffer {
    enc.writeU8(PRESENT);
    return enc;
  }
}

class BytePrimitiveCodec<T> extends PrimitiveCodec<T, ByteBuffer> {
  readonly #kind: PrimitiveKind;
  readonly #write: (enc: ByteBuffer, value: T) => void;
  readonly #read: (enc: ByteBuffer) => T;

  constructor(kind: PrimitiveKind, write: (enc: ByteBuffer, value: T) => void, read: (enc: ByteBuffer) => T) {
    super();
    this.#kind = kind;
    this.#write = write;
    this.#read = read;
  }

  encodePrim(value: T, enc: ByteBuffer): ByteBuffer {
    checkPrimitive(this.#kind, value);
    this.#write(enc, value);
    return enc;
  }

  decodePrim(enc: ByteBuffer): T {
    return this.#read(enc);
  }
}

function createPrimitiveCodec<T>(
  kind: PrimitiveKind,
  write: (enc: ByteBuffer, value: T) => void,
  read: (enc: ByteBuffer) => T
): PrimitiveCodec<T, ByteBuffer> {
  return new BytePrimitiveCodec(kind, write, read);
}

const primitives: PrimitiveCodecs<ByteBuffer> = {
  boolean: createPrimitiveCodec<boolean>('boolean', (w, v) => w.writeBool(v), (r) => r.readBool()),
  byte: createPrimitiveCodec<number>('byte', (w, v) => w.writeI8(v), (r) => r.readI8()),
  char: createPrimitiveCodec<string>(
    'char',
    (w, v) => w.writeU16(v.charCodeAt(0)),
    (r) => String.fromCharCode(r.readU16())
  ),
  short: createPrimitiveCodec<number>('short', (w, v) => w.writeI16(v), (r) => r.readI16()),
  int: createPrimitiveCodec<number>('int', (w, v) => w.writeI32(v), (r) => r.readI32()),
  long: createPrimitiveCodec<bigint>('long', (w, v) => w.writeI64(v), (r) => r.readI64()),
  float: createPrimitiveCodec<number>('float', (w, v) => w.writeF32(v), (r) => r.readF32()),
  double: createPrimitiveCodec<number>('double', (w, v) => w.writeF64(v), (r) => r.readF64()),
};

const stringCodec: Codec<string, ByteBuffer> = {
  encode(value, enc) {
    enc.writeString(value);
    return enc;
  },
  decode: (enc) => enc.readString(),
};

function* readEntries(enc: ByteBuffer): Generator<ByteBuffer> {
  const count = enc.readU32();
  for (let i = 0; i < count; i++) {
    yield enc;
  }
}

function* readNamedEntries(enc: ByteBuffer): Generator<readonly [string, ByteBuffer]> {
  const count = enc.readU32();
  for (let i = 0; i < count; i++) {
    yield [enc.readString(), enc];
  }
}

/**
 * Byte-stream carrier. Every codec appends to, or reads sequentially from,
 * the same buffer:
 *
 * - absent values are a 0 flag byte, present ones a 1 followed by the value
 * - sequences and string-keyed maps are a u32 count followed by the entries
 * - object fields are written in declaration order without names
 * - a type tag is a flag byte, then the length-prefixed UTF-8 type name
 */
export const byteCarrier: Carrier<ByteBuffer> = {
  name: 'bytes',
  nullCodec: new ByteNullCodec(),
  primitives,
  stringCodec,

  encodeEntries(enc, count, encodeEntry) {
    enc.writeU32(count);
    for (let i = 0; i < count; i++) {
      encodeEntry(i, enc);
    }
    return enc;
  },

  decodeEntries: readEntries,

  encodeNamedEntries(enc, names, encodeEntry) {
    enc.writeU32(names.length);
    names.forEach((name, i) => {
      enc.writeString(name);
      encodeEntry(i, enc);
    });
    return enc;
  },

  decodeNamedEntries: readNamedEntries,

  encodeFields(enc, names, encodeField) {
    for (let i = 0; i < names.length; i++) {
      encodeField(i, enc);
    }
    return enc;
  },

  decodeField: (enc) => enc,

  encodeTagged(enc, typeName, encodeValue) {
    if (typeName === undefined) {
      enc.writeU8(ABSENT);
    } else {
      enc.writeU8(PRESENT);
      enc.writeString(typeName);
    }
    return encodeValue(enc);
  },

  decodeTagged(enc): Tagged<ByteBuffer> {
    const typeName = readFlag(enc, 'type tag') ? enc.readString() : undefined;
    return { typeName, value: enc };
  },
};

/**
 * Codec core over a `ByteBuffer`.
 *
 * @example
 * ```ts
 * const core = new ByteCodecCore();
 * const bytes = core.toBytes(Types.of(Person), person);
 * const copy = core.fromBytes(Types.of(Person), bytes);
 * ```
 */
export class ByteCodecCore extends CodecCore<ByteBuffer> {
  constructor(options: CodecCoreOptions = {}) {
    super(byteCarrier, options);
  }

  toBytes<T>(type: TypeLike<T>, value: T | null | undefined): Uint8Array {
    const buffer = new ByteBuffer();
    this.encode(type, value, buffer);
    return buffer.finish();
  }

  /**
   * Decode a whole buffer; bytes left over after the value are an error.
   */
  fromBytes<T>(type: TypeLike<T>, bytes: Uint8Array): T | null {
    const buffer = ByteBuffer.from(bytes);
    const value = this.decode(type, buffer);
    if (buffer.remaining !== 0) {
      throw new CodecError(`${buffer.remaining} trailing bytes after decoded value`, {
        code: 'structural_mismatch',
        context: { remaining: buffer.remaining },
      });
    }
    return value;
  }
}
