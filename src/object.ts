import type { Carrier } from './carrier.js';
import type { Codec } from './codec.js';
import { getDeclaredFields, type DeclaredField } from './decorators.js';
import { wrapError } from './errors.js';
import type { AbstractConstructor, TypeRef } from './types.js';

/**
 * One named field of an object codec. `A` is the decode accumulator.
 */
export interface ObjectField<T, E, A> {
  readonly name: string;
  encodeField(value: T, enc: E): E;
  decodeField(acc: A, enc: E): A;
}

/**
 * Ordered fields plus the decode lifecycle shared by reflective and
 * builder-made object codecs.
 */
export interface ObjectMeta<T, E, A> {
  readonly fields: readonly ObjectField<T, E, A>[];
  /** Fresh accumulator; `type` is the declared or tagged type, if known. */
  startDecode(type: TypeRef<T> | undefined): A;
  construct(acc: A): T;
}

/**
 * Object codec driven by `meta`: fields are written and read under their
 * names, in declaration order.
 */
export function createObjectCodec<T, E, A>(carrier: Carrier<E>, meta: ObjectMeta<T, E, A>): Codec<T, E> {
  const { fields } = meta;
  const names = fields.map((f) => f.name);

  return {
    encode(value, enc) {
      return carrier.encodeFields(enc, names, (i, child) => {
        const field = fields[i];
        try {
          return field.encodeField(value, child);
        } catch (err) {
          throw wrapError(err, `Failed to encode field ${field.name}`, { field: field.name });
        }
      });
    },

    decode(enc, type) {
      let acc = meta.startDecode(type);
      for (const field of fields) {
        try {
          acc = field.decodeField(acc, carrier.decodeField(enc, field.name));
        } catch (err) {
          throw wrapError(err, `Failed to decode field ${field.name}`, { field: field.name });
        }
      }
      return meta.construct(acc);
    },
  };
}

export interface NamedField {
  /** Name after collision prefixing. */
  readonly name: string;
  readonly owner: AbstractConstructor;
  readonly declared: DeclaredField;
}

/**
 * Serialisable fields of a class hierarchy, most-derived first. An inherited
 * field whose name is already taken is prefixed with `collisionPrefix` until
 * the name is unique.
 */
export function reflectFields(ctor: AbstractConstructor, collisionPrefix: string): NamedField[] {
  const taken = new Set<string>();
  return getDeclaredFields(ctor).map(({ owner, field }) => {
    let name = field.name;
    while (taken.has(name)) {
      name = collisionPrefix + name;
    }
    taken.add(name);
    return { name, owner, declared: field };
  });
}
