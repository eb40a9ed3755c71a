import { CodecError } from './errors.js';

/**
 * Any class constructor, including abstract ones and ones with required parameters.
 */
export type AbstractConstructor<T = unknown> = abstract new (...args: never[]) => T;

export type PrimitiveKind = 'boolean' | 'byte' | 'char' | 'short' | 'int' | 'long' | 'float' | 'double';

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  'boolean',
  'byte',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
];

/** JS value carried by each primitive kind. */
export interface PrimitiveValues {
  boolean: boolean;
  byte: number;
  char: string;
  short: number;
  int: number;
  long: bigint;
  float: number;
  double: number;
}

/** JS array carried by each primitive array kind. */
export interface PrimitiveArrayValues {
  boolean: boolean[];
  byte: Int8Array;
  char: Uint16Array;
  short: Int16Array;
  int: Int32Array;
  long: BigInt64Array;
  float: Float32Array;
  double: Float64Array;
}

const INTEGER_RANGES: Readonly<Partial<Record<PrimitiveKind, readonly [number, number]>>> = {
  byte: [-0x80, 0x7f],
  short: [-0x8000, 0x7fff],
  int: [-0x80000000, 0x7fffffff],
};

const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;

function isPrimitiveValue(kind: PrimitiveKind, value: unknown): boolean {
  switch (kind) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'char':
      return typeof value === 'string' && value.length === 1;
    case 'long':
      return typeof value === 'bigint' && value >= LONG_MIN && value <= LONG_MAX;
    case 'float':
    case 'double':
      return typeof value === 'number';
    default: {
      const range = INTEGER_RANGES[kind];
      return (
        range !== undefined &&
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= range[0] &&
        value <= range[1]
      );
    }
  }
}

/**
 * Reject a value the primitive kind cannot carry, before a carrier writes it.
 */
export function checkPrimitive<K extends PrimitiveKind>(kind: K, value: unknown): asserts value is PrimitiveValues[K] {
  if (!isPrimitiveValue(kind, value)) {
    throw new CodecError(`${String(value)} is not a valid ${kind}`, {
      code: 'structural_mismatch',
      context: { type: kind },
    });
  }
}

/**
 * A TS enum object, or any object literal mapping member names to values.
 */
export type EnumObject = Readonly<Record<string, string | number>>;

export type TypeNode =
  | { readonly kind: 'primitive'; readonly prim: PrimitiveKind }
  | { readonly kind: 'primitiveArray'; readonly prim: PrimitiveKind }
  | { readonly kind: 'string' }
  | { readonly kind: 'enum'; readonly name: string; readonly values: EnumObject }
  | { readonly kind: 'array'; readonly element: TypeRef }
  | { readonly kind: 'set'; readonly element: TypeRef }
  | { readonly kind: 'map'; readonly key: TypeRef; readonly value: TypeRef }
  | { readonly kind: 'record'; readonly value: TypeRef }
  | { readonly kind: 'class'; readonly ctor: AbstractConstructor }
  | { readonly kind: 'unknown' }
  | { readonly kind: 'lazy'; readonly get: () => TypeLike };

/**
 * Runtime description of a declared type. `T` is the described value type
 * and only exists at compile time.
 */
export type TypeRef<T = unknown> = TypeNode & { readonly __type?: T };

export type TypeKind = TypeNode['kind'];

/**
 * A type ref with every lazy reference followed.
 */
export type ResolvedTypeRef = Exclude<TypeRef, { readonly kind: 'lazy' }>;

const TYPE_KINDS: ReadonlySet<string> = new Set<TypeKind>([
  'primitive',
  'primitiveArray',
  'string',
  'enum',
  'array',
  'set',
  'map',
  'record',
  'class',
  'unknown',
  'lazy',
]);

function isTypeNode(value: unknown): value is TypeNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    TYPE_KINDS.has(value.kind)
  );
}

export type BuiltinConstructor = BooleanConstructor | NumberConstructor | StringConstructor | BigIntConstructor;

/**
 * Anything accepted where a type is expected.
 */
export type TypeLike<T = unknown> = TypeRef<T> | AbstractConstructor<T> | BuiltinConstructor;

function isConstructor(value: unknown): value is AbstractConstructor {
  return typeof value === 'function';
}

function isBuiltinConstructor(type: unknown): type is BuiltinConstructor {
  return type === Boolean || type === Number || type === String || type === BigInt;
}

const builtinKinds = new Map<unknown, PrimitiveKind | 'string'>([
  [Boolean, 'boolean'],
  [Number, 'double'],
  [BigInt, 'long'],
  [String, 'string'],
]);

const unsupportedConstructors = new Set<unknown>([Object, Array, Map, Set, Function, Symbol]);

/**
 * Normalize a `TypeLike` into a `TypeRef`. Lazy refs are left unresolved.
 */
export function typeRef<T>(type: TypeLike<T>): TypeRef<T> {
  if (typeof type !== 'function') {
    if (isTypeNode(type)) return type;
    throw new CodecError(`Not a type: ${String(type)}`, { code: 'construction_failed' });
  }
  if (isBuiltinConstructor(type)) {
    const kind = builtinKinds.get(type);
    return kind === 'string' || kind === undefined ? { kind: 'string' } : { kind: 'primitive', prim: kind };
  }
  if (unsupportedConstructors.has(type)) {
    throw new CodecError(`Cannot determine element types of raw ${type.name}; declare it with Types instead`, {
      code: 'construction_failed',
      context: { type: type.name },
    });
  }
  return { kind: 'class', ctor: type };
}

/**
 * Follow lazy refs until a concrete node is reached.
 */
export function resolveLazy(type: TypeLike): ResolvedTypeRef {
  let ref: TypeRef = typeRef(type);
  let depth = 0;
  while (ref.kind === 'lazy') {
    if (++depth > 64) {
      throw new CodecError('Lazy type reference does not resolve to a concrete type', {
        code: 'construction_failed',
      });
    }
    ref = typeRef(followLazy(ref.get));
  }
  return ref;
}

function followLazy(get: () => TypeLike): TypeLike {
  try {
    return get();
  } catch (err) {
    if (err instanceof CodecError) throw err;
    throw new CodecError('Lazy type reference could not be evaluated', { code: 'construction_failed', cause: err });
  }
}

/**
 * Names of the members of an enum object, skipping the reverse mappings of
 * numeric TS enums.
 */
export function enumMemberNames(values: EnumObject): string[] {
  return Object.keys(values).filter((key) => Number.isNaN(Number(key)));
}

const boolean: TypeRef<boolean> = { kind: 'primitive', prim: 'boolean' };
const byte: TypeRef<number> = { kind: 'primitive', prim: 'byte' };
const char: TypeRef<string> = { kind: 'primitive', prim: 'char' };
const short: TypeRef<number> = { kind: 'primitive', prim: 'short' };
const int: TypeRef<number> = { kind: 'primitive', prim: 'int' };
const long: TypeRef<bigint> = { kind: 'primitive', prim: 'long' };
const float: TypeRef<number> = { kind: 'primitive', prim: 'float' };
const double: TypeRef<number> = { kind: 'primitive', prim: 'double' };
const string: TypeRef<string> = { kind: 'string' };
const unknown: TypeRef<unknown> = { kind: 'unknown' };

const booleanArray: TypeRef<boolean[]> = { kind: 'primitiveArray', prim: 'boolean' };
const byteArray: TypeRef<Int8Array> = { kind: 'primitiveArray', prim: 'byte' };
const charArray: TypeRef<Uint16Array> = { kind: 'primitiveArray', prim: 'char' };
const shortArray: TypeRef<Int16Array> = { kind: 'primitiveArray', prim: 'short' };
const intArray: TypeRef<Int32Array> = { kind: 'primitiveArray', prim: 'int' };
const longArray: TypeRef<BigInt64Array> = { kind: 'primitiveArray', prim: 'long' };
const floatArray: TypeRef<Float32Array> = { kind: 'primitiveArray', prim: 'float' };
const doubleArray: TypeRef<Float64Array> = { kind: 'primitiveArray', prim: 'double' };

function array<T>(element: TypeLike<T>): TypeRef<T[]> {
  return { kind: 'array', element: typeRef(element) };
}

function set<T>(element: TypeLike<T>): TypeRef<Set<T>> {
  return { kind: 'set', element: typeRef(element) };
}

function map<K, V>(key: TypeLike<K>, value: TypeLike<V>): TypeRef<Map<K, V>> {
  return { kind: 'map', key: typeRef(key), value: typeRef(value) };
}

function record<V>(value: TypeLike<V>): TypeRef<Record<string, V>> {
  return { kind: 'record', value: typeRef(value) };
}

function enumOf<E extends EnumObject>(values: E, name: string): TypeRef<E[Extract<keyof E, string>]> {
  return { kind: 'enum', name, values };
}

function of<T>(ctor: AbstractConstructor<T>): TypeRef<T> {
  return typeRef(ctor);
}

/**
 * Forward reference for a type declared later, e.g. a class whose field
 * refers back to itself.
 */
function lazy<T>(get: () => TypeLike<T>): TypeRef<T> {
  return { kind: 'lazy', get };
}

/**
 * Type ref factories.
 *
 * @example
 * ```ts
 * const Scores = Types.map(Types.string, Types.array(Types.int));
 * ```
 */
export const Types = {
  boolean,
  byte,
  char,
  short,
  int,
  long,
  float,
  double,
  string,
  unknown,

  booleanArray,
  byteArray,
  charArray,
  shortArray,
  intArray,
  longArray,
  floatArray,
  doubleArray,

  array,
  set,
  map,
  record,
  enumOf,
  of,
  lazy,
} as const;

const typedArrayKinds: ReadonlyArray<[abstract new (...args: never[]) => unknown, PrimitiveKind]> = [
  [Int8Array, 'byte'],
  [Uint16Array, 'char'],
  [Int16Array, 'short'],
  [Int32Array, 'int'],
  [BigInt64Array, 'long'],
  [Float32Array, 'float'],
  [Float64Array, 'double'],
];

/**
 * The concrete type of a present value, as far as the value itself tells.
 * Numbers are doubles and bigints longs; enum members surface as their
 * underlying string or number.
 */
export function runtimeTypeOf(value: unknown): TypeRef {
  switch (typeof value) {
    case 'boolean':
      return boolean;
    case 'number':
      return double;
    case 'bigint':
      return long;
    case 'string':
      return string;
    case 'object':
      break;
    default:
      throw new CodecError(`Cannot encode a value of type ${typeof value}`, {
        code: 'construction_failed',
        context: { type: typeof value },
      });
  }
  if (value === null) {
    throw new CodecError('Cannot determine the runtime type of null', { code: 'construction_failed' });
  }
  for (const [ctor, prim] of typedArrayKinds) {
    if (value instanceof ctor) return { kind: 'primitiveArray', prim };
  }
  if (Array.isArray(value)) return array(unknown);
  if (value instanceof Set) return set(unknown);
  if (value instanceof Map) return map(unknown, unknown);

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return record(unknown);

  const ctor: unknown = typeof proto === 'object' ? Reflect.get(proto, 'constructor') : undefined;
  if (!isConstructor(ctor)) {
    throw new CodecError('Cannot determine the class of a value without a constructor', {
      code: 'construction_failed',
    });
  }
  return { kind: 'class', ctor };
}

/**
 * Split the parameter list of a generic type name at top-level commas.
 */
export function splitTypeArguments(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const c = list[i];
    if (c === '<') depth++;
    else if (c === '>') depth--;
    else if (c === ',' && depth === 0) {
      parts.push(list.slice(start, i).trim());
      start = i + 1;
    }
  }
  parts.push(list.slice(start).trim());
  return parts;
}
