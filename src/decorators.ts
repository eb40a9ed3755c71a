import { CodecError } from './errors.js';
import type { AbstractConstructor, TypeLike } from './types.js';

// declare symbol to contain a symbol and metadata
declare global {
  interface SymbolConstructor {
    metadata: symbol;
  }
}
// shim Symbol.metadata
Symbol.metadata ??= Symbol('metadata');

/**
 * A serialisable field declared on one class of a hierarchy.
 */
export interface DeclaredField {
  /** Field name without the `#` of private fields. */
  readonly name: string;
  readonly type: TypeLike;
  get(instance: unknown): unknown;
  set(instance: unknown, value: unknown): void;
}

export interface SerializableOptions {
  /** Type name used in type tags. Defaults to the class name. */
  name?: string;
  /** Final classes never carry a type tag where they are declared. */
  final?: boolean;
}

interface ClassInfo {
  fields: DeclaredField[];
  name?: string;
  final?: boolean;
}

const infoByMetadata = new WeakMap<object, ClassInfo>();
const knownClasses = new Map<string, AbstractConstructor>();

function ensureClassInfo(metadata: DecoratorMetadataObject): ClassInfo {
  let info = infoByMetadata.get(metadata);
  if (!info) {
    info = { fields: [] };
    infoByMetadata.set(metadata, info);
  }
  return info;
}

function ownClassInfo(ctor: AbstractConstructor): ClassInfo | undefined {
  const metadata: unknown = Object.getOwnPropertyDescriptor(ctor, Symbol.metadata)?.value;
  return typeof metadata === 'object' && metadata !== null ? infoByMetadata.get(metadata) : undefined;
}

/**
 * Marks an instance field as serialisable with the given declared type.
 * Undecorated fields are not encoded.
 *
 * @example
 * ```ts
 * class Point {
 *   @field(Types.int) x = 0;
 *   @field(Types.int) y = 0;
 * }
 * ```
 */
export function field(type: TypeLike) {
  return function field<This, Value>(_target: undefined, context: ClassFieldDecoratorContext<This, Value>): void {
    if (context.static) {
      throw new CodecError(`Static field ${String(context.name)} cannot be serialised`, {
        code: 'construction_failed',
        context: { field: String(context.name) },
      });
    }
    const name = typeof context.name === 'symbol' ? (context.name.description ?? '') : context.name.replace(/^#/, '');
    const { access } = context;

    ensureClassInfo(context.metadata).fields.push({ name, type, get: access.get, set: access.set });
  };
}

/**
 * Names a class for type tags and optionally marks it final. Named classes
 * can be decoded from a tag by any codec core.
 */
export function serializable(options: SerializableOptions = {}) {
  return function serializable<Class extends AbstractConstructor>(
    target: Class,
    context: ClassDecoratorContext<Class>
  ): void {
    const name = options.name ?? target.name;
    const existing = knownClasses.get(name);
    if (existing !== undefined && existing !== target) {
      throw new CodecError(`Serializable name ${name} is already used by another class; pass a distinct name`, {
        code: 'construction_failed',
        context: { type: name },
      });
    }
    const info = ensureClassInfo(context.metadata);
    info.name = name;
    info.final = options.final ?? false;
    knownClasses.set(name, target);
  };
}

/**
 * Declared fields of `ctor`, most-derived class first, then each ancestor.
 */
export function getDeclaredFields(ctor: AbstractConstructor): Array<{ owner: AbstractConstructor; field: DeclaredField }> {
  const result: Array<{ owner: AbstractConstructor; field: DeclaredField }> = [];
  for (let current: unknown = ctor; isClass(current); current = Object.getPrototypeOf(current)) {
    const info = ownClassInfo(current);
    for (const declared of info?.fields ?? []) {
      result.push({ owner: current, field: declared });
    }
  }
  return result;
}

function isClass(value: unknown): value is AbstractConstructor {
  return typeof value === 'function' && value !== Function.prototype;
}

export function getSerializableName(ctor: AbstractConstructor): string | undefined {
  return ownClassInfo(ctor)?.name;
}

export function isSerializableFinal(ctor: AbstractConstructor): boolean {
  return ownClassInfo(ctor)?.final ?? false;
}

export function findSerializableClass(name: string): AbstractConstructor | undefined {
  return knownClasses.get(name);
}
