import { ObjectCodecBuilder, type ObjectCodecFactory } from './builder.js';
import type { Carrier } from './carrier.js';
import { forwardingCodec, isCodec, transform, type Codec } from './codec.js';
import { array, enumCodec, map, primitiveArray, record, set } from './collections.js';
import { resolveConfig, type CodecConfig } from './config.js';
import { findSerializableClass, getSerializableName, isSerializableFinal } from './decorators.js';
import { CodecError } from './errors.js';
import { registerDateCodec } from './lib/date.js';
import { createLogger, type Logger } from './logger.js';
import { createObjectCodec, reflectFields, type ObjectField } from './object.js';
import { Registry, type Forward } from './registry.js';
import {
  PRIMITIVE_KINDS,
  resolveLazy,
  runtimeTypeOf,
  splitTypeArguments,
  typeRef,
  type AbstractConstructor,
  type EnumObject,
  type PrimitiveKind,
  type ResolvedTypeRef,
  type TypeLike,
  type TypeRef,
} from './types.js';
import { dynamicCodec, nullSafe, type TypeResolver } from './wrappers.js';

/**
 * Allocates a bare instance whose fields are filled in during decode.
 */
export type TypeConstructor<T> = () => T;

export interface CodecCoreOptions extends Partial<CodecConfig> {
  /** Logger to use instead of one created from `logLevel`. */
  logger?: Logger;
}

export interface RegisterTypeOptions {
  /** Type name used in type tags. Defaults to the class name. */
  name?: string;
  /** Final classes never carry a type tag where they are declared. */
  final?: boolean;
}

function codecForward<E>(name: string): Forward<Codec<unknown, E>> {
  const handle = forwardingCodec<unknown, E>(name);
  return { handle, install: (codec) => handle.install(codec) };
}

function typeConstructorForward(name: string): Forward<TypeConstructor<unknown>> {
  let target: TypeConstructor<unknown> | undefined;
  return {
    handle: () => {
      if (!target) {
        throw new CodecError(`Type constructor for ${name} used before it was built`, {
          code: 'uninitialised_reference',
          context: { type: name },
        });
      }
      return target();
    },
    install(ctor) {
      target = ctor;
    },
  };
}

/**
 * Carrier-independent codec engine. A concrete core supplies the carrier; all
 * type resolution, caching and wrapping happens here.
 */
export abstract class CodecCore<E> implements TypeResolver<E>, ObjectCodecFactory<E> {
  readonly config: CodecConfig;
  readonly logger: Logger;
  readonly carrier: Carrier<E>;

  readonly #codecs: Registry<Codec<unknown, E>>;
  readonly #typeConstructors: Registry<TypeConstructor<unknown>>;
  readonly #typeProxies = new Map<string, TypeRef>();
  readonly #classNames = new Map<AbstractConstructor, string>();
  readonly #finalClasses = new Set<AbstractConstructor>();
  readonly #registeredClasses = new Set<AbstractConstructor>();
  readonly #namedTypes = new Map<string, ResolvedTypeRef>();

  protected constructor(carrier: Carrier<E>, options: CodecCoreOptions = {}) {
    const { logger, ...config } = options;
    this.config = resolveConfig(config);
    this.carrier = carrier;
    this.logger = (logger ?? createLogger({ level: this.config.logLevel })).child({ carrier: carrier.name });
    this.#codecs = new Registry({ label: 'codec', createForward: codecForward<E>, logger: this.logger });
    this.#typeConstructors = new Registry({
      label: 'typeConstructor',
      createForward: typeConstructorForward,
      logger: this.logger,
    });

    if (this.config.registerDefaults) {
      registerDefaultCodecs(this);
    }
  }

  // ==========================================================================
  // Encode / decode
  // ==========================================================================

  /**
   * Encode a value as its runtime type.
   */
  encode<T>(value: T, enc: E): E;
  /**
   * Encode a value declared as `type`. A value of another runtime type is
   * tagged unless `type` is final.
   */
  encode<T>(type: TypeLike<T>, value: T | null | undefined, enc: E): E;
  encode(...args: [unknown, E] | [TypeLike, unknown, E]): E {
    if (args.length === 3) {
      const [type, value, enc] = args;
      return this.#rootCodec(type).encode(value, enc);
    }
    const [value, enc] = args;
    if (value === null || value === undefined) {
      return this.carrier.nullCodec.encode(null, enc);
    }
    return this.#rootCodec(runtimeTypeOf(value)).encode(value, enc);
  }

  /**
   * Decode a value declared as `type`. An absent value decodes as `null`.
   */
  decode<T>(type: TypeLike<T>, enc: E): T | null {
    return this.#rootCodec(type).decode(enc) as T | null;
  }

  #rootCodec(type: TypeLike): Codec<unknown, E> {
    const ref = typeRef(type);
    const base = this.isFinal(ref) ? this.getNullUnsafeCodec(ref) : dynamicCodec(this, ref);
    return nullSafe(this.carrier, base);
  }

  // ==========================================================================
  // Codec resolution
  // ==========================================================================

  /**
   * The shared codec for `type`, built on first request. Does not accept
   * absent values.
   */
  getNullUnsafeCodec<T>(type: TypeLike<T>): Codec<T, E> {
    const ref = this.remapType(type);
    const name = this.typeName(ref);
    return this.#codecs.resolve(name, () => this.#buildCodec(ref)) as Codec<T, E>;
  }

  /**
   * The shared codec for `type`, wrapped to accept absent values.
   */
  getNullSafeCodec<T>(type: TypeLike<T>): Codec<T | null, E> {
    return nullSafe(this.carrier, this.getNullUnsafeCodec(type));
  }

  makeNullSafeCodec<T>(codec: Codec<T, E>): Codec<T | null, E> {
    return nullSafe(this.carrier, codec);
  }

  /**
   * Codec that tags values whose runtime type differs from `declared`.
   */
  dynamicCodec<T>(declared: TypeLike<T>): Codec<T, E>;
  dynamicCodec<T>(codec: Codec<T, E>, declared: TypeLike<T>): Codec<T, E>;
  dynamicCodec<T>(codecOrType: Codec<T, E> | TypeLike<T>, declared?: TypeLike<T>): Codec<T, E> {
    if (declared === undefined) {
      if (isCodec(codecOrType)) {
        throw new CodecError('A declared type is required with an explicit codec', { code: 'construction_failed' });
      }
      return dynamicCodec(this, typeRef(codecOrType)) as Codec<T, E>;
    }
    const codec = isCodec(codecOrType) ? codecOrType : this.getNullUnsafeCodec(codecOrType);
    return dynamicCodec(this, typeRef(declared), codec) as Codec<T, E>;
  }

  /**
   * Codec for a declared field type: dynamic unless the type is final.
   */
  fieldCodec<T>(type: TypeLike<T>): Codec<T, E> {
    const ref = typeRef(type);
    if (this.isFinal(ref)) return this.getNullUnsafeCodec(ref);
    return dynamicCodec(this, ref) as Codec<T, E>;
  }

  #buildCodec(ref: ResolvedTypeRef): Codec<unknown, E> {
    const { carrier } = this;
    switch (ref.kind) {
      case 'primitive':
        return carrier.primitives[ref.prim];
      case 'primitiveArray':
        return primitiveArray(carrier, ref.prim);
      case 'enum':
        return enumCodec(carrier, ref.name, ref.values);
      case 'string':
        return carrier.stringCodec;
      case 'map':
        return map(carrier, this.#elementCodec(ref.key), this.#elementCodec(ref.value));
      case 'record':
        return record(carrier, this.#elementCodec(ref.value));
      case 'array':
        return array(carrier, this.#elementCodec(ref.element));
      case 'set':
        return set(carrier, this.#elementCodec(ref.element));
      case 'unknown':
        return dynamicCodec(this, ref);
      case 'class':
        return this.createObjectCodec(ref);
    }
  }

  /** Container elements and map entries may be absent. */
  #elementCodec(type: TypeRef): Codec<unknown, E> {
    return nullSafe(this.carrier, this.fieldCodec(type));
  }

  // ==========================================================================
  // Object codecs
  // ==========================================================================

  /**
   * Reflective object codec over the `@field` declarations of a class and
   * its ancestors.
   */
  createObjectCodec<T>(type: TypeLike<T>): Codec<T, E> {
    const ref = resolveLazy(type);
    if (ref.kind !== 'class') {
      throw new CodecError(`${this.typeName(ref)} is not a class`, { code: 'construction_failed' });
    }
    const name = this.typeName(ref);
    const fields = reflectFields(ref.ctor, this.config.fieldCollisionPrefix);
    if (fields.length === 0) {
      this.logger.warn({ type: name }, 'class has no serialisable fields');
    }

    const objectFields = fields.map(({ name: fieldName, declared }): ObjectField<unknown, E, unknown> => {
      const codec = this.#reflectedFieldCodec(typeRef(declared.type));
      return {
        name: fieldName,
        encodeField: (value, enc) => codec.encode(declared.get(value), enc),
        decodeField(acc, enc) {
          declared.set(acc, codec.decode(enc));
          return acc;
        },
      };
    });

    return createObjectCodec(this.carrier, {
      fields: objectFields,
      startDecode: (decodeType) => this.getTypeConstructor(decodeType ?? ref)(),
      construct: (acc) => acc,
    }) as Codec<T, E>;
  }

  /** Primitive fields are written bare; everything else may be absent. */
  #reflectedFieldCodec(type: TypeRef): Codec<unknown, E> {
    const ref = resolveLazy(type);
    return ref.kind === 'primitive' ? this.getNullUnsafeCodec(ref) : this.#elementCodec(ref);
  }

  /**
   * Start an explicit field list for `type`.
   */
  objectCodec<T>(type: TypeLike<T>): ObjectCodecBuilder<T, E> {
    return new ObjectCodecBuilder(this, typeRef(type));
  }

  /**
   * Like `objectCodec`, and the finished codec is registered for `type`.
   */
  registerObjectCodec<T>(type: TypeLike<T>): ObjectCodecBuilder<T, E> {
    const ref = typeRef(type);
    return new ObjectCodecBuilder(this, ref, [], (codec) => this.registerCodec(ref, codec));
  }

  buildObjectCodec<T>(
    type: TypeRef<T>,
    fields: readonly ObjectField<T, E, unknown[]>[],
    construct: (args: unknown[]) => T
  ): Codec<T, E> {
    this.logger.debug({ type: this.typeName(type), fields: fields.map((f) => f.name) }, 'object codec built');
    return createObjectCodec(this.carrier, { fields, startDecode: () => [], construct });
  }

  /**
   * How bare instances of `type` are allocated during reflective decode.
   */
  getTypeConstructor<T>(type: TypeLike<T>): TypeConstructor<T> {
    const ref = this.remapType(type);
    const name = this.typeName(ref);
    return this.#typeConstructors.resolve(name, () => defaultTypeConstructor(ref, name)) as TypeConstructor<T>;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  registerCodec<T>(type: TypeLike<T> | string, codec: Codec<T, E>): void {
    this.#codecs.register(this.#registeredName(type), codec);
  }

  registerTypeConstructor<T>(type: TypeLike<T> | string, ctor: TypeConstructor<T>): void {
    this.#typeConstructors.register(this.#registeredName(type), ctor);
  }

  /**
   * Resolve `type` as `proxy`, e.g. an abstract class as its implementation.
   */
  registerTypeProxy(type: TypeLike | string, proxy: TypeLike): void {
    const name = this.#registeredName(type);
    this.#typeProxies.set(name, typeRef(proxy));
    this.logger.debug({ type: name, proxy: this.typeName(proxy) }, 'type proxy registered');
  }

  /**
   * Name a class for type tags on this core and optionally mark it final.
   */
  registerType<T>(ctor: AbstractConstructor<T>, options: RegisterTypeOptions = {}): TypeRef<T> {
    const ref = typeRef(ctor);
    const name = options.name ?? getSerializableName(ctor) ?? ctor.name;
    this.#claimName(name, { kind: 'class', ctor });
    this.#classNames.set(ctor, name);
    this.#registeredClasses.add(ctor);
    if (options.final) this.#finalClasses.add(ctor);
    this.logger.debug({ type: name, final: options.final ?? false }, 'type registered');
    return ref;
  }

  /**
   * Make an enum decodable from its name in type tags.
   */
  registerEnum<V extends EnumObject>(values: V, name: string): TypeRef<V[Extract<keyof V, string>]> {
    const ref: TypeRef<V[Extract<keyof V, string>]> = { kind: 'enum', name, values };
    this.#claimName(name, { kind: 'enum', name, values });
    this.logger.debug({ type: name }, 'enum registered');
    return ref;
  }

  /**
   * Encode `type` through its string form.
   */
  registerStringProxyCodec<T>(type: TypeLike<T>, toString: (value: T) => string, fromString: (text: string) => T): void {
    this.registerCodec(type, transform(this.carrier.stringCodec, fromString, toString));
  }

  // ==========================================================================
  // Type identity
  // ==========================================================================

  /**
   * Canonical name of a type, used as its registry key and in type tags.
   */
  typeName(type: TypeLike): string {
    const ref = resolveLazy(type);
    switch (ref.kind) {
      case 'primitive':
        return ref.prim;
      case 'primitiveArray':
        return `${ref.prim}[]`;
      case 'string':
      case 'unknown':
        return ref.kind;
      case 'enum':
        this.#claimName(ref.name, ref);
        return ref.name;
      case 'array':
        return `Array<${this.typeName(ref.element)}>`;
      case 'set':
        return `Set<${this.typeName(ref.element)}>`;
      case 'map':
        return `Map<${this.typeName(ref.key)},${this.typeName(ref.value)}>`;
      case 'record':
        return `Record<${this.typeName(ref.value)}>`;
      case 'class': {
        const name = this.#classNames.get(ref.ctor) ?? getSerializableName(ref.ctor) ?? ref.ctor.name;
        if (!name) {
          throw new CodecError('Anonymous classes need a name; use registerType or @serializable', {
            code: 'construction_failed',
          });
        }
        this.#claimName(name, ref);
        return name;
      }
    }
  }

  /**
   * Name written in the type tag of a value of `type`. A class can only be
   * tagged once it is named with `registerType`, `@serializable` or one of
   * the other registrations, so that another core can resolve the tag.
   */
  tagName(type: TypeLike): string {
    const ref = resolveLazy(type);
    const name = this.typeName(ref);
    if (ref.kind === 'class' && !this.#registeredClasses.has(ref.ctor) && getSerializableName(ref.ctor) === undefined) {
      throw new CodecError(`Class ${name} needs registerType or @serializable before it can be written with a type tag`, {
        code: 'unknown_type',
        context: { type: name },
      });
    }
    return name;
  }

  /** Bind `name` to `ref`; a different type already holding the name is an error. */
  #claimName(name: string, ref: ResolvedTypeRef): void {
    const existing = this.#namedTypes.get(name);
    if (existing === undefined) {
      this.#namedTypes.set(name, ref);
      return;
    }
    if (!sameNamedType(existing, ref)) {
      throw new CodecError(
        `Type name ${name} is already taken by another type; name one of them with registerType or @serializable`,
        { code: 'construction_failed', context: { type: name } }
      );
    }
  }

  #registeredName(type: TypeLike | string): string {
    if (typeof type === 'string') return type;
    const ref = resolveLazy(type);
    if (ref.kind === 'class') this.#registeredClasses.add(ref.ctor);
    return this.typeName(ref);
  }

  /**
   * The type a name refers to, as produced by `typeName`.
   */
  nameToType(name: string): TypeRef {
    if (isPrimitiveKind(name)) return { kind: 'primitive', prim: name };
    if (name === 'string' || name === 'unknown') return { kind: name };

    const arrayOf = name.endsWith('[]') ? name.slice(0, -2) : undefined;
    if (arrayOf !== undefined && isPrimitiveKind(arrayOf)) return { kind: 'primitiveArray', prim: arrayOf };

    const generic = /^(Array|Set|Map|Record)<(.*)>$/.exec(name);
    if (generic) {
      const [, container, list] = generic;
      const args = splitTypeArguments(list).map((arg) => this.nameToType(arg));
      if (container === 'Map' && args.length === 2) return { kind: 'map', key: args[0], value: args[1] };
      if (args.length === 1) {
        if (container === 'Array') return { kind: 'array', element: args[0] };
        if (container === 'Set') return { kind: 'set', element: args[0] };
        if (container === 'Record') return { kind: 'record', value: args[0] };
      }
    }

    const named = this.#namedTypes.get(name);
    if (named) return named;

    const serializable = findSerializableClass(name);
    if (serializable) return typeRef(serializable);

    throw new CodecError(`Unknown type name ${name}`, { code: 'unknown_type', context: { type: name } });
  }

  /**
   * The type actually resolved for `type` once proxies apply.
   */
  remapType(type: TypeLike): ResolvedTypeRef {
    const ref = resolveLazy(type);
    const proxy = this.#typeProxies.get(this.typeName(ref));
    return proxy === undefined ? ref : resolveLazy(proxy);
  }

  /**
   * Final types never need a type tag.
   */
  isFinal(type: TypeLike): boolean {
    const ref = resolveLazy(type);
    switch (ref.kind) {
      case 'unknown':
        return false;
      case 'class':
        return this.#finalClasses.has(ref.ctor) || isSerializableFinal(ref.ctor);
      default:
        return true;
    }
  }
}

function sameNamedType(a: ResolvedTypeRef, b: ResolvedTypeRef): boolean {
  if (a.kind === 'class' && b.kind === 'class') return a.ctor === b.ctor;
  if (a.kind === 'enum' && b.kind === 'enum') return a.values === b.values;
  return false;
}

function isPrimitiveKind(name: string): name is PrimitiveKind {
  return PRIMITIVE_KINDS.some((kind) => kind === name);
}

function defaultTypeConstructor(ref: TypeRef, name: string): TypeConstructor<unknown> {
  if (ref.kind !== 'class') {
    throw new CodecError(`${name} is not instantiated reflectively`, {
      code: 'instantiation_failed',
      context: { type: name },
    });
  }
  const { ctor } = ref;
  if (ctor.length > 0) {
    throw new CodecError(`${name} has no no-argument constructor; register a type constructor for it`, {
      code: 'instantiation_failed',
      context: { type: name },
    });
  }
  return () => {
    try {
      const instance: unknown = Reflect.construct(ctor, []);
      return instance;
    } catch (err) {
      throw new CodecError(`Failed to instantiate ${name}`, {
        code: 'instantiation_failed',
        context: { type: name },
        cause: err,
      });
    }
  };
}

function registerDefaultCodecs<E>(core: CodecCore<E>): void {
  registerDateCodec(core);
}
