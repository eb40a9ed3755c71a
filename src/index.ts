/**
 * polycodec: a carrier-agnostic object codec engine.
 *
 * @example
 * ```ts
 * import { JsonCodecCore, Types, field } from 'polycodec';
 *
 * class Point {
 *   @field(Types.int) x = 0;
 *   @field(Types.int) y = 0;
 * }
 *
 * const core = new JsonCodecCore();
 * core.toJson(Point, Object.assign(new Point(), { x: 1, y: 2 })); // { x: 1, y: 2 }
 * ```
 */

// Codec contract
export {
  type Codec,
  type ForwardingCodec,
  PrimitiveCodec,
  NullCodec,
  isCodec,
  forwardingCodec,
  transform,
} from './codec.js';

// Types
export {
  type AbstractConstructor,
  type BuiltinConstructor,
  type EnumObject,
  type PrimitiveArrayValues,
  type PrimitiveKind,
  type PrimitiveValues,
  type ResolvedTypeRef,
  type TypeKind,
  type TypeLike,
  type TypeNode,
  type TypeRef,
  PRIMITIVE_KINDS,
  Types,
  checkPrimitive,
  enumMemberNames,
  resolveLazy,
  runtimeTypeOf,
  typeRef,
} from './types.js';

// Core
export {
  type CodecCoreOptions,
  type RegisterTypeOptions,
  type TypeConstructor,
  CodecCore,
} from './core.js';
export { type Forward, type RegistryOptions, Registry } from './registry.js';
export { type Carrier, type EncodeChild, type PrimitiveCodecs, type Tagged } from './carrier.js';
export { type TypeResolver, dynamicCodec, nullSafe } from './wrappers.js';
export { type NamedField, type ObjectField, type ObjectMeta, createObjectCodec, reflectFields } from './object.js';
export { type ObjectCodecFactory, ObjectCodecBuilder } from './builder.js';
export * as collections from './collections.js';

// Declarations
export { type DeclaredField, type SerializableOptions, field, serializable } from './decorators.js';

// Carriers
export { type JsonObject, type JsonValue, JsonCodecCore, createJsonCarrier, isJsonObject } from './json-core.js';
export { ByteCodecCore, byteCarrier } from './byte-core.js';
export { type ByteBufferOptions, ByteBuffer } from './buffer.js';

// Ambient
export {
  type CodecErrorCode,
  type CodecErrorContext,
  type CodecErrorOptions,
  type SerializedCodecError,
  CodecError,
  OperationNotImplementedError,
  isCodecError,
  wrapError,
} from './errors.js';
export { type CodecConfig, type LogLevel, DEFAULT_CONFIG, LOG_LEVELS, codecConfigSchema, resolveConfig } from './config.js';
export { type Logger, type LoggerOptions, createLogger } from './logger.js';
export { registerDateCodec } from './lib/date.js';
