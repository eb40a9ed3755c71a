import { describe, it, expect } from 'vitest';
import {
  JsonCodecCore,
  Types,
  field,
  resolveLazy,
  runtimeTypeOf,
  typeRef,
  enumMemberNames,
  type TypeLike,
  type TypeRef,
} from '../src/index.js';
import { splitTypeArguments } from '../src/types.js';
import { catchError } from './helpers.js';
import { Colour, ColourType, Custom, Dog, ListNode } from './models.js';

describe('typeRef', () => {
  it('should map builtin constructors to primitive kinds', () => {
    expect(typeRef(Boolean)).toEqual({ kind: 'primitive', prim: 'boolean' });
    expect(typeRef(Number)).toEqual({ kind: 'primitive', prim: 'double' });
    expect(typeRef(BigInt)).toEqual({ kind: 'primitive', prim: 'long' });
    expect(typeRef(String)).toEqual({ kind: 'string' });
  });

  it('should treat other constructors as classes', () => {
    expect(typeRef(Custom)).toEqual({ kind: 'class', ctor: Custom });
  });

  it('should reject raw collection constructors', () => {
    expect(catchError(() => typeRef(Map))).toMatchObject({ code: 'construction_failed' });
    expect(catchError(() => typeRef(Array))).toMatchObject({ code: 'construction_failed' });
  });

  it('should pass type refs through', () => {
    expect(typeRef(Types.int)).toBe(Types.int);
  });
});

describe('resolveLazy', () => {
  it('should follow lazy references', () => {
    expect(resolveLazy(Types.lazy(() => Types.lazy(() => ListNode)))).toEqual({ kind: 'class', ctor: ListNode });
  });

  it('should give up on a reference cycle', () => {
    const loop: TypeRef = Types.lazy(() => loop);

    expect(catchError(() => resolveLazy(loop))).toMatchObject({ code: 'construction_failed' });
  });

  it('should report a throwing reference as a construction failure', () => {
    const failure = new Error('not ready');
    const broken = Types.lazy((): TypeLike => {
      throw failure;
    });

    expect(catchError(() => resolveLazy(broken))).toMatchObject({
      code: 'construction_failed',
      message: 'Lazy type reference could not be evaluated',
      cause: failure,
    });
  });

  it('should reject a reference whose target is still unassigned', () => {
    let Later: TypeLike;
    const pending = Types.lazy(() => Later);

    expect(catchError(() => resolveLazy(pending))).toMatchObject({
      code: 'construction_failed',
      message: 'Not a type: undefined',
    });
    Later = Types.string;
    expect(resolveLazy(pending)).toBe(Types.string);
  });

  it('should report a reference to a class declared later as a construction failure', () => {
    const pending = Types.lazy(() => Later);
    const early = catchError(() => resolveLazy(pending));
    class Later {}

    expect(early).toMatchObject({
      code: 'construction_failed',
      message: 'Lazy type reference could not be evaluated',
    });
    expect(resolveLazy(pending)).toEqual({ kind: 'class', ctor: Later });
  });
});

describe('runtimeTypeOf', () => {
  it('should classify scalar values', () => {
    expect(runtimeTypeOf(true)).toBe(Types.boolean);
    expect(runtimeTypeOf(1)).toBe(Types.double);
    expect(runtimeTypeOf(1n)).toBe(Types.long);
    expect(runtimeTypeOf('a')).toBe(Types.string);
  });

  it('should classify containers', () => {
    expect(runtimeTypeOf(new Int32Array(1))).toEqual(Types.intArray);
    expect(runtimeTypeOf([])).toEqual(Types.array(Types.unknown));
    expect(runtimeTypeOf(new Set())).toEqual(Types.set(Types.unknown));
    expect(runtimeTypeOf(new Map())).toEqual(Types.map(Types.unknown, Types.unknown));
    expect(runtimeTypeOf({ a: 1 })).toEqual(Types.record(Types.unknown));
  });

  it('should classify class instances by constructor', () => {
    expect(runtimeTypeOf(new Dog())).toEqual({ kind: 'class', ctor: Dog });
  });

  it('should reject values without a type', () => {
    expect(catchError(() => runtimeTypeOf(null))).toMatchObject({ code: 'construction_failed' });
    expect(catchError(() => runtimeTypeOf(() => 1))).toMatchObject({ code: 'construction_failed' });
  });
});

describe('enumMemberNames', () => {
  it('should list string enum members', () => {
    expect(enumMemberNames(Colour)).toEqual(['Red', 'Green', 'Blue']);
  });

  it('should skip numeric reverse mappings', () => {
    expect(enumMemberNames({ 0: 'Low', 1: 'High', Low: 0, High: 1 })).toEqual(['Low', 'High']);
  });
});

describe('splitTypeArguments', () => {
  it('should split only at top-level commas', () => {
    expect(splitTypeArguments('string,Map<int,Array<double>>,long')).toEqual([
      'string',
      'Map<int,Array<double>>',
      'long',
    ]);
  });
});

describe('type names', () => {
  const core = new JsonCodecCore();

  it('should name composite types', () => {
    expect(core.typeName(Types.map(Types.string, Types.array(Dog)))).toBe('Map<string,Array<test.Dog>>');
    expect(core.typeName(Types.set(Types.intArray))).toBe('Set<int[]>');
    expect(core.typeName(Types.record(ColourType))).toBe('Record<Colour>');
  });

  it('should map names back to types', () => {
    expect(core.nameToType('Map<string,Array<int[]>>')).toEqual({
      kind: 'map',
      key: { kind: 'string' },
      value: { kind: 'array', element: { kind: 'primitiveArray', prim: 'int' } },
    });
  });

  it('should remember enum names once they are seen', () => {
    const fresh = new JsonCodecCore();
    expect(catchError(() => fresh.nameToType('Colour'))).toMatchObject({ code: 'unknown_type' });

    fresh.typeName(ColourType);

    expect(fresh.nameToType('Colour')).toBe(ColourType);
  });

  it('should find serializable classes by name on a fresh core', () => {
    expect(new JsonCodecCore().nameToType('test.Dog')).toEqual({ kind: 'class', ctor: Dog });
  });

  it('should reject unknown names', () => {
    expect(catchError(() => core.nameToType('Nope'))).toMatchObject({
      code: 'unknown_type',
      message: 'Unknown type name Nope',
    });
  });

  it('should refuse to give two classes the same name', () => {
    const fresh = new JsonCodecCore();
    const First = (() => {
      class Item {
        @field(Types.string) title = '';
      }
      return Item;
    })();
    const Second = (() => {
      class Item {
        @field(Types.int) count = 0;
        @field(Types.boolean) done = false;
      }
      return Item;
    })();

    expect(fresh.toJson(First, new First())).toEqual({ title: '' });
    expect(catchError(() => fresh.toJson(Second, new Second()))).toMatchObject({
      code: 'construction_failed',
      message: 'Type name Item is already taken by another type; name one of them with registerType or @serializable',
    });

    fresh.registerType(Second, { name: 'Item2' });
    expect(fresh.toJson(Second, new Second())).toEqual({ count: 0, done: false });
  });

  it('should give up on a lazy reference cycle when naming a type', () => {
    const loop: TypeRef = Types.lazy(() => loop);

    expect(catchError(() => core.typeName(loop))).toMatchObject({ code: 'construction_failed' });
    expect(catchError(() => core.getNullUnsafeCodec(loop))).toMatchObject({ code: 'construction_failed' });
  });

  it('should require anonymous classes to be named', () => {
    const anonymous = (() => class {})();

    expect(catchError(() => core.typeName(anonymous))).toMatchObject({ code: 'construction_failed' });
  });

  it('should treat only unknown and non-final classes as non-final', () => {
    expect(core.isFinal(Types.unknown)).toBe(false);
    expect(core.isFinal(Custom)).toBe(false);
    expect(core.isFinal(ListNode)).toBe(true);
    expect(core.isFinal(Types.array(Types.unknown))).toBe(true);
  });
});
