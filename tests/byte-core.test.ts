import { describe, it, expect } from 'vitest';
import { gunzipSync, gzipSync } from 'node:zlib';
import { ByteCodecCore, Types } from '../src/index.js';
import { catchError } from './helpers.js';
import { Colour, Custom, ListNode, Person } from './models.js';

describe('ByteCodecCore', () => {
  const core = new ByteCodecCore();

  describe('primitives', () => {
    it('should write little-endian values after the presence flag', () => {
      expect([...core.toBytes(Types.int, 5)]).toEqual([1, 5, 0, 0, 0]);
      expect([...core.toBytes(Types.short, -2)]).toEqual([1, 254, 255]);
      expect([...core.toBytes(Types.byte, -1)]).toEqual([1, 255]);
      expect([...core.toBytes(Types.boolean, true)]).toEqual([1, 1]);
      expect([...core.toBytes(Types.char, 'A')]).toEqual([1, 65, 0]);
      expect([...core.toBytes(Types.long, 1n)]).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('should round-trip every primitive kind', () => {
      expect(core.fromBytes(Types.long, core.toBytes(Types.long, -(2n ** 63n)))).toBe(-(2n ** 63n));
      expect(core.fromBytes(Types.float, core.toBytes(Types.float, 0.25))).toBe(0.25);
      expect(core.fromBytes(Types.double, core.toBytes(Types.double, Math.PI))).toBe(Math.PI);
      expect(core.fromBytes(Types.char, core.toBytes(Types.char, 'é'))).toBe('é');
      expect(core.fromBytes(Types.string, core.toBytes(Types.string, 'héllo'))).toBe('héllo');
    });

    it('should reject values outside the range of their kind', () => {
      expect(catchError(() => core.toBytes(Types.int, 2 ** 31))).toMatchObject({
        code: 'structural_mismatch',
        message: '2147483648 is not a valid int',
      });
      expect(catchError(() => core.toBytes(Types.byte, 300))).toMatchObject({
        code: 'structural_mismatch',
        message: '300 is not a valid byte',
      });
      expect(catchError(() => core.toBytes(Types.long, 2n ** 63n))).toMatchObject({
        code: 'structural_mismatch',
        message: '9223372036854775808 is not a valid long',
      });
    });

    it('should reject values of the wrong shape for their kind', () => {
      expect(catchError(() => core.toBytes(Types.int, 1.5))).toMatchObject({
        code: 'structural_mismatch',
        message: '1.5 is not a valid int',
      });
      expect(catchError(() => core.toBytes(Types.char, 'ab'))).toMatchObject({
        code: 'structural_mismatch',
        message: 'ab is not a valid char',
      });
      expect(catchError(() => core.toBytes(Person, new Person('Ann', 40.5)))).toMatchObject({
        code: 'structural_mismatch',
        message: '40.5 is not a valid int',
      });
    });

    it('should write absence as a single zero byte', () => {
      expect([...core.toBytes(Types.string, null)]).toEqual([0]);
      expect(core.fromBytes(Types.string, Uint8Array.of(0))).toBeNull();
    });
  });

  describe('tagged values', () => {
    it('should write the tag flag and type name', () => {
      expect([...core.toBytes(Types.unknown, true)]).toEqual([1, 1, 7, 0, 0, 0, 98, 111, 111, 108, 101, 97, 110, 1]);
    });

    it('should round-trip values declared as unknown', () => {
      const value = { flags: [true, false], colour: Colour.Red };

      expect(core.fromBytes(Types.unknown, core.toBytes(Types.unknown, value))).toEqual(value);
    });
  });

  describe('malformed input', () => {
    it('should reject trailing bytes', () => {
      const bytes = Uint8Array.of(...core.toBytes(Types.int, 5), 9);

      expect(catchError(() => core.fromBytes(Types.int, bytes))).toMatchObject({
        code: 'structural_mismatch',
        message: '1 trailing bytes after decoded value',
      });
    });

    it('should reject truncated input', () => {
      expect(catchError(() => core.fromBytes(Types.int, Uint8Array.of(1, 5)))).toMatchObject({
        code: 'structural_mismatch',
        message: 'Unexpected end of buffer: need 4 bytes, 1 left',
      });
    });

    it('should reject an invalid presence flag', () => {
      expect(catchError(() => core.fromBytes(Types.int, Uint8Array.of(7)))).toMatchObject({
        code: 'structural_mismatch',
        message: 'Invalid null marker flag 7 at offset 0',
      });
    });

    it('should reject an invalid tag flag', () => {
      expect(catchError(() => core.fromBytes(Custom, Uint8Array.of(1, 2)))).toMatchObject({
        message: 'Invalid type tag flag 2 at offset 1',
      });
    });
  });

  describe('compression', () => {
    it('should round-trip through gzip', () => {
      const list = ListNode.chain(20);
      const compressed = gzipSync(core.toBytes(ListNode, list));

      expect(core.fromBytes(ListNode, gunzipSync(compressed))).toEqual(list);
    });
  });
});
