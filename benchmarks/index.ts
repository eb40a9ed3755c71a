/**
 * Benchmark comparing the JSON and byte carriers against plain JSON and CBOR.
 *
 * Run with: npm run bench
 */

import { TextDecoder, TextEncoder } from 'node:util';
import { run, bench, group, summary } from 'mitata';
import { encode as cborEncode, decode as cborDecode } from 'cbor-x';

import { ByteCodecCore, JsonCodecCore, Types, field, type TypeLike } from '../src/index.js';

class Point {
  @field(Types.double) x = 0;
  @field(Types.double) y = 0;
}

class Person {
  @field(Types.string) name = '';
  @field(Types.int) age = 0;
  @field(Types.string) email: string | null = null;
  @field(Types.array(Types.int)) scores: number[] = [];
  @field(Types.boolean) active = false;
}

const testPoint = Object.assign(new Point(), { x: 42.5, y: -17.25 });

const testPerson = Object.assign(new Person(), {
  name: 'Alice',
  age: 30,
  email: 'alice@example.com',
  scores: [100, 95, 87, 92],
  active: true,
});

const testPersonLarge = Object.assign(new Person(), {
  name: 'Bob Johnson with a rather long name',
  age: 45,
  email: 'bob.johnson@example.com',
  scores: Array.from({ length: 100 }, (_, i) => i * 10),
  active: true,
});

const json = new JsonCodecCore({ logLevel: 'silent' });
const bytes = new ByteCodecCore({ logLevel: 'silent' });
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

interface BenchCase {
  label: string;
  type: TypeLike<Point | Person>;
  value: Point | Person;
}

const cases: BenchCase[] = [
  { label: 'Point', type: Point, value: testPoint },
  { label: 'Person (small)', type: Person, value: testPerson },
  { label: 'Person (large)', type: Person, value: testPersonLarge },
];

for (const { label, type, value } of cases) {
  const jsonText = json.stringify(type, value);
  const jsonBytes = textEncoder.encode(jsonText);
  const byteBytes = bytes.toBytes(type, value);
  const cborBytes = cborEncode(value);

  console.log(
    `${label}: json ${jsonBytes.length} bytes, byte carrier ${byteBytes.length} bytes, cbor-x ${cborBytes.length} bytes`
  );

  summary(() => {
    group(`${label} encode`, () => {
      bench('JSON.stringify', () => textEncoder.encode(JSON.stringify(value)));
      bench('json carrier', () => textEncoder.encode(json.stringify(type, value)));
      bench('byte carrier', () => bytes.toBytes(type, value));
      bench('cbor-x', () => cborEncode(value));
    });
  });

  summary(() => {
    group(`${label} decode`, () => {
      bench('JSON.parse', () => JSON.parse(textDecoder.decode(jsonBytes)));
      bench('json carrier', () => json.parse(type, textDecoder.decode(jsonBytes)));
      bench('byte carrier', () => bytes.fromBytes(type, byteBytes));
      bench('cbor-x', () => cborDecode(cborBytes));
    });
  });
}

await run();
