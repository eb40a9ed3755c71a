import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { JsonCodecCore, Types, createLogger, type LogLevel } from '../src/index.js';
import { Animal, Cat, ListNode, Person } from './models.js';

function capture(level: LogLevel) {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level }, { write: (line: string) => lines.push(JSON.parse(line)) });
  return { lines, logger };
}

describe('createLogger', () => {
  it('should create a logger at the requested level', () => {
    const logger = createLogger({ level: 'debug', bindings: { component: 'test' } });

    expect(logger.level).toBe('debug');
    expect(logger.bindings()).toMatchObject({ component: 'test' });
  });
});

describe('core logging', () => {
  it('should bind the carrier name', () => {
    const { logger } = capture('warn');
    const core = new JsonCodecCore({ logger });

    expect(core.logger.bindings()).toMatchObject({ carrier: 'json' });
  });

  it('should log codec builds and forward references at debug', () => {
    const { lines, logger } = capture('debug');
    const core = new JsonCodecCore({ logger });

    core.getNullUnsafeCodec(ListNode);
    const messages = lines.map((line) => line.msg);

    expect(messages).toContain('forward reference issued');
    expect(lines.find((line) => line.msg === 'forward reference issued')).toMatchObject({
      level: 20,
      type: 'ListNode',
      registry: 'codec',
      carrier: 'json',
    });
  });

  it('should log the type and fields of a builder-made codec', () => {
    const { lines, logger } = capture('debug');
    const core = new JsonCodecCore({ logger });

    core
      .objectCodec(Person)
      .field('name', (p) => p.name, Types.string)
      .field('age', (p) => p.age, Types.int)
      .map((name, age) => new Person(name, age));

    expect(lines.find((line) => line.msg === 'object codec built')).toMatchObject({
      level: 20,
      type: 'Person',
      fields: ['name', 'age'],
      carrier: 'json',
    });
  });

  it('should stay quiet at the default level', () => {
    const { lines, logger } = capture('warn');
    const core = new JsonCodecCore({ logger });

    core.toJson(ListNode, ListNode.chain(2));

    expect(lines).toEqual([]);
  });

  it('should trace written type tags', () => {
    const { lines, logger } = capture('trace');
    const core = new JsonCodecCore({ logger });

    core.toJson(Animal, Object.assign(new Cat(), { name: 'Tom' }));

    expect(lines.filter((line) => line.msg === 'type tag written')).toEqual([
      expect.objectContaining({ level: 10, type: 'Cat', declared: 'Animal', carrier: 'json' }),
    ]);
  });
});
