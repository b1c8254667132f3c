import { describe, it, expect } from 'vitest';
import { compressJSON, groupRecords, windowSeconds } from '../grouping.js';
import { resolveConfig } from '../config.js';
import { Compressor } from '../compressor.js';
import { InputFormatError, SerializationError } from '../../utils/errors.js';
import type { CompressorConfig } from '../types.js';

function run(records: unknown[], config: Partial<CompressorConfig> = {}): unknown {
  const output = compressJSON(JSON.stringify(records), resolveConfig(config));
  return JSON.parse(Buffer.from(output).toString('utf8'));
}

describe('compressJSON', () => {
  describe('input format', () => {
    it.each([
      ['an object', '{"timestamp":60,"value":1}'],
      ['a string', '"records"'],
      ['a number', '42'],
      ['null', 'null'],
      ['invalid JSON', '[{"timestamp":60'],
      ['an empty payload', ''],
    ])('should reject %s with InputFormatError', (_label, payload) => {
      expect(() => compressJSON(payload, resolveConfig())).toThrow(InputFormatError);
      expect(() => compressJSON(payload, resolveConfig())).toThrow('expected JSON array');
    });

    it('should accept bytes and return bytes', () => {
      const input = Buffer.from('[{"ts":1000,"val":10},{"ts":1010,"val":20}]', 'utf8');
      const output = compressJSON(input, resolveConfig({ timestampField: 'ts', valueFields: ['val'] }));

      expect(output).toBeInstanceOf(Uint8Array);
      expect(Buffer.from(output).toString('utf8')).toBe('[{"ts":1005,"val":30}]');
    });

    it('should return an empty array for an empty input array', () => {
      expect(Buffer.from(compressJSON('[]', resolveConfig())).toString('utf8')).toBe('[]');
    });
  });

  describe('record filtering', () => {
    it('should skip elements that are not objects', () => {
      expect(run([1, 'x', null, [1], true, { timestamp: 60, value: 2 }])).toEqual([
        { timestamp: 60, value: 2 },
      ]);
    });

    it('should skip records with a missing or zero timestamp', () => {
      expect(run([
        { timestamp: 0, value: 5 },
        { value: 7 },
        { timestamp: 'soon', value: 9 },
        { timestamp: 120, value: 1 },
      ])).toEqual([{ timestamp: 120, value: 1 }]);
    });

    it('should accept a literal zero timestamp when allowed', () => {
      expect(run(
        [{ timestamp: 0, value: 5 }, { timestamp: 'soon', value: 9 }, { value: 7 }],
        { allowZeroTimestamp: true }
      )).toEqual([{ timestamp: 0, value: 5 }]);
    });

    it('should read string and fractional timestamps as integers', () => {
      expect(run([
        { timestamp: '125', value: 1 },
        { timestamp: 125.9, value: 2 },
      ])).toEqual([{ timestamp: 125, value: 3 }]);
    });
  });

  describe('grouping', () => {
    it('should merge records in the same window', () => {
      expect(run(
        [{ ts: 1000, val: 10 }, { ts: 1010, val: 20 }],
        { timestampField: 'ts', valueFields: ['val'], timeWindowMs: 60_000, aggregationMethod: 'sum' }
      )).toEqual([{ ts: 1005, val: 30 }]);
    });

    it('should split records on window boundaries', () => {
      expect(run([
        { timestamp: 59, value: 1 },
        { timestamp: 60, value: 2 },
        { timestamp: 119, value: 3 },
      ])).toEqual([
        { timestamp: 59, value: 1 },
        { timestamp: 89, value: 5 },
      ]);
    });

    it('should round negative timestamps down to their window', () => {
      const groups = groupRecords([{ timestamp: -1, value: 1 }, { timestamp: -59, value: 2 }], resolveConfig());
      expect([...groups.values()].map(g => g.window)).toEqual([-60]);

      expect(run([{ timestamp: -1, value: 1 }, { timestamp: -59, value: 2 }])).toEqual([
        { timestamp: -30, value: 3 },
      ]);
    });

    it('should fall back to a one-minute window for sub-second windows', () => {
      const config = resolveConfig({ timeWindowMs: 500 });
      expect(windowSeconds(config)).toBe(60);
      expect(windowSeconds(resolveConfig({ timeWindowMs: 90_000 }))).toBe(90);

      const groups = groupRecords([{ timestamp: 10, value: 1 }, { timestamp: 70, value: 1 }], config);
      expect([...groups.values()].map(g => g.window)).toEqual([0, 60]);
    });

    it('should keep distinct unique-field values apart', () => {
      const output = run(
        [
          { timestamp: 100, value: 1, host: 'a', customer_id: 'c1' },
          { timestamp: 110, value: 2, host: 'a', customer_id: 'c2' },
          { timestamp: 115, value: 3, host: 'a', customer_id: 'c1' },
        ],
        { groupByFields: ['host'], uniqueFields: ['customer_id'] }
      );

      expect(output).toHaveLength(2);
      expect(output).toEqual(expect.arrayContaining([
        { timestamp: 107, value: 4, host: 'a', customer_id: 'c1' },
        { timestamp: 110, value: 2, host: 'a', customer_id: 'c2' },
      ]));
    });

    it('should separate records with and without a group-by field', () => {
      const output = run(
        [{ timestamp: 5, value: 1, host: 'a' }, { timestamp: 6, value: 2 }],
        { groupByFields: ['host'] }
      );

      expect(output).toHaveLength(2);
      expect(output).toEqual(expect.arrayContaining([
        { timestamp: 5, value: 1, host: 'a' },
        { timestamp: 6, value: 2 },
      ]));
    });

    it('should not collide when tag values contain delimiter characters', () => {
      const output = run(
        [
          { timestamp: 5, value: 1, a: 'x;b:y' },
          { timestamp: 6, value: 2, a: 'x', b: 'y' },
        ],
        { groupByFields: ['a', 'b'] }
      );

      expect(output).toHaveLength(2);
    });

    it('should stringify non-string tag values', () => {
      expect(run(
        [{ timestamp: 5, value: 1, host: 42, meta: { zone: 'eu-1' } }],
        { groupByFields: ['host', 'meta.zone'] }
      )).toEqual([{ timestamp: 5, value: 1, host: '42', 'meta.zone': 'eu-1' }]);
    });

    it('should emit a tag named __proto__ as a plain field', () => {
      const payload = '[{"timestamp":5,"value":1,"__proto__":"x"},{"timestamp":6,"value":2,"__proto__":"y"}]';
      const output = compressJSON(payload, resolveConfig({ groupByFields: ['__proto__'] }));

      expect(Buffer.from(output).toString('utf8')).toBe(
        '[{"timestamp":5,"value":1,"__proto__":"x"},{"timestamp":6,"value":2,"__proto__":"y"}]'
      );
    });

    it('should count every record sharing a key', () => {
      const groups = groupRecords(
        [{ timestamp: 5, value: 1 }, { timestamp: 6 }, { timestamp: 7, value: 3 }],
        resolveConfig()
      );
      const [group] = [...groups.values()];

      expect(group.count).toBe(3);
      expect(group.values).toEqual([1, 3]);
      expect(group.firstTime).toBe(5);
      expect(group.lastTime).toBe(7);
    });
  });

  describe('aggregation', () => {
    const records = [
      { timestamp: 30, value: 5 },
      { timestamp: 10, value: 2 },
      { timestamp: 50, value: 8 },
      { timestamp: 20, value: 1 },
    ];

    it.each([
      ['sum', 30, 16],
      ['avg', 30, 4],
      ['min', 30, 1],
      ['max', 30, 8],
      ['count', 30, 4],
      ['first', 10, 5],
      ['last', 50, 1],
      ['unknown', 30, 16],
    ])('should emit %s with timestamp %i and value %d', (method, timestamp, value) => {
      expect(run(records, { aggregationMethod: method })).toEqual([{ timestamp, value }]);
    });

    it('should interleave multiple value fields under "value"', () => {
      expect(run(
        [{ timestamp: 10, cpu: 1, mem: 2 }, { timestamp: 20, cpu: 3 }],
        { valueFields: ['cpu', 'mem'], aggregationMethod: 'last' }
      )).toEqual([{ timestamp: 20, value: 3 }]);
    });

    it('should convert present non-numeric values to 0', () => {
      expect(run(
        [{ timestamp: 5, value: null }, { timestamp: 6, value: '1.5' }, { timestamp: 7 }],
        { aggregationMethod: 'count' }
      )).toEqual([{ timestamp: 6, value: 2 }]);
    });

    it('should emit 0 for a group without values', () => {
      expect(run([{ timestamp: 5 }], { aggregationMethod: 'avg' })).toEqual([{ timestamp: 5, value: 0 }]);
    });

    it('should fail with SerializationError on a non-finite aggregate', () => {
      expect(() => compressJSON('[{"timestamp":5,"value":1e308},{"timestamp":6,"value":1e308}]', resolveConfig()))
        .toThrow(SerializationError);
    });
  });

  it('should accept its own output as input', () => {
    const config = resolveConfig({ groupByFields: ['host'] });
    const once = compressJSON('[{"timestamp":100,"value":1,"host":"a"},{"timestamp":110,"value":2,"host":"a"}]', config);
    const twice = compressJSON(once, config);

    expect(Buffer.from(twice).toString('utf8')).toBe('[{"timestamp":105,"value":3,"host":"a"}]');
  });
});

describe('Compressor', () => {
  it('should resolve defaults once', () => {
    const compressor = new Compressor({ aggregationMethod: 'max', workers: 0 });

    expect(compressor.config.aggregationMethod).toBe('max');
    expect(compressor.config.workers).toBe(4);
    expect(compressor.config.timestampField).toBe('timestamp');
  });

  it('should compress and report the ratio', () => {
    const compressor = new Compressor();
    const input = '[{"timestamp":60,"value":1},{"timestamp":61,"value":2}]';
    const output = compressor.compressJSON(input);

    expect(Buffer.from(output).toString('utf8')).toBe('[{"timestamp":60,"value":3}]');
    expect(compressor.getCompressionRatio(input, output)).toBe(1 - output.length / input.length);
  });
});
