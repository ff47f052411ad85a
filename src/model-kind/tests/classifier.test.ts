import { describe, expect, it, test } from 'vitest';

import { parseExpression, parseModelKind } from '../../expressions/parser';
import { classifyModelKind, describeKindInput } from '../classifier';
import {
  createIncrementalByTimeRangeKind,
  createIncrementalByUniqueKeyKind,
  createModelKind,
  createSeedKind,
  createViewKind
} from '../kinds';
import { MODEL_KIND_NAMES, ModelKindName } from '../name';

/**
 * Test suite: classifyModelKind.
 *
 * Coverage:
 * - Every input shape (typed, node, mapping, scalar).
 * - Every tag as a bare name.
 * - Normalization of structured fields.
 * - Rejections of unknown tags and fields.
 * - Dialect-aware time columns.
 */
describe('classifyModelKind', () => {
  describe('Input Shapes', () => {
    it('tags each shape', () => {
      const seed = createSeedKind({ path: 'a.csv' });
      const node = parseModelKind('FULL');

      expect(describeKindInput('full')).toEqual({ shape: 'scalar', text: 'full' });
      expect(describeKindInput(seed)).toEqual({ shape: 'typed', kind: seed });
      expect(describeKindInput(node)).toEqual({ shape: 'node', node });
      expect(describeKindInput(parseExpression('ds'))).toEqual({
        shape: 'scalar',
        text: 'ds'
      });
      expect(describeKindInput({ name: 'FULL' })).toEqual({
        shape: 'mapping',
        mapping: { name: 'FULL' }
      });
    });

    it('returns a constructed kind unchanged', () => {
      const kind = createViewKind({ materialized: true });

      expect(classifyModelKind(kind)).toBe(kind);
    });

    it('gives undefined for absent input', () => {
      expect(classifyModelKind(null)).toBeUndefined();
      expect(classifyModelKind(undefined)).toBeUndefined();
    });
  });

  describe('Bare Tags', () => {
    test.for(MODEL_KIND_NAMES)('[%s] text in any case', name => {
      const kind = classifyModelKind(name.toLowerCase());

      expect(kind).toEqual(createModelKind(name));
      expect(kind.variant).toBe('ModelKind');
    });

    it('reads the name of a column expression', () => {
      expect(classifyModelKind(parseExpression('full'))).toEqual(
        createModelKind(ModelKindName.FULL)
      );
    });

    it('keeps the text of an unknown tag in the message', () => {
      expect(() => classifyModelKind('Bogus')).toThrowError(
        /^Invalid model kind 'Bogus'$/
      );
    });
  });

  describe('Kind Clauses', () => {
    const scenarios = [
      {
        id: 'Time Range',
        description: 'Tuple time column and integers',
        code: "INCREMENTAL_BY_TIME_RANGE (time_column (ds, '%Y-%m-%d'), batch_size 10, lookback 2)",
        expected: createIncrementalByTimeRangeKind({
          timeColumn: { column: 'ds', format: '%Y-%m-%d' },
          batchSize: 10,
          lookback: 2
        })
      },
      {
        id: 'Unique Key',
        description: 'Single column key',
        code: 'INCREMENTAL_BY_UNIQUE_KEY (unique_key id)',
        expected: createIncrementalByUniqueKeyKind({ uniqueKey: ['id'] })
      },
      {
        id: 'Composite Key',
        description: 'Tuple key keeps its order',
        code: 'INCREMENTAL_BY_UNIQUE_KEY (unique_key (id, "event date"))',
        expected: createIncrementalByUniqueKeyKind({
          uniqueKey: ['id', 'event date']
        })
      },
      {
        id: 'Materialized View',
        description: 'Boolean keyword',
        code: 'VIEW (materialized TRUE)',
        expected: createViewKind({ materialized: true })
      },
      {
        id: 'Zero Materialized',
        description: 'Numbers count by value',
        code: 'VIEW (materialized 0)',
        expected: createViewKind()
      },
      {
        id: 'Tuple Materialized',
        description: 'Tuples count by length',
        code: 'VIEW (materialized (1))',
        expected: createViewKind({ materialized: true })
      },
      {
        id: 'Null Materialized',
        description: 'NULL is false',
        code: 'VIEW (materialized NULL)',
        expected: createViewKind()
      },
      {
        id: 'Plain View',
        description: 'No properties',
        code: 'view',
        expected: createViewKind()
      },
      {
        id: 'Seed',
        description: 'String path and integer batch size',
        code: "SEED (path 'seeds/a.csv', batch_size 20)",
        expected: createSeedKind({ path: 'seeds/a.csv', batchSize: 20 })
      },
      {
        id: 'Seed Column Path',
        description: 'Non-string path keeps its SQL text',
        code: 'SEED (path seeds.a)',
        expected: createSeedKind({ path: 'seeds.a' })
      },
      {
        id: 'Bare Clause',
        description: 'Tag without a variant of its own',
        code: 'EXTERNAL',
        expected: createModelKind(ModelKindName.EXTERNAL)
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(classifyModelKind(parseModelKind(code))).toEqual(expected);
    });
  });

  describe('Mappings', () => {
    const scenarios = [
      {
        id: 'Seed',
        description: 'Default batch size',
        input: { name: 'SEED', path: 'seeds/a.csv' },
        expected: createSeedKind({ path: 'seeds/a.csv' })
      },
      {
        id: 'Time Range',
        description: 'String time column',
        input: { name: 'INCREMENTAL_BY_TIME_RANGE', time_column: 'ds' },
        expected: createIncrementalByTimeRangeKind({ timeColumn: 'ds' })
      },
      {
        id: 'Unique Key List',
        description: 'List of names',
        input: { name: 'INCREMENTAL_BY_UNIQUE_KEY', unique_key: ['id', 'ds'] },
        expected: createIncrementalByUniqueKeyKind({ uniqueKey: ['id', 'ds'] })
      },
      {
        id: 'Bare',
        description: 'Name only',
        input: { name: 'FULL' },
        expected: createModelKind(ModelKindName.FULL)
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(classifyModelKind(input)).toEqual(expected);
    });
  });

  describe('Rejections', () => {
    const scenarios = [
      {
        id: 'Unknown Clause Tag',
        description: 'Structured input falls back to a bare kind',
        input: () => parseModelKind('BOGUS'),
        message: 'Invalid ModelKind at "name": Invalid enum value.'
      },
      {
        id: 'Unknown Mapping Tag',
        description: 'Mapping names are matched exactly',
        input: () => ({ name: 'seed', path: 'a.csv' }),
        message: 'Invalid ModelKind at "name": Invalid enum value.'
      },
      {
        id: 'Fields on a Bare Tag',
        description: 'Bare kinds take no fields',
        input: () => parseModelKind('FULL (lookback 1)'),
        message: "Invalid ModelKind: Unrecognized key(s) in object: 'lookback'"
      },
      {
        id: 'Record Names',
        description: 'Mappings use wire names',
        input: () => ({ name: 'SEED', path: 'a.csv', batchSize: 5 }),
        message: "Invalid SeedKind: Unrecognized key(s) in object: 'batchSize'"
      },
      {
        id: 'Negative Clause Integer',
        description: 'Signed literals are checked',
        input: () =>
          parseModelKind('INCREMENTAL_BY_UNIQUE_KEY (unique_key id, batch_size -3)'),
        message:
          'Invalid IncrementalByUniqueKeyKind at "batch_size": Invalid value -3 for batch_size. The value should be a non-negative integer'
      },
      {
        id: 'Textual Seed Batch',
        description: 'String literal is not an integer',
        input: () => parseModelKind("SEED (path 'a.csv', batch_size '20')"),
        message:
          'Invalid SeedKind at "batch_size": Seed batch size must be an integer value'
      },
      {
        id: 'Invariant',
        description: 'Cross-field rule applies to clauses',
        input: () =>
          parseModelKind('INCREMENTAL_BY_TIME_RANGE (time_column ds, batch_size 1, lookback 2)'),
        message: 'batch_size cannot be less than lookback'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, message }) => {
      expect(() => classifyModelKind(input())).toThrowError(message);
    });
  });

  describe('Dialects', () => {
    it('converts a clause time format to canonical notation', () => {
      const kind = classifyModelKind(
        parseModelKind(
          "INCREMENTAL_BY_TIME_RANGE (time_column (ds, 'yyyy-MM-dd'), lookback 1)"
        ),
        { dialect: 'spark' }
      );

      expect(kind).toEqual(
        createIncrementalByTimeRangeKind({
          timeColumn: { column: 'ds', format: '%Y-%m-%d' },
          lookback: 1
        })
      );
    });

    it('converts a mapping time format to canonical notation', () => {
      const kind = classifyModelKind(
        {
          name: 'INCREMENTAL_BY_TIME_RANGE',
          time_column: { column: 'ds', format: 'YYYY-MM-DD' }
        },
        { dialect: 'postgres' }
      );

      expect(kind).toMatchObject({
        timeColumn: { column: 'ds', format: '%Y-%m-%d' }
      });
    });

    it('rejects an unknown dialect', () => {
      expect(() =>
        classifyModelKind(
          {
            name: 'INCREMENTAL_BY_TIME_RANGE',
            time_column: { column: 'ds', format: '%Y' }
          },
          { dialect: 'nope' }
        )
      ).toThrowError("Unknown dialect 'nope'");
    });
  });
});
