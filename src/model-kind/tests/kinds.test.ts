import { describe, expect, it, test } from 'vitest';

import { ConfigurationError } from '../../errors';
import {
  BareModelKindRecord,
  createIncrementalByTimeRangeKind,
  createIncrementalByUniqueKeyKind,
  createModelKind,
  createSeedKind,
  createViewKind,
  dumpModelKind,
  isModelKind,
  modelKindFields,
  modelKindToJson
} from '../kinds';
import { ModelKindName } from '../name';

/**
 * Test suite: kind construction.
 *
 * Coverage:
 * - Defaults and frozen results per variant.
 * - Field bounds of the incremental and seed kinds.
 * - The batch_size >= lookback invariant.
 * - Dumps and field introspection.
 */
describe('Model Kinds', () => {
  describe('Construction', () => {
    it('builds a time range kind with a nested time column', () => {
      const kind = createIncrementalByTimeRangeKind({
        timeColumn: { column: 'ds', format: '%Y-%m-%d' },
        batchSize: 10,
        lookback: 2
      });

      expect(kind).toMatchObject({
        variant: 'IncrementalByTimeRangeKind',
        name: 'INCREMENTAL_BY_TIME_RANGE',
        timeColumn: { column: 'ds', format: '%Y-%m-%d' },
        batchSize: 10,
        lookback: 2
      });
      expect(Object.isFrozen(kind)).toBe(true);
      expect(Object.isFrozen(kind.timeColumn)).toBe(true);
    });

    it('leaves incremental integers unset when absent', () => {
      const kind = createIncrementalByUniqueKeyKind({ uniqueKey: 'id' });

      expect(kind.uniqueKey).toEqual(['id']);
      expect(kind.batchSize).toBeUndefined();
      expect(kind.lookback).toBeUndefined();
    });

    it('parses integer text', () => {
      const kind = createIncrementalByUniqueKeyKind({
        uniqueKey: ['id'],
        batchSize: '7'
      });

      expect(kind.batchSize).toBe(7);
    });

    it('defaults a view to not materialized', () => {
      expect(createViewKind().materialized).toBe(false);
      expect(createViewKind({ materialized: 1 }).materialized).toBe(true);
    });

    it('defaults the seed batch size', () => {
      expect(createSeedKind({ path: 'seeds/a.csv' }).batchSize).toBe(1000);
    });

    it('stringifies a numeric seed path', () => {
      expect(createSeedKind({ path: 42 }).path).toBe('42');
    });

    it('brands constructed kinds', () => {
      expect(isModelKind(createModelKind(ModelKindName.FULL))).toBe(true);
      expect(isModelKind({ name: 'FULL' })).toBe(false);
    });

    it('rejects an unknown bare tag', () => {
      expect(() => BareModelKindRecord.parse({ name: 'PARTIAL' })).toThrowError(
        'Invalid ModelKind at "name": Invalid enum value.'
      );
    });
  });

  describe('Field Bounds', () => {
    const scenarios = [
      {
        id: 'Negative Lookback',
        description: 'Incremental integers are non-negative',
        create: () =>
          createIncrementalByTimeRangeKind({ timeColumn: 'ds', lookback: -1 }),
        message:
          'Invalid IncrementalByTimeRangeKind at "lookback": Invalid value -1 for lookback. The value should be a non-negative integer'
      },
      {
        id: 'Fractional Batch',
        description: 'Incremental integers are whole',
        create: () =>
          createIncrementalByUniqueKeyKind({ uniqueKey: 'id', batchSize: 1.5 }),
        message:
          'Invalid IncrementalByUniqueKeyKind at "batch_size": Invalid value 1.5 for batch_size. The value should be a non-negative integer'
      },
      {
        id: 'Missing Time Column',
        description: 'time_column is required',
        create: () => createIncrementalByTimeRangeKind({}),
        message: 'Invalid IncrementalByTimeRangeKind at "time_column": Required'
      },
      {
        id: 'Empty Time Column',
        description: 'time_column cannot be empty',
        create: () => createIncrementalByTimeRangeKind({ timeColumn: '' }),
        message:
          'Invalid IncrementalByTimeRangeKind at "time_column": Time Column cannot be empty.'
      },
      {
        id: 'Empty Unique Key',
        description: 'unique_key needs at least one column',
        create: () => createIncrementalByUniqueKeyKind({ uniqueKey: [] }),
        message:
          'Invalid IncrementalByUniqueKeyKind at "unique_key": unique_key cannot be empty'
      },
      {
        id: 'Unique Key Shape',
        description: 'unique_key is a name or a list of names',
        create: () => createIncrementalByUniqueKeyKind({ uniqueKey: 5 }),
        message:
          'Invalid IncrementalByUniqueKeyKind at "unique_key": unique_key must be a column name or a list of column names'
      },
      {
        id: 'Zero Seed Batch',
        description: 'Seed batch size is strictly positive',
        create: () => createSeedKind({ path: 'a.csv', batchSize: 0 }),
        message:
          'Invalid SeedKind at "batch_size": Seed batch size must be a positive integer'
      },
      {
        id: 'Negative Seed Batch',
        description: 'Seed batch size is strictly positive',
        create: () => createSeedKind({ path: 'a.csv', batchSize: -5 }),
        message:
          'Invalid SeedKind at "batch_size": Seed batch size must be a positive integer'
      },
      {
        id: 'Textual Seed Batch',
        description: 'Seed batch size text is not parsed',
        create: () => createSeedKind({ path: 'a.csv', batchSize: '5' }),
        message:
          'Invalid SeedKind at "batch_size": Seed batch size must be an integer value'
      },
      {
        id: 'Missing Seed Path',
        description: 'path is required',
        create: () => createSeedKind({}),
        message: 'Invalid SeedKind at "path": Required'
      },
      {
        id: 'Object Seed Path',
        description: 'path is text',
        create: () => createSeedKind({ path: {} }),
        message: 'Invalid SeedKind at "path": Seed path must be a string'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ create, message }) => {
      expect(create).toThrowError(message);
    });
  });

  describe('Batch Size and Lookback', () => {
    const scenarios = [
      { id: 'Zero Batch', batchSize: 0, lookback: 1, valid: false },
      { id: 'Smaller Batch', batchSize: 5, lookback: 10, valid: false },
      { id: 'Both Zero', batchSize: 0, lookback: 0, valid: true },
      { id: 'Equal', batchSize: 10, lookback: 10, valid: true },
      { id: 'Larger Batch', batchSize: 11, lookback: 3, valid: true }
    ];

    const constructors = [
      (batchSize: number, lookback: number) =>
        createIncrementalByTimeRangeKind({ timeColumn: 'ds', batchSize, lookback }),
      (batchSize: number, lookback: number) =>
        createIncrementalByUniqueKeyKind({ uniqueKey: 'id', batchSize, lookback })
    ];

    test.for(scenarios)(
      '[$id] batch_size $batchSize, lookback $lookback',
      ({ batchSize, lookback, valid }) => {
        for (const create of constructors) {
          if (valid) {
            expect(create(batchSize, lookback)).toMatchObject({
              batchSize,
              lookback
            });
          } else {
            expect(() => create(batchSize, lookback)).toThrowError(
              new ConfigurationError('batch_size cannot be less than lookback')
            );
          }
        }
      }
    );

    it('allows either value alone', () => {
      expect(
        createIncrementalByTimeRangeKind({ timeColumn: 'ds', lookback: 5 })
          .lookback
      ).toBe(5);
      expect(
        createIncrementalByUniqueKeyKind({ uniqueKey: 'id', batchSize: 0 })
          .batchSize
      ).toBe(0);
    });
  });

  describe('Dump', () => {
    it('uses wire names and omits unset fields', () => {
      const kind = createIncrementalByTimeRangeKind({
        timeColumn: { column: 'ds', format: '%Y' },
        batchSize: 5
      });

      expect(dumpModelKind(kind)).toEqual({
        name: 'INCREMENTAL_BY_TIME_RANGE',
        time_column: { column: 'ds', format: '%Y' },
        batch_size: 5
      });
      expect(dumpModelKind(kind, { byAlias: false })).toEqual({
        name: 'INCREMENTAL_BY_TIME_RANGE',
        timeColumn: { column: 'ds', format: '%Y' },
        batchSize: 5
      });
    });

    it('selects top-level fields without filtering nested ones', () => {
      const kind = createIncrementalByTimeRangeKind({
        timeColumn: { column: 'ds', format: '%Y' }
      });

      expect(dumpModelKind(kind, { include: ['time_column'] })).toEqual({
        time_column: { column: 'ds', format: '%Y' }
      });
    });

    it('omits defaults on request', () => {
      expect(
        dumpModelKind(createSeedKind({ path: 'a.csv' }), {
          excludeDefaults: true
        })
      ).toEqual({ name: 'SEED', path: 'a.csv' });
      expect(dumpModelKind(createViewKind(), { excludeDefaults: true })).toEqual(
        { name: 'VIEW' }
      );
    });

    it('copies the unique key list', () => {
      const kind = createIncrementalByUniqueKeyKind({ uniqueKey: ['id', 'ds'] });
      const dumped = dumpModelKind(kind);

      expect(dumped.unique_key).toEqual(['id', 'ds']);
      expect(dumped.unique_key).not.toBe(kind.uniqueKey);
    });

    it('serializes as JSON', () => {
      expect(modelKindToJson(createModelKind(ModelKindName.FULL))).toBe(
        '{"name":"FULL"}'
      );
      expect(
        modelKindToJson(createViewKind({ materialized: true }), { indent: 2 })
      ).toBe('{\n  "name": "VIEW",\n  "materialized": true\n}');
    });
  });

  describe('Field Introspection', () => {
    it('describes a variant by name', () => {
      const fields = modelKindFields('SeedKind');

      expect(fields.allFields()).toEqual(new Set(['name', 'path', 'batch_size']));
      expect(fields.requiredFields()).toEqual(new Set(['path']));
      expect(fields.missingRequiredFields(['name'])).toEqual(new Set(['path']));
      expect(fields.extraFields(['path', 'batchSize'])).toEqual(
        new Set(['batchSize'])
      );
    });

    it('describes a constructed kind', () => {
      const kind = createIncrementalByUniqueKeyKind({ uniqueKey: 'id' });

      expect(modelKindFields(kind).name).toBe('IncrementalByUniqueKeyKind');
      expect(modelKindFields(kind).allFields()).toEqual(
        new Set(['name', 'unique_key', 'batch_size', 'lookback'])
      );
    });
  });
});
