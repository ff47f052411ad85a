import { describe, expect, it, test } from 'vitest';

import { parseModelKind } from '../../expressions/parser';
import { classifyModelKind } from '../classifier';
import {
  createIncrementalByTimeRangeKind,
  createIncrementalByUniqueKeyKind,
  createModelKind,
  createSeedKind,
  createViewKind,
  dumpModelKind
} from '../kinds';
import { ModelKindName } from '../name';
import { modelKindToExpression, renderModelKind } from '../render';

const kinds = [
  {
    id: 'Full',
    kind: createModelKind(ModelKindName.FULL),
    sql: 'FULL'
  },
  {
    id: 'Embedded',
    kind: createModelKind(ModelKindName.EMBEDDED),
    sql: 'EMBEDDED'
  },
  {
    id: 'External',
    kind: createModelKind(ModelKindName.EXTERNAL),
    sql: 'EXTERNAL'
  },
  {
    id: 'Time Range',
    kind: createIncrementalByTimeRangeKind({ timeColumn: 'ds' }),
    sql: 'INCREMENTAL_BY_TIME_RANGE (time_column ds)'
  },
  {
    id: 'Time Range Full',
    kind: createIncrementalByTimeRangeKind({
      timeColumn: { column: 'ds', format: '%Y-%m-%d' },
      batchSize: 10,
      lookback: 2
    }),
    sql: "INCREMENTAL_BY_TIME_RANGE (time_column (ds, '%Y-%m-%d'), batch_size 10, lookback 2)"
  },
  {
    id: 'Unique Key',
    kind: createIncrementalByUniqueKeyKind({ uniqueKey: 'id' }),
    sql: 'INCREMENTAL_BY_UNIQUE_KEY (unique_key id)'
  },
  {
    id: 'Composite Key',
    kind: createIncrementalByUniqueKeyKind({
      uniqueKey: ['id', 'event date'],
      batchSize: 0,
      lookback: 0
    }),
    sql: 'INCREMENTAL_BY_UNIQUE_KEY (unique_key (id, "event date"), batch_size 0, lookback 0)'
  },
  {
    id: 'Keyword Key',
    kind: createIncrementalByUniqueKeyKind({ uniqueKey: ['null', 'True'] }),
    sql: 'INCREMENTAL_BY_UNIQUE_KEY (unique_key ("null", "True"))'
  },
  {
    id: 'Keyword Time Column',
    kind: createIncrementalByTimeRangeKind({ timeColumn: 'false' }),
    sql: 'INCREMENTAL_BY_TIME_RANGE (time_column "false")'
  },
  {
    id: 'View',
    kind: createViewKind(),
    sql: 'VIEW'
  },
  {
    id: 'Materialized View',
    kind: createViewKind({ materialized: true }),
    sql: 'VIEW (materialized TRUE)'
  },
  {
    id: 'Seed',
    kind: createSeedKind({ path: "seeds/o'neil.csv", batchSize: 50 }),
    sql: "SEED (path 'seeds/o''neil.csv', batch_size 50)"
  }
];

/**
 * Test suite: kind rendering.
 *
 * Coverage:
 * - SQL text per variant.
 * - Node, text, and mapping round-trips through the classifier.
 * - Dialect notation of time formats.
 */
describe('Kind Rendering', () => {
  test.for(kinds)('[$id] renders as SQL', ({ kind, sql }) => {
    expect(renderModelKind(kind)).toBe(sql);
  });

  test.for(kinds)('[$id] classifies its node back', ({ kind }) => {
    expect(classifyModelKind(modelKindToExpression(kind))).toEqual(kind);
  });

  test.for(kinds)('[$id] classifies its text back', ({ kind }) => {
    expect(classifyModelKind(parseModelKind(renderModelKind(kind)))).toEqual(
      kind
    );
  });

  test.for(kinds)('[$id] classifies its dump back', ({ kind }) => {
    expect(classifyModelKind(dumpModelKind(kind))).toEqual(kind);
  });

  describe('Dialects', () => {
    const kind = createIncrementalByTimeRangeKind({
      timeColumn: { column: 'ds', format: '%Y-%m-%d %H:%M:%S' },
      lookback: 1
    });

    it('renders the format in dialect notation', () => {
      expect(renderModelKind(kind, { dialect: 'postgres' })).toBe(
        "INCREMENTAL_BY_TIME_RANGE (time_column (ds, 'YYYY-MM-DD HH24:MI:SS'), lookback 1)"
      );
    });

    test.for(['spark', 'postgres', 'mysql', 'snowflake'])(
      '[%s] reads its own rendering back',
      dialect => {
        const text = renderModelKind(kind, { dialect });

        expect(classifyModelKind(parseModelKind(text), { dialect })).toEqual(
          kind
        );
      }
    );
  });

  it('renders the default seed batch size', () => {
    expect(renderModelKind(createSeedKind({ path: 'a.csv' }))).toBe(
      "SEED (path 'a.csv', batch_size 1000)"
    );
  });
});
