import { describe, it } from 'node:test';
import assert from 'node:assert';
import { isScalarValue, parsePathExpression, queryConfigValue } from '../../../../src/core/config/path-query.ts';
import type { ConfigObject } from '../../../../src/types/layered-config.ts';

describe('Path Query Engine', () => {
  const document: ConfigObject = {
    python_version: '3.11',
    my_custom_config: {
      a_list: [{ a_key: 'v' }, 'second'],
      nested: [[1, 2], [3]],
      empty: null,
    },
  };

  describe('parsePathExpression', () => {
    it('should split keys and indices', () => {
      assert.deepStrictEqual(parsePathExpression('a.b[0][2].c'), [
        { raw: 'a', steps: [{ kind: 'key', key: 'a' }] },
        {
          raw: 'b[0][2]',
          steps: [
            { kind: 'key', key: 'b' },
            { kind: 'index', index: 0 },
            { kind: 'index', index: 2 },
          ],
        },
        { raw: 'c', steps: [{ kind: 'key', key: 'c' }] },
      ]);
    });

    it('should ignore empty segments', () => {
      assert.deepStrictEqual(
        parsePathExpression('.a..b.').map((part) => part.raw),
        ['a', 'b'],
      );
    });
  });

  describe('queryConfigValue', () => {
    it('should walk mappings and sequences', () => {
      const result = queryConfigValue(document, 'my_custom_config.a_list[0].a_key');
      assert.ok(result.ok);
      assert.strictEqual(result.val, 'v');
    });

    it('should follow consecutive indices', () => {
      const result = queryConfigValue(document, 'my_custom_config.nested[0][1]');
      assert.ok(result.ok);
      assert.strictEqual(result.val, 2);
    });

    it('should return null values as found', () => {
      const result = queryConfigValue(document, 'my_custom_config.empty');
      assert.ok(result.ok);
      assert.strictEqual(result.val, null);
    });

    it('should return the whole document for an empty expression', () => {
      const result = queryConfigValue(document, '');
      assert.ok(result.ok);
      assert.strictEqual(result.val, document);
    });

    it('should report the failing segment for an out-of-range index', () => {
      const result = queryConfigValue(document, 'my_custom_config.a_list[5]');
      assert.ok(!result.ok);
      assert.strictEqual(result.err.segment, 'a_list[5]');
      assert.strictEqual(result.err.consumed, 'my_custom_config');
      assert.strictEqual(
        result.err.message,
        'Path not found: my_custom_config.a_list[5] (segment "a_list[5]" after "my_custom_config")',
      );
    });

    it('should fail when indexing into a mapping', () => {
      const result = queryConfigValue(document, 'my_custom_config[0]');
      assert.ok(!result.ok);
      assert.strictEqual(result.err.message, 'Path not found: my_custom_config[0] (segment "my_custom_config[0]")');
    });

    it('should fail when reading a key from a scalar', () => {
      const result = queryConfigValue(document, 'python_version.major');
      assert.ok(!result.ok);
      assert.strictEqual(result.err.segment, 'major');
      assert.strictEqual(result.err.consumed, 'python_version');
    });
  });

  describe('isScalarValue', () => {
    it('should tell scalars from structures', () => {
      assert.strictEqual(isScalarValue('a'), true);
      assert.strictEqual(isScalarValue(null), true);
      assert.strictEqual(isScalarValue([]), false);
      assert.strictEqual(isScalarValue({}), false);
    });
  });
});
