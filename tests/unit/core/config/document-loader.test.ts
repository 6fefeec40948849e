import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  DEFAULT_CONFIG_FILE_NAMES,
  findConfigFile,
  loadConfigLayer,
  parseConfigDocument,
  resolveConfigFileNames,
} from '../../../../src/core/config/document-loader.ts';

describe('Document Loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'yapenv-loader-test-')));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('resolveConfigFileNames', () => {
    it('should use the default names', () => {
      assert.deepStrictEqual(resolveConfigFileNames({}), [...DEFAULT_CONFIG_FILE_NAMES]);
    });

    it('should replace the defaults with YAPENV_CONFIG_FILES', () => {
      assert.deepStrictEqual(resolveConfigFileNames({ YAPENV_CONFIG_FILES: 'a.yaml, b.yaml c.json' }), [
        'a.yaml',
        'b.yaml',
        'c.json',
      ]);
    });

    it('should append extra names without duplicates', () => {
      assert.deepStrictEqual(resolveConfigFileNames({ YAPENV_CONFIG_FILES: 'a.yaml' }, ['a.yaml', 'b.yaml']), [
        'a.yaml',
        'b.yaml',
      ]);
    });
  });

  describe('findConfigFile', () => {
    it('should return the first existing candidate in order', async () => {
      await fs.writeFile(path.join(tempDir, '.yapenv.yml'), 'a: 1\n');
      await fs.writeFile(path.join(tempDir, '.yapenv.json'), '{}');

      const found = await findConfigFile(tempDir, DEFAULT_CONFIG_FILE_NAMES);
      assert.strictEqual(found, path.join(tempDir, '.yapenv.yml'));
    });

    it('should skip directories named like a candidate', async () => {
      await fs.mkdir(path.join(tempDir, '.yapenv.yaml'));
      await fs.writeFile(path.join(tempDir, '.yapenv'), 'a: 1\n');

      const found = await findConfigFile(tempDir, DEFAULT_CONFIG_FILE_NAMES);
      assert.strictEqual(found, path.join(tempDir, '.yapenv'));
    });

    it('should return null when nothing matches', async () => {
      assert.strictEqual(await findConfigFile(tempDir, DEFAULT_CONFIG_FILE_NAMES), null);
    });
  });

  describe('parseConfigDocument', () => {
    it('should parse YAML', () => {
      const result = parseConfigDocument('/x/.yapenv.yaml', 'python_version: "3.11"\nrequirements:\n  - black\n');
      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, { python_version: '3.11', requirements: ['black'] });
    });

    it('should parse JSON for .json files', () => {
      const result = parseConfigDocument('/x/.yapenv.json', '{"inherit": true}');
      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, { inherit: true });
    });

    it('should treat an empty file as an empty mapping', () => {
      const result = parseConfigDocument('/x/.yapenv.yaml', '  \n');
      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, {});
    });

    it('should treat a comment-only file as an empty mapping', () => {
      const result = parseConfigDocument('/x/.yapenv.yaml', '# nothing here\n');
      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, {});
    });

    it('should fail with ConfigParseError on broken syntax', () => {
      const result = parseConfigDocument('/x/.yapenv.json', '{"a": ');
      assert.ok(!result.ok);
      assert.strictEqual(result.err.type, 'ConfigParseError');
    });

    it('should fail with ConfigValidationError when the root is not a mapping', () => {
      const result = parseConfigDocument('/x/.yapenv.yaml', '- a\n- b\n');
      assert.ok(!result.ok);
      assert.strictEqual(result.err.type, 'ConfigValidationError');
      assert.strictEqual(
        result.err.message,
        'Configuration validation failed (/x/.yapenv.yaml): document root must be a mapping',
      );
    });
  });

  describe('loadConfigLayer', () => {
    it('should anchor requirement imports to the file directory', async () => {
      await fs.writeFile(
        path.join(tempDir, '.yapenv.yaml'),
        [
          'requirements:',
          '  - import: requirements.txt',
          '  - black',
          'environments:',
          '  dev:',
          '    requirements:',
          '      - import: ../shared/dev.txt',
          '',
        ].join('\n'),
      );

      const result = await loadConfigLayer(tempDir, DEFAULT_CONFIG_FILE_NAMES);
      assert.ok(result.ok);
      assert.ok(result.val !== null);
      assert.strictEqual(result.val.filePath, path.join(tempDir, '.yapenv.yaml'));
      assert.strictEqual(result.val.directory, tempDir);
      assert.deepStrictEqual(result.val.document, {
        requirements: [{ import: path.join(tempDir, 'requirements.txt') }, 'black'],
        environments: {
          dev: { requirements: [{ import: path.join(path.dirname(tempDir), 'shared', 'dev.txt') }] },
        },
      });
    });

    it('should return null when the directory has no configuration', async () => {
      const result = await loadConfigLayer(tempDir, DEFAULT_CONFIG_FILE_NAMES);
      assert.ok(result.ok);
      assert.strictEqual(result.val, null);
    });

    it('should report a lookup failure as ConfigReadError naming the directory', async () => {
      // ファイル名の長さ上限を超える候補は stat が ENAMETOOLONG で失敗する
      const result = await loadConfigLayer(tempDir, ['x'.repeat(300)]);
      assert.ok(!result.ok);
      assert.ok(result.err.type === 'ConfigReadError');
      assert.strictEqual(result.err.path, tempDir);
      assert.ok(result.err.message.startsWith(`Failed to read ${tempDir}: `));
    });
  });
});
