import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  anchorRequirementImports,
  dedupeSpecifiers,
  flattenRequirements,
  parseRequirementsFile,
  requirementPackageName,
} from '../../../../src/core/config/requirements.ts';
import { importRequirement, literalRequirement, packageRequirement } from '../../../../src/types/requirement.ts';

describe('Requirement Flattener', () => {
  describe('requirementPackageName', () => {
    it('should strip version specifiers, extras and markers', () => {
      assert.strictEqual(requirementPackageName('black==23.1'), 'black');
      assert.strictEqual(requirementPackageName('requests[socks]>=2'), 'requests');
      assert.strictEqual(requirementPackageName("pywin32; sys_platform == 'win32'"), 'pywin32');
    });

    it('should normalize case and separators', () => {
      assert.strictEqual(requirementPackageName('Django_REST.framework'), 'django-rest-framework');
      assert.strictEqual(requirementPackageName('  zope.interface  '), 'zope-interface');
    });

    it('should use the whole specifier when no name can be read', () => {
      assert.strictEqual(requirementPackageName('-e ./local'), '-e ./local');
    });
  });

  describe('parseRequirementsFile', () => {
    it('should drop blank and comment lines', () => {
      assert.deepStrictEqual(parseRequirementsFile('black\n# comment\n\nflake8\n'), ['black', 'flake8']);
    });

    it('should accept CRLF line endings and trim lines', () => {
      assert.deepStrictEqual(parseRequirementsFile('  black==23.1 \r\nflake8\r\n'), ['black==23.1', 'flake8']);
    });
  });

  describe('dedupeSpecifiers', () => {
    it('should keep the first occurrence by default', () => {
      assert.deepStrictEqual(dedupeSpecifiers(['a==1', 'b', 'A==2', 'c']), ['a==1', 'b', 'c']);
    });

    it('should keep the last occurrence at its own position with last-wins', () => {
      assert.deepStrictEqual(dedupeSpecifiers(['a==1', 'b', 'A==2', 'c'], 'last-wins'), ['b', 'A==2', 'c']);
    });

    it('should be idempotent', () => {
      const once = dedupeSpecifiers(['x', 'y', 'x', 'z', 'y']);
      assert.deepStrictEqual(dedupeSpecifiers(once), once);
    });
  });

  describe('flattenRequirements', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'yapenv-req-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should expand imports in place and drop duplicates', async () => {
      const importPath = path.join(tempDir, 'requirements.txt');
      await fs.writeFile(importPath, 'black\n# comment\n\nflake8\n');

      const result = await flattenRequirements([
        literalRequirement('flake8==6.0'),
        importRequirement(importPath),
        packageRequirement('pytest'),
        literalRequirement(''),
      ]);

      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, ['flake8==6.0', 'black', 'pytest']);
    });

    it('should honor last-wins', async () => {
      const result = await flattenRequirements(
        [literalRequirement('black==22.0'), literalRequirement('isort'), literalRequirement('black==23.1')],
        { duplicatePolicy: 'last-wins' },
      );

      assert.ok(result.ok);
      assert.deepStrictEqual(result.val, ['isort', 'black==23.1']);
    });

    it('should fail with RequirementImportError for a missing file', async () => {
      const missing = path.join(tempDir, 'missing.txt');
      const result = await flattenRequirements([importRequirement(missing)]);

      assert.ok(!result.ok);
      assert.strictEqual(result.err.type, 'RequirementImportError');
      if (result.err.type === 'RequirementImportError') {
        assert.strictEqual(result.err.importPath, missing);
      }
    });
  });

  describe('anchorRequirementImports', () => {
    it('should resolve import paths inside $replace markers', () => {
      const anchored = anchorRequirementImports(
        { requirements: { $replace: [{ import: 'dev.txt' }, 'black'] } },
        '/project',
      );
      assert.deepStrictEqual(anchored, {
        requirements: { $replace: [{ import: path.resolve('/project', 'dev.txt') }, 'black'] },
      });
    });

    it('should leave absolute import paths alone', () => {
      const anchored = anchorRequirementImports({ requirements: [{ import: '/shared/base.txt' }] }, '/project');
      assert.deepStrictEqual(anchored, { requirements: [{ import: '/shared/base.txt' }] });
    });
  });
});
