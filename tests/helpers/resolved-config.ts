import * as path from 'node:path';
import type { ResolvedConfig } from '../../src/core/config/resolve-config.ts';
import type { CoreConfig } from '../../src/types/config.ts';

export const TEST_PROJECT_DIR = '/work/project';

/**
 * テスト用の ResolvedConfig
 *
 * ファイルシステムを読まずに組み立てる
 */
export const createResolvedConfig = (
  config: Partial<CoreConfig> = {},
  overrides: Partial<Omit<ResolvedConfig, 'config'>> = {},
): ResolvedConfig => {
  const core: CoreConfig = {
    pythonVersion: '3',
    venvDirectory: '.venv',
    inherit: false,
    envFile: '.env',
    pipInstallArgs: [],
    virtualenvArgs: [],
    requirements: [],
    extra: {},
    ...config,
  };

  return {
    config: core,
    document: {},
    layers: [],
    sourceDirectory: TEST_PROJECT_DIR,
    venvPath: path.join(TEST_PROJECT_DIR, core.venvDirectory),
    envFilePath: path.join(TEST_PROJECT_DIR, core.envFile),
    pipConfigPath: core.pipConfigPath !== undefined ? path.join(TEST_PROJECT_DIR, core.pipConfigPath) : undefined,
    requirements: [],
    ...overrides,
  };
};
