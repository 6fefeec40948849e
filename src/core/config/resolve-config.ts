/**
 * Effective configuration resolution
 *
 * Document Loader → Inheritance Resolver → Environment Overlay → CoreConfig → Requirement Flattener
 * の順に実行し、ディレクトリ × 環境ごとの有効設定を作る
 */

import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { CoreConfig } from '../../types/config.ts';
import type { ConfigError } from '../../types/errors.ts';
import { configNotFound } from '../../types/errors.ts';
import type { ConfigLayer, ConfigObject } from '../../types/layered-config.ts';
import type { DuplicatePolicy } from '../../types/requirement.ts';
import { projectCoreConfig } from './core-config.ts';
import { resolveConfigFileNames } from './document-loader.ts';
import { applyEnvironmentOverlay } from './environment-overlay.ts';
import { resolveInheritance } from './inheritance.ts';
import { flattenRequirements } from './requirements.ts';

export interface ResolveConfigOptions {
  /** 起点ディレクトリ（デフォルト: process.cwd()） */
  readonly cwd?: string;
  /** 適用する環境名 */
  readonly environment?: string;
  /** 環境変数（YAPENV_CONFIG_FILES / YAPENV_ENV_FILE の参照元、デフォルト: process.env） */
  readonly env?: NodeJS.ProcessEnv;
  /** 読み込む祖先の最大数（undefined・負数で無制限、0で継承しない） */
  readonly inheritDepth?: number;
  /** 候補ファイル名に追加する名前 */
  readonly extraConfigFiles?: readonly string[];
  /** 未定義の環境名をエラーにしない */
  readonly ignoreMissingEnvironment?: boolean;
  /** 設定ファイルがない場合に ConfigNotFoundError にする（デフォルト: false） */
  readonly requireConfigFile?: boolean;
  /** requirements の重複除去方針（デフォルト: 'first-wins'） */
  readonly duplicatePolicy?: DuplicatePolicy;
  /** import を読み込んで requirements を展開するか（デフォルト: true） */
  readonly loadRequirements?: boolean;
}

export interface ResolvedConfig {
  /** 型付きの有効設定 */
  readonly config: CoreConfig;
  /** 有効設定の元になった値ツリー（Path Query の対象） */
  readonly document: ConfigObject;
  /** マージに参加した設定ファイル（祖先が先） */
  readonly layers: readonly ConfigLayer[];
  /** 適用した環境名 */
  readonly environment?: string;
  /** 起点ディレクトリ（相対パスの基準） */
  readonly sourceDirectory: string;
  /** 仮想環境の絶対パス */
  readonly venvPath: string;
  /** env_file の絶対パス */
  readonly envFilePath: string;
  /** pip_config_path の絶対パス */
  readonly pipConfigPath?: string;
  /** 展開・重複除去済みの指定子（loadRequirements: false の場合は空） */
  readonly requirements: readonly string[];
}

/**
 * 有効設定を解決
 *
 * 失敗時は途中結果を返さない。
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Result<ResolvedConfig, ConfigError>> {
  const env = options.env ?? process.env;
  const sourceDirectory = path.resolve(options.cwd ?? process.cwd());
  const candidates = resolveConfigFileNames(env, options.extraConfigFiles);

  const inheritedResult = await resolveInheritance(sourceDirectory, {
    candidates,
    inheritDepth: options.inheritDepth,
  });
  if (!inheritedResult.ok) {
    return inheritedResult;
  }

  const inherited = inheritedResult.val;
  if (inherited === null && options.requireConfigFile === true) {
    return createErr(configNotFound(sourceDirectory, candidates));
  }

  const baseDocument = inherited?.document ?? {};
  const layers = inherited?.layers ?? [];
  const localFilePath = layers[layers.length - 1]?.filePath;

  const overlaidResult = applyEnvironmentOverlay(baseDocument, options.environment, {
    ignoreMissingEnvironment: options.ignoreMissingEnvironment,
  });
  if (!overlaidResult.ok) {
    return overlaidResult;
  }
  const document = overlaidResult.val;

  const configResult = projectCoreConfig(document, env, localFilePath);
  if (!configResult.ok) {
    return configResult;
  }
  const config = configResult.val;

  let requirements: string[] = [];
  if (options.loadRequirements !== false) {
    const flattened = await flattenRequirements(config.requirements, {
      duplicatePolicy: options.duplicatePolicy,
    });
    if (!flattened.ok) {
      return flattened;
    }
    requirements = flattened.val;
  }

  return createOk({
    config,
    document,
    layers,
    environment: options.environment,
    sourceDirectory,
    venvPath: path.resolve(sourceDirectory, config.venvDirectory),
    envFilePath: path.resolve(sourceDirectory, config.envFile),
    pipConfigPath:
      config.pipConfigPath !== undefined ? path.resolve(sourceDirectory, config.pipConfigPath) : undefined,
    requirements,
  });
}
