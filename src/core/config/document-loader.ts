/**
 * Document Loader
 *
 * 候補ファイル名を順に探し、最初に見つかった設定ファイルを値ツリーとして読み込む
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigError } from '../../types/errors.ts';
import { configParseError, configReadError, configValidationError } from '../../types/errors.ts';
import type { ConfigLayer, ConfigObject, ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject } from '../../types/layered-config.ts';
import { anchorRequirementImports } from './requirements.ts';

export const DEFAULT_CONFIG_FILE_NAMES: readonly string[] = [
  '.yapenv.yaml',
  '.yapenv.yml',
  '.yapenv',
  '.yapenv.json',
];

/**
 * 候補ファイル名のリストを決定
 *
 * YAPENV_CONFIG_FILES（空白またはカンマ区切り）が既定リストを置き換え、
 * extraFileNames はその後ろに追加される
 */
export function resolveConfigFileNames(
  env: NodeJS.ProcessEnv,
  extraFileNames: readonly string[] = [],
): string[] {
  const fromEnv = env['YAPENV_CONFIG_FILES'];
  const base =
    fromEnv !== undefined && fromEnv.trim() !== ''
      ? fromEnv.split(/[\s,]+/).filter((name) => name.length > 0)
      : [...DEFAULT_CONFIG_FILE_NAMES];

  const names = [...base];
  for (const name of extraFileNames) {
    if (name.length > 0 && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * ディレクトリ内で最初に存在する候補ファイルのパスを返す（見つからない場合はnull）
 */
export async function findConfigFile(directory: string, candidates: readonly string[]): Promise<string | null> {
  for (const candidate of candidates) {
    const filePath = path.resolve(directory, candidate);
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile()) {
        return filePath;
      }
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        throw error;
      }
    }
  }
  return null;
}

/**
 * パーサーが返した値を ConfigValue に絞り込む
 *
 * 表現できない値（関数・Dateなど）が含まれる場合は undefined
 */
function toConfigValue(raw: unknown): ConfigValue | undefined {
  if (raw === null || typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw;
  }

  if (Array.isArray(raw)) {
    const items: ConfigValue[] = [];
    for (const item of raw) {
      const value = toConfigValue(item);
      if (value === undefined) {
        return undefined;
      }
      items.push(value);
    }
    return items;
  }

  if (typeof raw === 'object' && Object.getPrototypeOf(raw) === Object.prototype) {
    const result: ConfigObject = {};
    for (const [key, item] of Object.entries(raw)) {
      const value = toConfigValue(item);
      if (value === undefined) {
        return undefined;
      }
      result[key] = value;
    }
    return result;
  }

  return undefined;
}

/**
 * 設定ファイルの内容をパース
 *
 * `.json` で終わるファイルは JSON、それ以外は YAML として読む（JSON は YAML としても有効）。
 * 空のファイルは空のマッピングとして扱う。
 */
export function parseConfigDocument(filePath: string, content: string): Result<ConfigObject, ConfigError> {
  if (content.trim() === '') {
    return createOk({});
  }

  let raw: unknown;
  try {
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    return createErr(configParseError(filePath, error));
  }

  if (raw === null || raw === undefined) {
    return createOk({});
  }

  const value = toConfigValue(raw);
  if (value === undefined) {
    return createErr(configValidationError('document contains unsupported values', filePath));
  }
  if (!isConfigObject(value)) {
    return createErr(configValidationError('document root must be a mapping', filePath));
  }

  return createOk(value);
}

/**
 * ディレクトリの設定ファイルを1階層分読み込む
 *
 * @param directory - 探索するディレクトリ
 * @param candidates - 候補ファイル名（優先順）
 * @returns 設定階層（設定ファイルがない場合はnull）
 */
export async function loadConfigLayer(
  directory: string,
  candidates: readonly string[],
): Promise<Result<ConfigLayer | null, ConfigError>> {
  const absoluteDirectory = path.resolve(directory);

  let filePath: string | null;
  try {
    filePath = await findConfigFile(absoluteDirectory, candidates);
  } catch (error) {
    return createErr(configReadError(absoluteDirectory, error));
  }

  if (filePath === null) {
    return createOk(null);
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    return createErr(configReadError(filePath, error));
  }

  const parsed = parseConfigDocument(filePath, content);
  if (!parsed.ok) {
    return parsed;
  }

  return createOk({
    filePath,
    directory: absoluteDirectory,
    document: anchorRequirementImports(parsed.val, absoluteDirectory),
  });
}
