/**
 * Environment Overlay Resolver
 *
 * `environments.<name>` をベースドキュメントに重ねて、環境ごとの設定を作る
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigError } from '../../types/errors.ts';
import { configValidationError, unknownEnvironment } from '../../types/errors.ts';
import type { ConfigObject } from '../../types/layered-config.ts';
import { isConfigObject, isReplaceMarker } from '../../types/layered-config.ts';
import { mergeConfigObjects, stripObjectMarkers } from './merge.ts';

export const ENVIRONMENTS_KEY = 'environments';

export interface ApplyEnvironmentOptions {
  /** 未定義の環境名を指定された場合にエラーにせずベースを返す */
  readonly ignoreMissingEnvironment?: boolean;
}

/**
 * 宣言されている環境名の一覧
 */
export function listEnvironments(document: ConfigObject): Result<string[], ConfigError> {
  const environments = document[ENVIRONMENTS_KEY];

  if (environments === undefined || environments === null) {
    return createOk([]);
  }
  if (!isConfigObject(environments)) {
    return createErr(configValidationError(`"${ENVIRONMENTS_KEY}" must be a mapping`));
  }

  return createOk(Object.keys(environments));
}

/**
 * 環境オーバーレイを適用
 *
 * スカラーは環境側が優先、リストはベースの要素の後ろに環境の要素を連結する。
 * 環境側の $replace はベースの値を置き換える。結果に $replace は残らない。
 * 入力ドキュメントは変更しない。
 *
 * @param document - 継承マージ済みのベースドキュメント
 * @param environment - 環境名（省略時はベースをそのまま返す）
 */
export function applyEnvironmentOverlay(
  document: ConfigObject,
  environment: string | undefined,
  options: ApplyEnvironmentOptions = {},
): Result<ConfigObject, ConfigError> {
  if (environment === undefined) {
    return createOk(stripObjectMarkers(document));
  }

  const namesResult = listEnvironments(document);
  if (!namesResult.ok) {
    return namesResult;
  }

  const environments = document[ENVIRONMENTS_KEY];
  const declared =
    isConfigObject(environments) && Object.prototype.hasOwnProperty.call(environments, environment)
      ? environments[environment]
      : undefined;
  // 環境定義そのものを置き換えた `dev: {$replace: ...}` は中身をオーバーレイにする
  const overlay = isReplaceMarker(declared) ? declared.$replace : declared;

  if (overlay === undefined) {
    if (options.ignoreMissingEnvironment === true) {
      return createOk(stripObjectMarkers(document));
    }
    return createErr(unknownEnvironment(environment, namesResult.val));
  }

  // `dev:` のように本体が空の環境は空のオーバーレイ
  if (overlay === null) {
    return createOk(stripObjectMarkers(document));
  }
  if (!isConfigObject(overlay)) {
    return createErr(configValidationError(`"${ENVIRONMENTS_KEY}.${environment}" must be a mapping`));
  }

  return createOk(stripObjectMarkers(mergeConfigObjects(document, overlay)));
}
