/**
 * エラー表示と終了コード
 */

import * as util from 'node:util';
import type { Result } from 'option-t/plain_result';
import { resolveConfig, type ResolveConfigOptions, type ResolvedConfig } from '../../core/config/resolve-config.ts';
import type { ConfigError, VenvError } from '../../types/errors.ts';
import type { CliContext } from '../context.ts';
import { type CommonOptionValues, toResolveConfigOptions } from './common-options.ts';

export type CliError = ConfigError | VenvError;

export const EXIT_FAILURE = 1;
/** 参照先が見つからない（未定義の環境・パス） */
export const EXIT_NOT_FOUND = 2;

export function exitCodeFor(error: CliError): number {
  switch (error.type) {
    case 'UnknownEnvironmentError':
    case 'PathNotFoundError':
      return EXIT_NOT_FOUND;
    default:
      return EXIT_FAILURE;
  }
}

/**
 * --full-errors または YAPENV_FULL_ERRORS=true/1
 */
export function isFullErrors(flag: boolean | undefined, env: NodeJS.ProcessEnv): boolean {
  if (flag === true) {
    return true;
  }
  const value = env['YAPENV_FULL_ERRORS']?.trim().toLowerCase();
  return value === 'true' || value === '1';
}

/**
 * エラーを1行で表示し、終了コードを設定
 */
export function reportError(error: CliError, context: CliContext, fullErrors = false): void {
  context.logger.error(error.message);
  if (fullErrors) {
    context.logger.error(util.inspect(error, { depth: null, colors: false }));
  }
  context.setExitCode(exitCodeFor(error));
}

/**
 * 失敗した Result を報告して undefined を返す
 */
export function unwrapOrReport<T>(
  result: Result<T, CliError>,
  context: CliContext,
  values: CommonOptionValues,
): T | undefined {
  if (!result.ok) {
    reportError(result.err, context, isFullErrors(values.fullErrors, context.env));
    return undefined;
  }
  return result.val;
}

/**
 * 共通オプションから設定を解決する。失敗時はエラーを報告して undefined
 */
export async function resolveOrReport(
  values: CommonOptionValues,
  context: CliContext,
  overrides: Partial<ResolveConfigOptions> = {},
): Promise<ResolvedConfig | undefined> {
  const result = await resolveConfig(toResolveConfigOptions(values, context, overrides));
  return unwrapOrReport(result, context, values);
}
