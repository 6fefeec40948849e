/**
 * CoreConfig projection
 *
 * 汎用の値ツリーから型付きの有効設定を取り出す。既知のキー以外は extra に残す。
 */

import type { ZodError } from 'zod';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import { CORE_CONFIG_KEYS, ConfigDocumentSchema, DEFAULT_ENV_FILE, type CoreConfig } from '../../types/config.ts';
import type { ConfigError } from '../../types/errors.ts';
import { configValidationError } from '../../types/errors.ts';
import type { ConfigObject } from '../../types/layered-config.ts';

const CORE_KEY_SET: ReadonlySet<string> = new Set(CORE_CONFIG_KEYS);

/**
 * Zodの検証エラーを "キーパス: メッセージ" の並びにまとめる
 */
export function formatSchemaIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const keyPath = issue.path.map((part) => String(part)).join('.');
      return `${keyPath === '' ? '(root)' : keyPath}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * env_file の既定値（YAPENV_ENV_FILE → ".env"）
 */
export function defaultEnvFile(env: NodeJS.ProcessEnv): string {
  const fromEnv = env['YAPENV_ENV_FILE'];
  return fromEnv !== undefined && fromEnv.trim() !== '' ? fromEnv : DEFAULT_ENV_FILE;
}

/**
 * 値ツリーを CoreConfig に射影
 *
 * @param document - 継承・環境オーバーレイ適用済みのドキュメント
 * @param env - 既定値の決定に使う環境変数
 * @param filePath - エラー表示用の設定ファイルパス
 */
export function projectCoreConfig(
  document: ConfigObject,
  env: NodeJS.ProcessEnv,
  filePath?: string,
): Result<CoreConfig, ConfigError> {
  const parsed = ConfigDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return createErr(configValidationError(formatSchemaIssues(parsed.error), filePath));
  }

  const data = parsed.data;

  const extra: ConfigObject = {};
  for (const [key, value] of Object.entries(document)) {
    if (!CORE_KEY_SET.has(key)) {
      extra[key] = value;
    }
  }

  return createOk({
    pythonVersion: data.python_version,
    pythonExecutable: data.python_executable ?? undefined,
    venvDirectory: data.venv_directory,
    pipConfigPath: data.pip_config_path ?? undefined,
    inherit: data.inherit,
    envFile: data.env_file ?? defaultEnvFile(env),
    pipInstallArgs: data.pip_install_args,
    virtualenvArgs: data.virtualenv_args,
    requirements: data.requirements,
    extra,
  });
}
