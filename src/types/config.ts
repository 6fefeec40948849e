import { z } from 'zod';
import type { ConfigObject } from './layered-config.ts';
import {
  importRequirement,
  literalRequirement,
  packageRequirement,
  type RequirementEntry,
} from './requirement.ts';

/** python_version 未指定時の既定値（virtualenv の --python にそのまま渡る） */
export const DEFAULT_PYTHON_VERSION = '3';
export const DEFAULT_VENV_DIRECTORY = '.venv';
export const DEFAULT_ENV_FILE = '.env';

/**
 * CoreConfig が型付きで扱うキー
 *
 * これ以外のキー（environments を含む）は extra にそのまま残る
 */
export const CORE_CONFIG_KEYS = [
  'python_version',
  'python_executable',
  'venv_directory',
  'pip_config_path',
  'inherit',
  'env_file',
  'pip_install_args',
  'virtualenv_args',
  'requirements',
] as const;

export type CoreConfigKey = (typeof CORE_CONFIG_KEYS)[number];

/**
 * コマンドライン引数として渡すスカラー
 *
 * WHY: YAML では `- 30` が数値になるため、文字列化して受け付ける
 */
const ArgSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

/**
 * Pythonバージョン
 *
 * NOTE: YAML の `3.10` は数値 3.1 として読まれる。正確に指定したい場合は引用符で囲む。
 */
const PythonVersionSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

/**
 * requirements の1エントリ
 *
 * 文字列・{package}・{import} のいずれか。package と import の混在は受け付けない。
 */
export const RequirementEntrySchema = z.union([
  z.string().transform((specifier): RequirementEntry => literalRequirement(specifier.trim())),
  z.strictObject({ package: z.string() }).transform((entry): RequirementEntry => packageRequirement(entry.package.trim())),
  z.strictObject({ import: z.string() }).transform((entry): RequirementEntry => importRequirement(entry.import)),
]);

/**
 * 設定ドキュメントのスキーマ
 *
 * 未知のキーは looseObject により保持される（extra として CoreConfig に渡す）
 */
export const ConfigDocumentSchema = z.looseObject({
  /** virtualenv に渡す Python バージョン（例: "3.11"） */
  python_version: PythonVersionSchema.default(DEFAULT_PYTHON_VERSION),
  /** Python 実行ファイルのパス。指定時は python_version より優先 */
  python_executable: z.string().nullish(),
  /** 仮想環境ディレクトリ（設定ファイルのディレクトリ基準） */
  venv_directory: z.string().default(DEFAULT_VENV_DIRECTORY),
  /** 仮想環境に pip.conf としてリンクする設定ファイル */
  pip_config_path: z.string().nullish(),
  /** 親ディレクトリの設定を継承するか */
  inherit: z.boolean().default(false),
  /** 読み込む .env ファイル。未指定時は YAPENV_ENV_FILE か ".env" */
  env_file: z.string().nullish(),
  /** pip install に追加する引数 */
  pip_install_args: z.array(ArgSchema).default([]),
  /** virtualenv に追加する引数 */
  virtualenv_args: z.array(ArgSchema).default([]),
  /** インストールするパッケージ */
  requirements: z.array(RequirementEntrySchema).default([]),
});

/**
 * 有効設定（ディレクトリ × 環境ごとに解決された設定）
 */
export interface CoreConfig {
  readonly pythonVersion: string;
  readonly pythonExecutable?: string;
  readonly venvDirectory: string;
  readonly pipConfigPath?: string;
  readonly inherit: boolean;
  readonly envFile: string;
  readonly pipInstallArgs: readonly string[];
  readonly virtualenvArgs: readonly string[];
  readonly requirements: readonly RequirementEntry[];
  /** 既知のキー以外（environments や任意のユーザー定義値） */
  readonly extra: ConfigObject;
}
