/**
 * Layered Configuration Types
 *
 * 設定ドキュメント（YAML/JSON）を表す汎用値ツリーと、継承チェーンの各階層の型定義
 */

/**
 * 特殊記法: $replace
 *
 * 下位階層（祖先・ベース）の値とマージせず、指定した値で完全置換する
 *
 * 使用例:
 * ```yaml
 * requirements:
 *   $replace:
 *     - black
 * ```
 */
export interface ReplaceMarker {
  readonly $replace: ConfigValue;
}

/**
 * 設定値の型
 *
 * パース済みドキュメント、マージ結果、requirementエントリはすべてこの型で表す
 */
export type ConfigValue = string | number | boolean | null | ConfigObject | ConfigValue[];

/**
 * 設定オブジェクト（マッピング）
 */
export interface ConfigObject {
  [key: string]: ConfigValue;
}

/**
 * 設定ファイル1枚分の階層
 */
export interface ConfigLayer {
  /** 設定ファイルの絶対パス */
  readonly filePath: string;
  /** 設定ファイルのあるディレクトリ（相対パス解決の基準） */
  readonly directory: string;
  /** パース済みドキュメント（import パスは directory 基準で絶対化済み） */
  readonly document: ConfigObject;
}

/**
 * 継承解決の結果
 */
export interface InheritedConfig {
  /** 祖先から順にマージしたドキュメント */
  readonly document: ConfigObject;
  /** マージに参加した階層（祖先が先、起点ディレクトリの設定が最後） */
  readonly layers: readonly ConfigLayer[];
}

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isReplaceMarker(value: unknown): value is ReplaceMarker {
  return isConfigObject(value) && '$replace' in value && Object.keys(value).length === 1;
}
