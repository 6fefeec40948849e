/**
 * Requirement Types
 *
 * `requirements` リストの1エントリ。ドキュメント上の表記によって3種類に分かれる。
 *
 * - `"black==23.1"` → literal
 * - `{ package: "black==23.1" }` → package
 * - `{ import: "requirements.txt" }` → import（ファイルの各行を literal として展開）
 */
export type RequirementEntry = LiteralRequirement | PackageRequirement | ImportRequirement;

export interface LiteralRequirement {
  readonly kind: 'literal';
  readonly specifier: string;
}

export interface PackageRequirement {
  readonly kind: 'package';
  readonly name: string;
}

export interface ImportRequirement {
  readonly kind: 'import';
  /** requirements ファイルのパス（読み込み時に宣言元ディレクトリ基準で絶対化済み） */
  readonly path: string;
}

/**
 * 重複除去の方針
 *
 * - 'first-wins': 最初の出現を残す（祖先・ベースの宣言が優先）
 * - 'last-wins': 最後の出現をその位置に残す（より具体的な階層の宣言が優先）
 */
export type DuplicatePolicy = 'first-wins' | 'last-wins';

export const literalRequirement = (specifier: string): LiteralRequirement => ({
  kind: 'literal',
  specifier,
});

export const packageRequirement = (name: string): PackageRequirement => ({
  kind: 'package',
  name,
});

export const importRequirement = (path: string): ImportRequirement => ({
  kind: 'import',
  path,
});
