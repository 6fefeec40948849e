/**
 * Requirement Flattener
 *
 * requirements リスト（literal / package / import）を、pip にそのまま渡せる
 * 指定子文字列の順序付きリストに展開する
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigError } from '../../types/errors.ts';
import { requirementImportError } from '../../types/errors.ts';
import type { ConfigObject, ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject, isReplaceMarker } from '../../types/layered-config.ts';
import type { DuplicatePolicy, RequirementEntry } from '../../types/requirement.ts';

export interface FlattenRequirementsOptions {
  /** 重複除去の方針（デフォルト: 'first-wins'） */
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * 先頭のパッケージ名部分（バージョン指定子・extras・マーカーの手前まで）
 */
const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][\w.-]*/;

/**
 * 重複判定に使うパッケージ名
 *
 * PEP 503 の正規化（小文字化、`-` `_` `.` の連続を `-` に）を適用する。
 * 名前として読めない指定子（`-e git+...` など）は文字列全体をキーにする。
 */
export function requirementPackageName(specifier: string): string {
  const trimmed = specifier.trim();
  const name = PACKAGE_NAME_PATTERN.exec(trimmed)?.[0];
  if (name === undefined) {
    return trimmed;
  }
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * requirements ファイルの内容を指定子の行リストにする
 *
 * 空行と `#` で始まる行は読み飛ばす。それ以外の行は前後の空白だけ除いてそのまま使う。
 */
export function parseRequirementsFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * 重複する指定子を除去
 *
 * 'first-wins' は最初の出現を、'last-wins' は最後の出現をその位置に残す。
 */
export function dedupeSpecifiers(specifiers: readonly string[], policy: DuplicatePolicy = 'first-wins'): string[] {
  const ordered = policy === 'first-wins' ? [...specifiers] : [...specifiers].reverse();
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const specifier of ordered) {
    const name = requirementPackageName(specifier);
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    kept.push(specifier);
  }

  return policy === 'first-wins' ? kept : kept.reverse();
}

/**
 * requirements を展開して重複を除去
 *
 * @param entries - 有効設定の requirements（import パスは絶対化済み）
 * @returns pip に渡す指定子のリスト
 */
export async function flattenRequirements(
  entries: readonly RequirementEntry[],
  options: FlattenRequirementsOptions = {},
): Promise<Result<string[], ConfigError>> {
  const expanded: string[] = [];

  for (const entry of entries) {
    switch (entry.kind) {
      case 'literal':
        if (entry.specifier.length > 0) {
          expanded.push(entry.specifier);
        }
        break;
      case 'package':
        if (entry.name.length > 0) {
          expanded.push(entry.name);
        }
        break;
      case 'import': {
        let content: string;
        try {
          content = await fs.readFile(entry.path, 'utf-8');
        } catch (error) {
          return createErr(requirementImportError(entry.path, error));
        }
        expanded.push(...parseRequirementsFile(content));
        break;
      }
    }
  }

  return createOk(dedupeSpecifiers(expanded, options.duplicatePolicy));
}

function anchorRequirementList(value: ConfigValue, directory: string): ConfigValue {
  if (isReplaceMarker(value)) {
    return { $replace: anchorRequirementList(value.$replace, directory) };
  }

  if (!Array.isArray(value)) {
    return value;
  }

  return value.map((entry) => {
    const importPath = isConfigObject(entry) ? entry['import'] : undefined;
    if (isConfigObject(entry) && typeof importPath === 'string') {
      return { ...entry, import: path.resolve(directory, importPath) };
    }
    return entry;
  });
}

/**
 * ドキュメント内の `{import: path}` を宣言元ディレクトリ基準の絶対パスにする
 *
 * トップレベルの requirements と、各 environments.<name>.requirements が対象。
 * 継承でマージした後も、祖先の import は祖先のディレクトリを基準に解決される。
 */
export function anchorRequirementImports(document: ConfigObject, directory: string): ConfigObject {
  const result: ConfigObject = { ...document };

  const requirements = result['requirements'];
  if (requirements !== undefined) {
    result['requirements'] = anchorRequirementList(requirements, directory);
  }

  const environments = result['environments'];
  if (isConfigObject(environments)) {
    const anchored: ConfigObject = {};
    for (const [name, overlay] of Object.entries(environments)) {
      const overlayRequirements = isConfigObject(overlay) ? overlay['requirements'] : undefined;
      anchored[name] =
        isConfigObject(overlay) && overlayRequirements !== undefined
          ? { ...overlay, requirements: anchorRequirementList(overlayRequirements, directory) }
          : overlay;
    }
    result['environments'] = anchored;
  }

  return result;
}
