/**
 * Layer Merge
 *
 * 継承（祖先 → 子）と環境オーバーレイ（ベース → 環境）で共通に使うマージ処理
 */

import type { ConfigObject, ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject, isReplaceMarker } from '../../types/layered-config.ts';

export interface MergeDocumentsOptions {
  /**
   * 子要素の $replace を残すトップレベルキー
   *
   * 環境定義（environments.<name>）のマーカーはオーバーレイ適用時に評価するため、
   * 継承マージでは取り除かない。
   */
  readonly deferMarkersUnder?: readonly string[];
}

/**
 * Deep Merge with $replace support
 *
 * マージ仕様:
 * - オブジェクト: 再帰的にマージ
 * - 配列: 連結（下位階層の要素が先、上位階層の要素が後）
 * - プリミティブ: 上位階層が優先
 * - $replace: 完全置換（マージしない）
 *
 * 入力は変更せず、新しい値を返す。keepMarkers が false なら結果に $replace は残らない。
 *
 * @param lower - 下位優先度の値（祖先・ベース）
 * @param upper - 上位優先度の値（子・環境）
 * @param keepMarkers - $replace を評価後もマーカーとして残す
 */
export function mergeConfigValues(
  lower: ConfigValue | undefined,
  upper: ConfigValue | undefined,
  keepMarkers = false,
): ConfigValue {
  if (upper === undefined) {
    return lower ?? null;
  }

  if (isReplaceMarker(upper)) {
    const replacement = stripReplaceMarkers(upper.$replace);
    return keepMarkers ? { $replace: replacement } : replacement;
  }

  // 残したマーカーに後の階層を重ねる場合は、置換後の値にマージしてマーカーを保つ
  if (keepMarkers && isReplaceMarker(lower)) {
    return { $replace: mergeConfigValues(lower.$replace, upper) };
  }

  if (Array.isArray(upper)) {
    return Array.isArray(lower) ? [...lower, ...upper] : [...upper];
  }

  if (!isConfigObject(upper)) {
    return upper;
  }

  // 下位に対応するマッピングがなくても、ネストした $replace を解決するため空マッピングとマージする
  return mergeConfigObjects(isConfigObject(lower) ? lower : {}, upper, keepMarkers);
}

/**
 * 2つのマッピングをキーごとにマージ
 */
export function mergeConfigObjects(lower: ConfigObject, upper: ConfigObject, keepMarkers = false): ConfigObject {
  const merged: ConfigObject = { ...lower };

  for (const [key, upperValue] of Object.entries(upper)) {
    merged[key] = mergeConfigValues(merged[key], upperValue, keepMarkers);
  }

  return merged;
}

/**
 * 子要素のマーカーを残してマッピングをマージ
 *
 * 値自体の $replace は通常どおり評価する。
 */
function mergeDeferringChildMarkers(lower: ConfigValue | undefined, upper: ConfigValue | undefined): ConfigValue {
  if (isReplaceMarker(upper)) {
    return mergeDeferringChildMarkers(undefined, upper.$replace);
  }
  if (!isConfigObject(upper)) {
    return mergeConfigValues(lower, upper);
  }

  const merged: ConfigObject = isConfigObject(lower) ? { ...lower } : {};
  for (const [key, upperValue] of Object.entries(upper)) {
    merged[key] = mergeConfigValues(merged[key], upperValue, true);
  }
  return merged;
}

/**
 * 複数のドキュメントを下位優先度から順にマージ
 */
export function mergeConfigDocuments(
  documents: readonly ConfigObject[],
  options: MergeDocumentsOptions = {},
): ConfigObject {
  const deferred = options.deferMarkersUnder ?? [];
  let merged: ConfigObject = {};

  for (const document of documents) {
    const next: ConfigObject = { ...merged };
    for (const [key, value] of Object.entries(document)) {
      next[key] = deferred.includes(key)
        ? mergeDeferringChildMarkers(next[key], value)
        : mergeConfigValues(next[key], value);
    }
    merged = next;
  }

  return merged;
}

/**
 * $replace マーカーを中身の値に置き換える
 */
export function stripReplaceMarkers(value: ConfigValue): ConfigValue {
  if (isReplaceMarker(value)) {
    return stripReplaceMarkers(value.$replace);
  }
  if (Array.isArray(value)) {
    return value.map(stripReplaceMarkers);
  }
  if (isConfigObject(value)) {
    return stripObjectMarkers(value);
  }
  return value;
}

/**
 * マッピング内の $replace マーカーをすべて取り除く
 */
export function stripObjectMarkers(document: ConfigObject): ConfigObject {
  const stripped: ConfigObject = {};
  for (const [key, value] of Object.entries(document)) {
    stripped[key] = stripReplaceMarkers(value);
  }
  return stripped;
}
