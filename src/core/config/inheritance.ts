/**
 * Inheritance Resolver
 *
 * `inherit: true` を宣言した設定から親ディレクトリへ遡り、
 * 祖先の設定を古い順（祖先 → 子）にマージする
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ConfigError } from '../../types/errors.ts';
import { configReadError, inheritanceCycle } from '../../types/errors.ts';
import type { ConfigLayer, InheritedConfig } from '../../types/layered-config.ts';
import { loadConfigLayer } from './document-loader.ts';
import { ENVIRONMENTS_KEY } from './environment-overlay.ts';
import { mergeConfigDocuments } from './merge.ts';

export interface ResolveInheritanceOptions {
  /** 候補ファイル名（優先順） */
  readonly candidates: readonly string[];
  /**
   * 読み込む祖先の最大数
   *
   * undefined または負数で無制限、0 で継承しない
   */
  readonly inheritDepth?: number;
}

/**
 * 訪問済み判定に使う正規化済みディレクトリ
 *
 * シンボリックリンクを解決する。存在しない場合は絶対パスのまま使う。
 */
async function canonicalDirectory(directory: string): Promise<string> {
  try {
    return await fs.realpath(directory);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return directory;
    }
    throw error;
  }
}

/**
 * 起点ディレクトリから継承チェーンを解決
 *
 * 終了条件:
 * - ファイルシステムのルートに到達
 * - 設定ファイルのないディレクトリに到達
 * - `inherit` が true でない設定に到達
 * - inheritDepth に到達
 *
 * 同じディレクトリ（正規化後）に2度到達した場合は InheritanceCycleError。
 *
 * @returns 継承解決結果（起点ディレクトリに設定ファイルがない場合はnull）
 */
export async function resolveInheritance(
  startDirectory: string,
  options: ResolveInheritanceOptions,
): Promise<Result<InheritedConfig | null, ConfigError>> {
  const { candidates, inheritDepth } = options;
  const maxAncestors = inheritDepth === undefined || inheritDepth < 0 ? Number.POSITIVE_INFINITY : inheritDepth;

  // 起点側から順に積む
  const collected: ConfigLayer[] = [];
  const visited: string[] = [];
  let directory = path.resolve(startDirectory);

  while (true) {
    let canonical: string;
    try {
      canonical = await canonicalDirectory(directory);
    } catch (error) {
      return createErr(configReadError(directory, error));
    }

    if (visited.includes(canonical)) {
      return createErr(inheritanceCycle(canonical, visited));
    }
    visited.push(canonical);

    const layerResult = await loadConfigLayer(directory, candidates);
    if (!layerResult.ok) {
      return layerResult;
    }

    const layer = layerResult.val;
    if (layer === null) {
      break;
    }
    collected.push(layer);

    if (layer.document['inherit'] !== true) {
      break;
    }
    if (collected.length > maxAncestors) {
      break;
    }

    const parent = path.dirname(directory);
    if (parent === directory) {
      break;
    }
    directory = parent;
  }

  if (collected.length === 0) {
    return createOk(null);
  }

  const layers = [...collected].reverse();
  // 環境定義内の $replace はオーバーレイ適用時に評価する
  return createOk({
    document: mergeConfigDocuments(
      layers.map((layer) => layer.document),
      { deferMarkersUnder: [ENVIRONMENTS_KEY] },
    ),
    layers,
  });
}
