/**
 * Path Query Engine
 *
 * `my_custom_config.a_list[0].a_key` のようなパス式で解決済みドキュメントの値を取り出す
 */

import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { PathNotFoundError } from '../../types/errors.ts';
import { pathNotFound } from '../../types/errors.ts';
import type { ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject } from '../../types/layered-config.ts';

export type PathStep = { readonly kind: 'key'; readonly key: string } | { readonly kind: 'index'; readonly index: number };

/**
 * ドット区切りの1区間（例: "a_list[0]" → key "a_list", index 0）
 */
export interface PathPart {
  readonly raw: string;
  readonly steps: readonly PathStep[];
}

const PART_PATTERN = /^(.*?)((?:\[\d+\])*)$/;
const INDEX_PATTERN = /\[(\d+)\]/g;

/**
 * パス式を区間に分解
 *
 * 空の区間（`a..b` や先頭・末尾のドット）は無視する。
 * `[` `]` を含んでも添字として読めない部分はキー名の一部として扱う。
 */
export function parsePathExpression(expression: string): PathPart[] {
  const parts: PathPart[] = [];

  for (const raw of expression.split('.')) {
    if (raw.length === 0) {
      continue;
    }

    const match = PART_PATTERN.exec(raw);
    const key = match?.[1] ?? raw;
    const indices = match?.[2] ?? '';

    const steps: PathStep[] = [];
    if (key.length > 0) {
      steps.push({ kind: 'key', key });
    }
    for (const indexMatch of indices.matchAll(INDEX_PATTERN)) {
      steps.push({ kind: 'index', index: Number(indexMatch[1]) });
    }

    parts.push({ raw, steps });
  }

  return parts;
}

function stepInto(current: ConfigValue, step: PathStep): ConfigValue | undefined {
  if (step.kind === 'key') {
    if (!isConfigObject(current) || !Object.prototype.hasOwnProperty.call(current, step.key)) {
      return undefined;
    }
    return current[step.key];
  }

  if (!Array.isArray(current) || step.index >= current.length) {
    return undefined;
  }
  return current[step.index];
}

/**
 * パス式で値を取り出す
 *
 * 種類の違うノード・存在しないキー・範囲外の添字のいずれかで PathNotFoundError。
 * 空のパス式はドキュメント全体を返す。
 *
 * @param root - 解決済みドキュメント
 * @param expression - パス式（例: "a.b[0].c"）
 */
export function queryConfigValue(root: ConfigValue, expression: string): Result<ConfigValue, PathNotFoundError> {
  const consumed: string[] = [];
  let current = root;

  for (const part of parsePathExpression(expression)) {
    for (const step of part.steps) {
      const next = stepInto(current, step);
      if (next === undefined) {
        return createErr(pathNotFound(expression, part.raw, consumed.join('.')));
      }
      current = next;
    }
    consumed.push(part.raw);
  }

  return createOk(current);
}

/**
 * スカラー値（マッピング・シーケンス以外）か
 */
export function isScalarValue(value: ConfigValue): value is string | number | boolean | null {
  return value === null || typeof value !== 'object';
}
