/**
 * 出力フォーマット
 *
 * list / cli / yaml / json の4形式で値を文字列化する
 */

import { stringify as stringifyYaml } from 'yaml';
import type { ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject } from '../../types/layered-config.ts';

export const OUTPUT_FORMATS = ['list', 'cli', 'yaml', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface FormatOptions {
  /** cli 形式でシェルクォートするか（デフォルト: true） */
  quote?: boolean;
}

// シェルで特別な意味を持たない文字だけで構成されているか
const SAFE_SHELL_ARG = /^[\w@%+=:,./-]+$/;

/**
 * シェル引数としてクォート
 *
 * 安全な文字だけなら何もしない。それ以外はシングルクォートで囲む。
 */
export function shellQuote(arg: string): string {
  if (arg.length === 0) {
    return "''";
  }
  if (SAFE_SHELL_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * list / cli 形式の要素に展開
 *
 * マッピングは key, value の並びに平坦化する
 */
function toItems(value: ConfigValue): ConfigValue[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (isConfigObject(value)) {
    return Object.entries(value).flatMap(([key, item]): ConfigValue[] => [key, item]);
  }
  return [value];
}

function itemToString(item: ConfigValue): string {
  if (item === null) {
    return 'null';
  }
  if (Array.isArray(item) || isConfigObject(item)) {
    return JSON.stringify(item);
  }
  return String(item);
}

/**
 * 値を指定形式で文字列化（末尾の改行なし）
 */
export function formatOutput(value: ConfigValue, format: OutputFormat, options: FormatOptions = {}): string {
  switch (format) {
    case 'list':
      return toItems(value).map(itemToString).join('\n');
    case 'cli': {
      const quote = options.quote ?? true;
      return toItems(value)
        .map(itemToString)
        .map((item) => (quote ? shellQuote(item) : item))
        .join(' ');
    }
    case 'yaml':
      return stringifyYaml(value).trimEnd();
    case 'json':
      return JSON.stringify(value, null, 2);
  }
}
