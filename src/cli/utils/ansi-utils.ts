/**
 * ANSI Escape Sequence Utilities
 *
 * ログ出力の色付け用
 */

/**
 * ANSIエスケープシーケンス定数
 */
export const ANSI = {
  RESET: '\x1b[0m',
  RED: '\x1b[31m',
  GREEN: '\x1b[32m',
  YELLOW: '\x1b[33m',
  GRAY: '\x1b[90m',
} as const;

/**
 * ANSIが有効かどうかを判定
 *
 * NO_COLOR が最優先、次に FORCE_COLOR、どちらもなければ TTY かどうか
 *
 * @param stream 出力ストリーム
 * @param env 環境変数
 */
export function isAnsiEnabled(
  stream: { readonly isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '') {
    return false;
  }

  if (env['FORCE_COLOR'] !== undefined && env['FORCE_COLOR'] !== '0') {
    return true;
  }

  return stream.isTTY === true;
}

/**
 * テキストに色を付ける
 *
 * @param text テキスト
 * @param color 色コード
 * @param useAnsi ANSIを使用するか
 */
export function colorize(text: string, color: string, useAnsi: boolean): string {
  if (!useAnsi) {
    return text;
  }
  return `${color}${text}${ANSI.RESET}`;
}

/**
 * 時刻をフォーマット
 *
 * @returns HH:MM:SS形式の文字列
 */
export function formatTime(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${hours}:${minutes}:${seconds}`;
}
