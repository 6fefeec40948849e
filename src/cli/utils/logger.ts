/**
 * CLI logger
 *
 * `[HH:MM:SS][yapenv][LEVEL] message` 形式で stderr に出力する。
 * stdout はコマンドの出力専用。
 */

import type { Logger, LogLevel } from '../../types/logger.ts';
import { ANSI, colorize, formatTime, isAnsiEnabled } from './ansi-utils.ts';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: ANSI.GRAY,
  info: ANSI.GREEN,
  warn: ANSI.YELLOW,
  error: ANSI.RED,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * LOG_LEVEL の値をログレベルに変換
 *
 * 未知の値はデフォルト（info）
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return 'debug';
    case 'INFO':
      return 'info';
    case 'WARN':
    case 'WARNING':
      return 'warn';
    case 'ERROR':
    case 'CRITICAL':
      return 'error';
    default:
      return DEFAULT_LOG_LEVEL;
  }
}

export interface ConsoleLoggerOptions {
  /** 出力する最低レベル */
  level?: LogLevel;
  /** 色付けするか */
  useAnsi?: boolean;
  /** 1行を書き出す関数（デフォルト: process.stderr） */
  write?: (line: string) => void;
  /** 現在時刻（テスト用） */
  now?: () => Date;
}

/**
 * 1行分のログをフォーマット
 */
export function formatLogLine(level: LogLevel, message: string, time: Date, useAnsi: boolean): string {
  const prefix = colorize(`[${formatTime(time)}][yapenv]`, ANSI.GRAY, useAnsi);
  const label = colorize(`[${level.toUpperCase()}]`, LEVEL_COLORS[level], useAnsi);
  return `${prefix}${label} ${message}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? DEFAULT_LOG_LEVEL];
  const useAnsi = options.useAnsi ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    write(formatLogLine(level, message, now(), useAnsi));
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

/**
 * 環境変数（LOG_LEVEL / NO_COLOR / FORCE_COLOR）から CLI 用ロガーを作る
 */
export function createLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  return createConsoleLogger({
    level: parseLogLevel(env['LOG_LEVEL']),
    useAnsi: isAnsiEnabled(process.stderr, env),
  });
}
