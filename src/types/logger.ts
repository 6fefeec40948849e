/**
 * ログ出力の抽象
 *
 * コア側はこのインターフェースだけに依存し、出力先と色付けはCLI側で決める
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
