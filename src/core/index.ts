/**
 * Core module public exports
 *
 * WHY: CLI 以外（スクリプト等）から設定解決と仮想環境操作を使うためのエントリーポイント
 */

// Config module
export * from './config/index.ts';

// Venv module
export * from './venv/index.ts';
