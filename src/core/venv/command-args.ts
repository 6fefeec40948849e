/**
 * virtualenv / pip に渡す引数の組み立て
 *
 * 副作用なし。CLI の `virtualenv args` / `pip args` はこの結果をそのまま表示する。
 */

import * as path from 'node:path';
import type { ResolvedConfig } from '../config/resolve-config.ts';

/**
 * 空文字の引数を取り除く
 */
export function cleanArgs(args: readonly string[]): string[] {
  return args.filter((arg) => arg.length > 0);
}

/**
 * virtualenv の --python に渡す値
 *
 * python_executable があればそれを優先し、なければ python_version
 */
export function pythonSpecifier(resolved: ResolvedConfig): string {
  return resolved.config.pythonExecutable ?? resolved.config.pythonVersion;
}

/**
 * `python -m virtualenv` の引数
 */
export function virtualenvArgs(resolved: ResolvedConfig): string[] {
  return cleanArgs(['--python', pythonSpecifier(resolved), ...resolved.config.virtualenvArgs, resolved.venvPath]);
}

/**
 * `python -m pip` の引数
 *
 * @param packages - コマンドラインで指定されたパッケージ。空なら設定の requirements を使う
 */
export function pipInstallArgs(resolved: ResolvedConfig, packages: readonly string[] = []): string[] {
  const targets = packages.length > 0 ? packages : resolved.requirements;
  return cleanArgs(['install', ...resolved.config.pipInstallArgs, ...targets]);
}

/**
 * 仮想環境内の python 実行ファイル
 */
export function venvPythonPath(venvPath: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32'
    ? path.join(venvPath, 'Scripts', 'python.exe')
    : path.join(venvPath, 'bin', 'python');
}
