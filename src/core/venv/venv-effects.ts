/**
 * VenvEffects インターフェース
 *
 * 仮想環境の作成・パッケージインストールに伴う副作用（外部プロセス・ファイル操作）を抽象化する。
 * テスト時にはモックで置き換え可能。
 */

import type { Result } from 'option-t/plain_result';
import type { VenvError } from '../../types/errors.ts';

export interface VenvEffects {
  /**
   * `<executable> -m <moduleName> <args...>` を実行
   * @param executable Python 実行ファイル
   * @param moduleName 実行するモジュール（virtualenv, pip）
   * @param args モジュールに渡す引数
   * @param cwd 作業ディレクトリ
   */
  runPythonModule(
    executable: string,
    moduleName: string,
    args: readonly string[],
    cwd: string,
  ): Promise<Result<void, VenvError>>;

  /** ディレクトリが存在するか */
  directoryExists(dirPath: string): Promise<boolean>;

  /** ファイルが存在するか */
  fileExists(filePath: string): Promise<boolean>;

  /** ディレクトリを再帰的に削除 */
  removeDirectory(dirPath: string): Promise<Result<void, VenvError>>;

  /**
   * シンボリックリンクを作成（既存のリンクは置き換える）
   * @param target リンク先
   * @param linkPath 作成するリンクのパス
   */
  symlink(target: string, linkPath: string): Promise<Result<void, VenvError>>;
}
