import { spawn, type StdioOptions } from 'node:child_process';

/**
 * プロセス実行結果
 */
export interface ProcessResult {
  /** 終了コード */
  exitCode: number | null;
  /** シグナル（強制終了時） */
  signal: NodeJS.Signals | null;
  /** stdout出力（inheritStdio の場合は空） */
  stdout: string;
  /** stderr出力（inheritStdio の場合は空） */
  stderr: string;
}

/**
 * プロセス実行オプション
 */
export interface ProcessRunnerOptions {
  /** 作業ディレクトリ */
  cwd?: string;
  /**
   * 子プロセスの入出力を端末にそのまま流すか
   *
   * virtualenv / pip の進捗表示をユーザーに見せるために使う
   */
  inheritStdio?: boolean;
}

/**
 * プロセス実行ラッパー
 *
 * シェルを経由せずにコマンドを実行し、終了コードと出力を返す。
 * 起動自体に失敗した場合（コマンドが見つからない等）は reject する。
 */
export class ProcessRunner {
  /**
   * コマンドを実行する
   *
   * @param command 実行するコマンド
   * @param args コマンド引数
   * @param options 実行オプション
   */
  async run(
    command: string,
    args: readonly string[] = [],
    options: ProcessRunnerOptions = {},
  ): Promise<ProcessResult> {
    const { cwd, inheritStdio = false } = options;
    const stdio: StdioOptions = inheritStdio ? 'inherit' : 'pipe';

    return new Promise<ProcessResult>((resolve, reject) => {
      const childProcess = spawn(command, [...args], {
        cwd,
        shell: false,
        stdio,
      });

      let stdout = '';
      let stderr = '';

      childProcess.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8');
      });

      childProcess.stderr?.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf-8');
      });

      childProcess.on('error', (error: Error) => {
        reject(error);
      });

      childProcess.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({
          exitCode: code,
          signal,
          stdout,
          stderr,
        });
      });
    });
  }
}
