/**
 * CLI context
 *
 * コマンドが外界とやり取りする窓口。index.ts で本物を組み立て、テストでは差し替える。
 */

import type { VenvEffects } from '../core/venv/venv-effects.ts';
import type { Logger } from '../types/logger.ts';

export interface CliContext {
  /** 環境変数 */
  readonly env: NodeJS.ProcessEnv;
  /** 作業ディレクトリ（--cwd の基準） */
  readonly cwd: string;
  readonly logger: Logger;
  /** コマンド出力（1回の呼び出しで1行以上） */
  readonly stdout: (text: string) => void;
  readonly effects: VenvEffects;
  /** yes/no の確認 */
  readonly confirm: (question: string) => Promise<boolean>;
  /** 終了コードを設定 */
  readonly setExitCode: (code: number) => void;
}
