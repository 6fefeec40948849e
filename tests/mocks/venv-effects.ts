import { createErr, createOk } from 'option-t/plain_result';
import type { Result } from 'option-t/plain_result';
import type { VenvEffects } from '../../src/core/venv/venv-effects.ts';
import type { VenvError } from '../../src/types/errors.ts';
import { venvCommandError } from '../../src/types/errors.ts';
import type { Logger, LogLevel } from '../../src/types/logger.ts';

export interface RecordedCall {
  readonly method: keyof VenvEffects;
  readonly args: readonly unknown[];
}

export interface MockVenvEffects extends VenvEffects {
  readonly calls: RecordedCall[];
  readonly directories: Set<string>;
  readonly files: Set<string>;
  readonly symlinks: Map<string, string>;
}

export interface MockVenvEffectsOptions {
  directories?: Iterable<string>;
  files?: Iterable<string>;
  /** 失敗させるモジュール名（virtualenv, pip） */
  failingModules?: Iterable<string>;
  /** virtualenv 実行時に venv ディレクトリを作るか（デフォルト: true） */
  createOnVirtualenv?: boolean;
}

/**
 * テスト用のモックVenvEffects
 *
 * 外部プロセスは実行せず、呼び出しを記録する
 */
export const createMockVenvEffects = (options: MockVenvEffectsOptions = {}): MockVenvEffects => {
  const calls: RecordedCall[] = [];
  const directories = new Set(options.directories ?? []);
  const files = new Set(options.files ?? []);
  const symlinks = new Map<string, string>();
  const failingModules = new Set(options.failingModules ?? []);
  const createOnVirtualenv = options.createOnVirtualenv ?? true;

  return {
    calls,
    directories,
    files,
    symlinks,

    runPythonModule: async (
      executable: string,
      moduleName: string,
      args: readonly string[],
      cwd: string,
    ): Promise<Result<void, VenvError>> => {
      calls.push({ method: 'runPythonModule', args: [executable, moduleName, [...args], cwd] });
      if (failingModules.has(moduleName)) {
        return createErr(venvCommandError(`${executable} -m ${moduleName}`, 1, 'mock failure'));
      }
      const target = args[args.length - 1];
      if (moduleName === 'virtualenv' && createOnVirtualenv && target !== undefined) {
        directories.add(target);
      }
      return createOk(undefined);
    },

    directoryExists: async (dirPath: string): Promise<boolean> => {
      calls.push({ method: 'directoryExists', args: [dirPath] });
      return directories.has(dirPath);
    },

    fileExists: async (filePath: string): Promise<boolean> => {
      calls.push({ method: 'fileExists', args: [filePath] });
      return files.has(filePath);
    },

    removeDirectory: async (dirPath: string): Promise<Result<void, VenvError>> => {
      calls.push({ method: 'removeDirectory', args: [dirPath] });
      directories.delete(dirPath);
      return createOk(undefined);
    },

    symlink: async (target: string, linkPath: string): Promise<Result<void, VenvError>> => {
      calls.push({ method: 'symlink', args: [target, linkPath] });
      symlinks.set(linkPath, target);
      return createOk(undefined);
    },
  };
};

export interface MemoryLogger extends Logger {
  readonly entries: Array<{ level: LogLevel; message: string }>;
  messages(level: LogLevel): string[];
}

/**
 * 出力を配列に溜めるロガー
 */
export const createMemoryLogger = (): MemoryLogger => {
  const entries: Array<{ level: LogLevel; message: string }> = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
};
