/**
 * VenvEffects 実装
 *
 * ProcessRunner と node:fs による VenvEffects の具象実装
 */

import fs from 'node:fs/promises';
import { tryCatchIntoResultAsync } from 'option-t/plain_result/try_catch_async';
import { mapErrForResult } from 'option-t/plain_result/map_err';
import { createErr, createOk } from 'option-t/plain_result';
import type { Result } from 'option-t/plain_result';
import type { VenvError } from '../../types/errors.ts';
import { venvCommandError, venvIOError } from '../../types/errors.ts';
import { ProcessRunner } from './process-runner.ts';
import type { VenvEffects } from './venv-effects.ts';

export interface VenvEffectsOptions {
  /** 差し替え用の ProcessRunner（デフォルト: new ProcessRunner()） */
  runner?: ProcessRunner;
}

/**
 * VenvEffects 実装を生成するファクトリ関数
 */
export const createVenvEffects = (options: VenvEffectsOptions = {}): VenvEffects => {
  const runner = options.runner ?? new ProcessRunner();

  const toVenvError =
    (operation: string) =>
    (e: unknown): VenvError => {
      return venvIOError(operation, e);
    };

  const runPythonModule = async (
    executable: string,
    moduleName: string,
    args: readonly string[],
    cwd: string,
  ): Promise<Result<void, VenvError>> => {
    const commandLine = [executable, '-m', moduleName, ...args].join(' ');

    const runResult = await tryCatchIntoResultAsync(() =>
      runner.run(executable, ['-m', moduleName, ...args], { cwd, inheritStdio: true }),
    );
    if (!runResult.ok) {
      return createErr(venvIOError(`running ${commandLine}`, runResult.err));
    }

    const { exitCode, signal, stderr } = runResult.val;
    if (exitCode !== 0) {
      return createErr(venvCommandError(commandLine, exitCode, stderr, signal));
    }
    return createOk(undefined);
  };

  const directoryExists = async (dirPath: string): Promise<boolean> => {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  };

  const fileExists = async (filePath: string): Promise<boolean> => {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  };

  const removeDirectory = async (dirPath: string): Promise<Result<void, VenvError>> => {
    const result = await tryCatchIntoResultAsync(async () => {
      await fs.rm(dirPath, { recursive: true, force: true });
    });
    return mapErrForResult(result, toVenvError('removeDirectory'));
  };

  const symlink = async (target: string, linkPath: string): Promise<Result<void, VenvError>> => {
    const result = await tryCatchIntoResultAsync(async () => {
      await fs.rm(linkPath, { force: true });
      await fs.symlink(target, linkPath);
    });
    return mapErrForResult(result, toVenvError('symlink'));
  };

  return {
    runPythonModule,
    directoryExists,
    fileExists,
    removeDirectory,
    symlink,
  };
};
