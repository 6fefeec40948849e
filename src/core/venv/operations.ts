/**
 * 仮想環境の作成・インストール・削除
 *
 * 外部プロセスとファイル操作はすべて VenvEffects 経由で行う。
 */

import * as path from 'node:path';
import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { ResolvedConfig } from '../config/resolve-config.ts';
import type { VenvError } from '../../types/errors.ts';
import { venvNotFound } from '../../types/errors.ts';
import type { Logger } from '../../types/logger.ts';
import { pipInstallArgs, venvPythonPath, virtualenvArgs } from './command-args.ts';
import type { VenvEffects } from './venv-effects.ts';

/** `-m virtualenv` を実行する Python（YAPENV_PYTHON 未指定時） */
export const DEFAULT_PYTHON_LAUNCHER = 'python3';

export interface VenvContext {
  readonly effects: VenvEffects;
  readonly logger: Logger;
  /** virtualenv の起動に使う Python */
  readonly pythonLauncher: string;
}

export interface DeleteEnvironmentOptions {
  /** 確認なしで削除する */
  readonly force?: boolean;
  /**
   * 削除前の確認
   *
   * false を返すと中断する。未指定なら確認しない。
   */
  readonly confirm?: (venvPath: string) => Promise<boolean>;
}

export interface InstallEnvironmentOptions extends DeleteEnvironmentOptions {
  /** 既存の仮想環境を削除してから作り直す */
  readonly reset?: boolean;
  /** 設定の requirements の代わりにインストールするパッケージ */
  readonly packages?: readonly string[];
}

/**
 * YAPENV_PYTHON から virtualenv 起動用の Python を決める
 */
export function resolvePythonLauncher(env: NodeJS.ProcessEnv): string {
  const launcher = env['YAPENV_PYTHON']?.trim();
  return launcher ? launcher : DEFAULT_PYTHON_LAUNCHER;
}

/**
 * 仮想環境を作成し、pip_config_path があれば pip.conf としてリンクする
 */
export async function createVirtualenv(
  resolved: ResolvedConfig,
  context: VenvContext,
): Promise<Result<void, VenvError>> {
  const { effects, logger } = context;
  const args = virtualenvArgs(resolved);

  logger.info(`Creating virtualenv @ ${resolved.venvPath}`);
  logger.debug(`${context.pythonLauncher} -m virtualenv ${args.join(' ')}`);

  const runResult = await effects.runPythonModule(context.pythonLauncher, 'virtualenv', args, resolved.sourceDirectory);
  if (!runResult.ok) {
    return runResult;
  }

  const pipConfigPath = resolved.pipConfigPath;
  if (pipConfigPath === undefined) {
    return createOk(undefined);
  }

  if (!(await effects.fileExists(pipConfigPath))) {
    logger.warn(`Could not set custom config path, pip_config_path not found @ ${pipConfigPath}`);
    return createOk(undefined);
  }

  const linkResult = await effects.symlink(pipConfigPath, path.join(resolved.venvPath, 'pip.conf'));
  if (!linkResult.ok) {
    return linkResult;
  }
  logger.info(`Linked virtual env pip.conf -> ${pipConfigPath}`);
  return createOk(undefined);
}

/**
 * 仮想環境の python で pip install を実行
 *
 * @returns インストールを実行した場合 true、対象がなくスキップした場合 false
 */
export async function pipInstall(
  resolved: ResolvedConfig,
  context: VenvContext,
  packages: readonly string[] = [],
): Promise<Result<boolean, VenvError>> {
  const { effects, logger } = context;

  if (packages.length === 0 && resolved.requirements.length === 0) {
    logger.warn('No requirements found in config. Skipping pip install');
    return createOk(false);
  }

  if (!(await effects.directoryExists(resolved.venvPath))) {
    return createErr(venvNotFound(resolved.venvPath));
  }

  const python = venvPythonPath(resolved.venvPath);
  const args = pipInstallArgs(resolved, packages);

  logger.info(`Running pip install in venv @ ${resolved.venvPath}`);
  logger.debug(`${python} -m pip ${args.join(' ')}`);

  const runResult = await effects.runPythonModule(python, 'pip', args, resolved.sourceDirectory);
  if (!runResult.ok) {
    return runResult;
  }
  return createOk(true);
}

/**
 * 仮想環境ディレクトリを削除
 *
 * @returns 削除した（または元々なかった）場合 true、確認で中断した場合 false
 */
export async function deleteEnvironment(
  resolved: ResolvedConfig,
  context: VenvContext,
  options: DeleteEnvironmentOptions = {},
): Promise<Result<boolean, VenvError>> {
  const { effects, logger } = context;

  if (!(await effects.directoryExists(resolved.venvPath))) {
    logger.warn(`No virtual environment @ ${resolved.venvPath}`);
    return createOk(true);
  }

  if (options.force !== true && options.confirm !== undefined) {
    logger.warn(`You are about to delete the virtual environment @ ${resolved.venvPath}`);
    if (!(await options.confirm(resolved.venvPath))) {
      logger.info('Aborted');
      return createOk(false);
    }
  }

  const removeResult = await effects.removeDirectory(resolved.venvPath);
  if (!removeResult.ok) {
    return removeResult;
  }
  logger.info(`Deleted virtual environment folder @ ${resolved.venvPath}`);
  return createOk(true);
}

/**
 * 仮想環境を用意してパッケージをインストール
 *
 * 1. reset 指定時は既存の仮想環境を削除
 * 2. 仮想環境がなければ作成
 * 3. インストール対象があれば pip install
 *
 * @returns 最後まで実行した場合 true、削除の確認で中断した場合 false
 */
export async function installEnvironment(
  resolved: ResolvedConfig,
  context: VenvContext,
  options: InstallEnvironmentOptions = {},
): Promise<Result<boolean, VenvError>> {
  const { effects, logger } = context;
  const reset = options.reset === true;
  const exists = await effects.directoryExists(resolved.venvPath);

  if (reset && exists) {
    const deleteResult = await deleteEnvironment(resolved, context, options);
    if (!deleteResult.ok) {
      return deleteResult;
    }
    if (!deleteResult.val) {
      logger.info('Virtual env was not deleted. Aborting.');
      return createOk(false);
    }
  }

  if (reset || !exists) {
    const createResult = await createVirtualenv(resolved, context);
    if (!createResult.ok) {
      return createResult;
    }
  }

  const installResult = await pipInstall(resolved, context, options.packages);
  if (!installResult.ok) {
    return installResult;
  }
  if (installResult.val) {
    logger.info('Success');
  }
  return createOk(true);
}
