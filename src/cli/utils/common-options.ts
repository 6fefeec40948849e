/**
 * 設定を解決するコマンドの共通オプション
 */

import * as path from 'node:path';
import { type Command, InvalidArgumentError } from 'commander';
import type { ResolveConfigOptions } from '../../core/config/resolve-config.ts';
import type { CliContext } from '../context.ts';

export interface CommonOptionValues {
  cwd?: string;
  env?: string;
  extraConfigFile?: string[];
  inheritDepth?: number;
  ignoreMissingEnv?: boolean;
  fullErrors?: boolean;
}

/**
 * --inherit-depth の値をパース
 */
export function parseInheritDepth(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be an integer (negative for unlimited).');
  }
  return parsed;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--cwd <dir>', 'Directory to resolve the configuration from')
    .option('-e, --env <name>', 'Environment overlay to apply')
    .option('--extra-config-file <names...>', 'Additional configuration file names to look for')
    .option('--inherit-depth <n>', 'Maximum number of ancestor configurations (negative = unlimited)', parseInheritDepth)
    .option('--ignore-missing-env', 'Do not fail when the environment is not defined')
    .option('--full-errors', 'Print the full error object on failure');
}

export function toResolveConfigOptions(
  values: CommonOptionValues,
  context: CliContext,
  overrides: Partial<ResolveConfigOptions> = {},
): ResolveConfigOptions {
  return {
    cwd: path.resolve(context.cwd, values.cwd ?? '.'),
    environment: values.env,
    env: context.env,
    inheritDepth: values.inheritDepth,
    extraConfigFiles: values.extraConfigFile,
    ignoreMissingEnvironment: values.ignoreMissingEnv === true,
    ...overrides,
  };
}
