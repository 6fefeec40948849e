/**
 * Config command
 *
 * 解決済み設定の表示（view, get, layers）
 */

import { Command } from 'commander';
import type { ResolvedConfig } from '../../core/config/resolve-config.ts';
import { queryConfigValue } from '../../core/config/path-query.ts';
import type { ConfigObject, ConfigValue } from '../../types/layered-config.ts';
import { isConfigObject } from '../../types/layered-config.ts';
import type { CliContext } from '../context.ts';
import { addCommonOptions, type CommonOptionValues } from '../utils/common-options.ts';
import { formatOutput, type OutputFormat } from '../utils/format.ts';
import { createFormatOption } from '../utils/format-option.ts';
import { EXIT_FAILURE, isFullErrors, reportError, resolveOrReport } from '../utils/report-error.ts';

interface ViewOptions extends CommonOptionValues {
  format: OutputFormat;
  resolve: boolean;
}

interface GetOptions extends ViewOptions {
  allowNull?: boolean;
  allowMissing?: boolean;
}

interface LayersOptions extends CommonOptionValues {
  format: OutputFormat;
}

/**
 * 表示用の設定ツリー
 *
 * resolve 時は requirements を展開済みの指定子リストに置き換える
 */
export function displayDocument(resolved: ResolvedConfig, resolve: boolean): ConfigObject {
  if (!resolve) {
    return resolved.document;
  }
  return { ...resolved.document, requirements: [...resolved.requirements] };
}

/**
 * 値を1つ表示
 *
 * スカラーはそのまま、構造はフォーマットして出力
 */
function printValue(value: ConfigValue, format: OutputFormat, context: CliContext): void {
  if (Array.isArray(value) || isConfigObject(value)) {
    context.stdout(formatOutput(value, format));
    return;
  }
  context.stdout(value === null ? 'null' : String(value));
}

/**
 * yapenv config view
 */
async function viewCommand(options: ViewOptions, context: CliContext): Promise<void> {
  const resolved = await resolveOrReport(options, context, { loadRequirements: options.resolve });
  if (resolved === undefined) {
    return;
  }
  context.stdout(formatOutput(displayDocument(resolved, options.resolve), options.format));
}

/**
 * yapenv config get <paths...>
 */
async function getCommand(paths: string[], options: GetOptions, context: CliContext): Promise<void> {
  const resolved = await resolveOrReport(options, context, { loadRequirements: options.resolve });
  if (resolved === undefined) {
    return;
  }
  const document = displayDocument(resolved, options.resolve);
  const fullErrors = isFullErrors(options.fullErrors, context.env);

  const found: ConfigValue[] = [];
  for (const expression of paths) {
    const result = queryConfigValue(document, expression);
    if (!result.ok) {
      if (options.allowMissing === true) {
        continue;
      }
      reportError(result.err, context, fullErrors);
      return;
    }
    found.push(result.val);
  }

  if (found.length === 0) {
    return;
  }

  if (options.allowNull !== true && found.some((value) => value === null)) {
    context.logger.error(`Found null values in path(s): ${paths.join(', ')}`);
    context.setExitCode(EXIT_FAILURE);
    return;
  }

  const [single] = found;
  if (paths.length === 1 && single !== undefined) {
    printValue(single, options.format, context);
    return;
  }
  context.stdout(formatOutput(found, options.format));
}

/**
 * yapenv config layers
 */
async function layersCommand(options: LayersOptions, context: CliContext): Promise<void> {
  const resolved = await resolveOrReport(options, context, { loadRequirements: false });
  if (resolved === undefined) {
    return;
  }
  if (resolved.layers.length === 0) {
    context.logger.warn(`No configuration file found from ${resolved.sourceDirectory}`);
    return;
  }
  context.stdout(
    formatOutput(
      resolved.layers.map((layer) => layer.filePath),
      options.format,
    ),
  );
}

export function createConfigCommand(context: CliContext): Command {
  const config = new Command('config').description('Show the resolved configuration');

  // yapenv config view
  addCommonOptions(
    config
      .command('view')
      .description('Print the whole resolved configuration')
      .addOption(createFormatOption('yaml'))
      .option('--no-resolve', 'Do not read requirement imports'),
  ).action((options: ViewOptions) => viewCommand(options, context));

  // yapenv config get <paths...>
  addCommonOptions(
    config
      .command('get')
      .description('Print values at dotted paths, e.g. "a.b[0].c"')
      .argument('<paths...>', 'Paths to look up')
      .addOption(createFormatOption('yaml'))
      .option('--no-resolve', 'Do not read requirement imports')
      .option('--allow-null', 'Print null values instead of failing')
      .option('--allow-missing', 'Print nothing for missing paths instead of failing'),
  ).action((paths: string[], options: GetOptions) => getCommand(paths, options, context));

  // yapenv config layers
  addCommonOptions(
    config
      .command('layers')
      .description('List the configuration files that were merged, ancestor first')
      .addOption(createFormatOption('list')),
  ).action((options: LayersOptions) => layersCommand(options, context));

  return config;
}
