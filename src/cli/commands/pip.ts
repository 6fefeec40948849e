import { Command } from 'commander';
import { pipInstallArgs } from '../../core/venv/command-args.ts';
import { pipInstall } from '../../core/venv/operations.ts';
import type { CliContext } from '../context.ts';
import { addCommonOptions, type CommonOptionValues } from '../utils/common-options.ts';
import { formatOutput, type OutputFormat } from '../utils/format.ts';
import { createFormatOption } from '../utils/format-option.ts';
import { resolveOrReport, unwrapOrReport } from '../utils/report-error.ts';
import { toVenvContext } from '../utils/venv-context.ts';

interface ArgsOptions extends CommonOptionValues {
  format: OutputFormat;
  quote: boolean;
}

/**
 * `yapenv pip` コマンド
 *
 * - args: pip install の引数を表示
 * - install: 仮想環境の python で pip install を実行
 */
export function createPipCommand(context: CliContext): Command {
  const pip = new Command('pip').description('Run pip through the resolved configuration');

  addCommonOptions(
    pip
      .command('args')
      .description('Print the pip install arguments (packages default to the configured requirements)')
      .argument('[packages...]', 'Packages to install instead of the configured requirements')
      .addOption(createFormatOption('cli'))
      .option('--no-quote', 'Do not shell-quote values in cli format'),
  ).action(async (packages: string[], options: ArgsOptions) => {
    const resolved = await resolveOrReport(options, context);
    if (resolved === undefined) {
      return;
    }
    context.stdout(formatOutput(pipInstallArgs(resolved, packages), options.format, { quote: options.quote }));
  });

  addCommonOptions(
    pip
      .command('install')
      .description('Run pip install inside the virtual environment')
      .argument('[packages...]', 'Packages to install instead of the configured requirements'),
  ).action(async (packages: string[], options: CommonOptionValues) => {
    const resolved = await resolveOrReport(options, context);
    if (resolved === undefined) {
      return;
    }
    unwrapOrReport(await pipInstall(resolved, toVenvContext(context), packages), context, options);
  });

  return pip;
}
