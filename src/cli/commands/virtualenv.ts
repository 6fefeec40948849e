import { Command } from 'commander';
import { virtualenvArgs } from '../../core/venv/command-args.ts';
import { createVirtualenv } from '../../core/venv/operations.ts';
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
 * `yapenv virtualenv` コマンド
 */
export function createVirtualenvCommand(context: CliContext): Command {
  const virtualenv = new Command('virtualenv').description('Run virtualenv through the resolved configuration');

  addCommonOptions(
    virtualenv
      .command('args')
      .description('Print the virtualenv arguments')
      .addOption(createFormatOption('cli'))
      .option('--no-quote', 'Do not shell-quote values in cli format'),
  ).action(async (options: ArgsOptions) => {
    const resolved = await resolveOrReport(options, context, { loadRequirements: false });
    if (resolved === undefined) {
      return;
    }
    context.stdout(formatOutput(virtualenvArgs(resolved), options.format, { quote: options.quote }));
  });

  addCommonOptions(
    virtualenv.command('create').description('Create the virtual environment'),
  ).action(async (options: CommonOptionValues) => {
    const resolved = await resolveOrReport(options, context, { loadRequirements: false });
    if (resolved === undefined) {
      return;
    }
    unwrapOrReport(await createVirtualenv(resolved, toVenvContext(context)), context, options);
  });

  return virtualenv;
}
