import { Command } from 'commander';
import type { CliContext } from '../context.ts';
import { addCommonOptions, type CommonOptionValues } from '../utils/common-options.ts';
import { formatOutput, type OutputFormat } from '../utils/format.ts';
import { createFormatOption } from '../utils/format-option.ts';
import { resolveOrReport } from '../utils/report-error.ts';

interface ExportOptions extends CommonOptionValues {
  format: OutputFormat;
  quote: boolean;
}

/**
 * `yapenv requirements` コマンド
 *
 * 展開・重複除去済みの requirements を出力する
 */
export function createRequirementsCommand(context: CliContext): Command {
  const requirements = new Command('requirements').description('Work with the flattened requirement list');

  addCommonOptions(
    requirements
      .command('export')
      .description('Print the flattened requirement list')
      .addOption(createFormatOption('list'))
      .option('--no-quote', 'Do not shell-quote values in cli format'),
  ).action(async (options: ExportOptions) => {
    const resolved = await resolveOrReport(options, context);
    if (resolved === undefined) {
      return;
    }
    if (resolved.requirements.length === 0 && (options.format === 'list' || options.format === 'cli')) {
      context.logger.warn('No requirements found in config');
      return;
    }
    context.stdout(formatOutput([...resolved.requirements], options.format, { quote: options.quote }));
  });

  return requirements;
}
