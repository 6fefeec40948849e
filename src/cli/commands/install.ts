import { Command } from 'commander';
import { deleteEnvironment, installEnvironment } from '../../core/venv/operations.ts';
import type { CliContext } from '../context.ts';
import { addCommonOptions, type CommonOptionValues } from '../utils/common-options.ts';
import { resolveOrReport, unwrapOrReport } from '../utils/report-error.ts';
import { toVenvContext } from '../utils/venv-context.ts';

interface ForceOptions extends CommonOptionValues {
  force?: boolean;
}

interface InstallOptions extends ForceOptions {
  reset?: boolean;
}

const confirmDelete = (context: CliContext) => (): Promise<boolean> => context.confirm('Are you sure?');

/**
 * `yapenv install [packages...]`
 *
 * 仮想環境がなければ作成し、パッケージをインストールする
 */
export function createInstallCommand(context: CliContext): Command {
  return addCommonOptions(
    new Command('install')
      .description('Create the virtual environment when missing and install the requirements')
      .argument('[packages...]', 'Packages to install instead of the configured requirements')
      .option('-r, --reset', 'Delete and recreate the virtual environment')
      .option('-f, --force', 'Do not ask before deleting'),
  ).action(async (packages: string[], options: InstallOptions) => {
    const resolved = await resolveOrReport(options, context);
    if (resolved === undefined) {
      return;
    }
    const result = await installEnvironment(resolved, toVenvContext(context), {
      reset: options.reset === true,
      force: options.force === true,
      confirm: confirmDelete(context),
      packages,
    });
    unwrapOrReport(result, context, options);
  });
}

/**
 * `yapenv delete`
 */
export function createDeleteCommand(context: CliContext): Command {
  return addCommonOptions(
    new Command('delete')
      .description('Delete the virtual environment')
      .option('-f, --force', 'Do not ask before deleting'),
  ).action(async (options: ForceOptions) => {
    const resolved = await resolveOrReport(options, context, { loadRequirements: false });
    if (resolved === undefined) {
      return;
    }
    const result = await deleteEnvironment(resolved, toVenvContext(context), {
      force: options.force === true,
      confirm: confirmDelete(context),
    });
    unwrapOrReport(result, context, options);
  });
}
