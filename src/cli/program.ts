import { Command } from 'commander';
import { createConfigCommand } from './commands/config.ts';
import { createDeleteCommand, createInstallCommand } from './commands/install.ts';
import { createPipCommand } from './commands/pip.ts';
import { createRequirementsCommand } from './commands/requirements.ts';
import { createVirtualenvCommand } from './commands/virtualenv.ts';
import type { CliContext } from './context.ts';
import { getVersion } from './utils/get-version.ts';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('yapenv')
    .description('Layered, inheritable Python virtual environment configuration')
    .version(getVersion());

  // Register subcommands
  program.addCommand(createConfigCommand(context));
  program.addCommand(createRequirementsCommand(context));
  program.addCommand(createPipCommand(context));
  program.addCommand(createVirtualenvCommand(context));
  program.addCommand(createInstallCommand(context));
  program.addCommand(createDeleteCommand(context));

  return program;
}
