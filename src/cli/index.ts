#!/usr/bin/env -S node --import tsx

import { createVenvEffects } from '../core/venv/venv-effects-impl.ts';
import type { CliContext } from './context.ts';
import { createProgram } from './program.ts';
import { createLoggerFromEnv } from './utils/logger.ts';
import { promptYesNo } from './utils/prompt.ts';

const context: CliContext = {
  env: process.env,
  cwd: process.cwd(),
  logger: createLoggerFromEnv(process.env),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  effects: createVenvEffects(),
  confirm: promptYesNo,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

await createProgram(context).parseAsync(process.argv);
