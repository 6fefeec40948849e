import { resolvePythonLauncher, type VenvContext } from '../../core/venv/operations.ts';
import type { CliContext } from '../context.ts';

export function toVenvContext(context: CliContext): VenvContext {
  return {
    effects: context.effects,
    logger: context.logger,
    pythonLauncher: resolvePythonLauncher(context.env),
  };
}
