/**
 * Venv module public exports
 */

export { ProcessRunner, type ProcessResult, type ProcessRunnerOptions } from './process-runner.ts';
export type { VenvEffects } from './venv-effects.ts';
export { createVenvEffects, type VenvEffectsOptions } from './venv-effects-impl.ts';
export { cleanArgs, pythonSpecifier, virtualenvArgs, pipInstallArgs, venvPythonPath } from './command-args.ts';
export {
  DEFAULT_PYTHON_LAUNCHER,
  resolvePythonLauncher,
  createVirtualenv,
  pipInstall,
  deleteEnvironment,
  installEnvironment,
  type VenvContext,
  type DeleteEnvironmentOptions,
  type InstallEnvironmentOptions,
} from './operations.ts';
