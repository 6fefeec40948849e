/**
 * Domain Error Types
 *
 * ドメインエラーの型定義。option-tのResult型と組み合わせて使用する。
 * タグ付きユニオン型により、エラーの種類を型安全に区別できる。
 */

// ===== Config Errors =====

export type ConfigError =
  | ConfigNotFoundError
  | ConfigParseError
  | ConfigReadError
  | ConfigValidationError
  | InheritanceCycleError
  | UnknownEnvironmentError
  | RequirementImportError
  | PathNotFoundError;

export interface ConfigNotFoundError {
  readonly type: 'ConfigNotFoundError';
  readonly directory: string;
  readonly candidates: readonly string[];
  readonly message: string;
}

export interface ConfigParseError {
  readonly type: 'ConfigParseError';
  readonly filePath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigReadError {
  readonly type: 'ConfigReadError';
  /** 読めなかったファイルまたはディレクトリ */
  readonly path: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface ConfigValidationError {
  readonly type: 'ConfigValidationError';
  readonly filePath?: string;
  readonly details: string;
  readonly message: string;
}

export interface InheritanceCycleError {
  readonly type: 'InheritanceCycleError';
  /** 2回目に到達したディレクトリ（正規化済み） */
  readonly directory: string;
  /** そこに至るまでに訪れたディレクトリ（起点から順） */
  readonly chain: readonly string[];
  readonly message: string;
}

export interface UnknownEnvironmentError {
  readonly type: 'UnknownEnvironmentError';
  readonly environment: string;
  readonly knownEnvironments: readonly string[];
  readonly message: string;
}

export interface RequirementImportError {
  readonly type: 'RequirementImportError';
  readonly importPath: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface PathNotFoundError {
  readonly type: 'PathNotFoundError';
  readonly path: string;
  /** 辿れなかったセグメント（例: "a_list[5]"） */
  readonly segment: string;
  /** 辿れたところまでのパス（例: "my_custom_config"） */
  readonly consumed: string;
  readonly message: string;
}

// ConfigError コンストラクタ
export const configNotFound = (directory: string, candidates: readonly string[]): ConfigNotFoundError => ({
  type: 'ConfigNotFoundError',
  directory,
  candidates,
  message: `No configuration file found in ${directory} (tried: ${candidates.join(', ')})`,
});

export const configParseError = (filePath: string, cause?: unknown): ConfigParseError => ({
  type: 'ConfigParseError',
  filePath,
  cause,
  message: `Failed to parse configuration file: ${filePath}${cause instanceof Error ? `\n${cause.message}` : ''}`,
});

export const configReadError = (targetPath: string, cause?: unknown): ConfigReadError => ({
  type: 'ConfigReadError',
  path: targetPath,
  cause,
  message: `Failed to read ${targetPath}${cause instanceof Error ? `: ${cause.message}` : ''}`,
});

export const configValidationError = (details: string, filePath?: string): ConfigValidationError => ({
  type: 'ConfigValidationError',
  filePath,
  details,
  message: `Configuration validation failed${filePath ? ` (${filePath})` : ''}: ${details}`,
});

export const inheritanceCycle = (directory: string, chain: readonly string[]): InheritanceCycleError => ({
  type: 'InheritanceCycleError',
  directory,
  chain,
  message: `Configuration inheritance cycle detected at ${directory} (visited: ${chain.join(' -> ')})`,
});

export const unknownEnvironment = (
  environment: string,
  knownEnvironments: readonly string[],
): UnknownEnvironmentError => ({
  type: 'UnknownEnvironmentError',
  environment,
  knownEnvironments,
  message: `Unknown environment "${environment}" (known: ${
    knownEnvironments.length > 0 ? knownEnvironments.join(', ') : 'none'
  })`,
});

export const requirementImportError = (importPath: string, cause?: unknown): RequirementImportError => ({
  type: 'RequirementImportError',
  importPath,
  cause,
  message: `Failed to import requirements file: ${importPath}${
    cause instanceof Error ? ` (${cause.message})` : ''
  }`,
});

export const pathNotFound = (path: string, segment: string, consumed: string): PathNotFoundError => ({
  type: 'PathNotFoundError',
  path,
  segment,
  consumed,
  message: `Path not found: ${path} (segment "${segment}"${consumed ? ` after "${consumed}"` : ''})`,
});

// ===== Venv Errors =====

export type VenvError = VenvCommandError | VenvIOError | VenvNotFoundError;

export interface VenvCommandError {
  readonly type: 'VenvCommandError';
  readonly command: string;
  readonly exitCode: number | null;
  /** 強制終了させたシグナル */
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;
  readonly message: string;
}

export interface VenvIOError {
  readonly type: 'VenvIOError';
  readonly operation: string;
  readonly cause?: unknown;
  readonly message: string;
}

export interface VenvNotFoundError {
  readonly type: 'VenvNotFoundError';
  readonly venvPath: string;
  readonly message: string;
}

// VenvError コンストラクタ
export const venvCommandError = (
  command: string,
  exitCode: number | null,
  stderr: string,
  signal: NodeJS.Signals | null = null,
): VenvCommandError => ({
  type: 'VenvCommandError',
  command,
  exitCode,
  signal,
  stderr,
  message: `Command failed: ${command} (${signal ? `killed by ${signal}` : `exit code ${exitCode ?? 'none'}`})${
    stderr ? `\n${stderr}` : ''
  }`,
});

export const venvIOError = (operation: string, cause?: unknown): VenvIOError => ({
  type: 'VenvIOError',
  operation,
  cause,
  message: `IO error during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
});

export const venvNotFound = (venvPath: string): VenvNotFoundError => ({
  type: 'VenvNotFoundError',
  venvPath,
  message: `Virtual environment not found @ ${venvPath} (run \`yapenv install\` first)`,
});
