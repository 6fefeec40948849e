/**
 * Config module public exports
 */

export {
  DEFAULT_CONFIG_FILE_NAMES,
  resolveConfigFileNames,
  findConfigFile,
  parseConfigDocument,
  loadConfigLayer,
} from './document-loader.ts';

export { mergeConfigValues, mergeConfigObjects, mergeConfigDocuments } from './merge.ts';

export { resolveInheritance, type ResolveInheritanceOptions } from './inheritance.ts';

export {
  ENVIRONMENTS_KEY,
  listEnvironments,
  applyEnvironmentOverlay,
  type ApplyEnvironmentOptions,
} from './environment-overlay.ts';

export {
  requirementPackageName,
  parseRequirementsFile,
  dedupeSpecifiers,
  flattenRequirements,
  anchorRequirementImports,
  type FlattenRequirementsOptions,
} from './requirements.ts';

export {
  parsePathExpression,
  queryConfigValue,
  isScalarValue,
  type PathPart,
  type PathStep,
} from './path-query.ts';

export { projectCoreConfig, defaultEnvFile, formatSchemaIssues } from './core-config.ts';

export { resolveConfig, type ResolveConfigOptions, type ResolvedConfig } from './resolve-config.ts';
