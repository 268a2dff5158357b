/**
 * sqlweave - typed TypeScript query modules from SQL IR documents
 *
 * Main entry point
 */

// Config
export {
  Config,
  InflectionSettings,
  TransformName,
  type ResolvedConfig,
  type ConfigInput,
} from "./config.js";

// Config Loader Service
export {
  type ConfigLoader,
  ConfigLoaderService,
  ConfigLoaderLive,
  CONFIG_FILE_NAMES,
  createConfigLoader,
  defineConfig,
} from "./services/config-loader.js";

// Errors
export * from "./errors.js";

// IR
export * from "./ir/index.js";

// Services - Inflection
export {
  type CoreInflection,
  type InflectionConfig,
  type TransformChain,
  Inflection,
  TRANSFORM_NAMES,
  applyTransformChain,
  camelCase,
  pascalCase,
  snakeCase,
  safeIdentifier,
  generateClassName,
  defaultInflection,
  createInflection,
  makeInflectionLayer,
  InflectionLive,
} from "./services/inflection.js";

// Services - File Writer
export {
  type Emission,
  type WriteResult,
  type WriteOptions,
  type FileWriter,
  createFileWriter,
  defaultHeader,
} from "./services/file-writer.js";

// Dialects
export {
  type Dialect,
  SUPPORTED_DIALECTS,
  parseDialect,
  placeholder,
  driverImport,
} from "./lib/dialect.js";

// Conjure - AST builder DSL
export { conjure, type ChainBuilder } from "./lib/conjure.js";

// Code generation stages
export { toTsType, type TsType, type TypeContext } from "./codegen/types.js";
export { detectShape, isHierarchical, PATH_DELIMITER, type Shape } from "./hierarchy/detect.js";
export { buildSchemas, ensureUniqueFields, orderedSchemas, renderInterface, type RecordSchema } from "./hierarchy/schema.js";
export { Scope, renderExpression } from "./codegen/expression.js";
export { buildSql, isDynamic, type SqlBuild } from "./codegen/sql-builder.js";
export { synthesizeExecution, type Execution } from "./codegen/execution.js";
export { synthesizeGuards, collectGuards, type Guard } from "./codegen/where-guard.js";

// Generation
export { generateQuery, type GenerateQueryOptions, type GeneratedQuery } from "./generate-query.js";
export {
  generate,
  runGenerate,
  GenerateLive,
  toEmissions,
  type GenerateOptions,
  type GenerateResult,
  type GenerateError,
} from "./generate.js";
