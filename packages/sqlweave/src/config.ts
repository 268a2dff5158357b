/**
 * Configuration schema for sqlweave
 */
import { Schema as S } from "effect";
import type { InflectionConfig } from "./services/inflection.js";

/**
 * Naming transform, as accepted in `inflection` chains
 */
export const TransformName = S.Literal(
  "camelCase",
  "pascalCase",
  "snakeCase",
  "capitalize",
  "uncapitalize",
  "lowercase",
  "uppercase",
);

const TransformChain = S.Array(TransformName);

export const InflectionSettings = S.Struct({
  fieldName: S.optional(TransformChain),
  parameterName: S.optional(TransformChain),
  functionName: S.optional(TransformChain),
});

/**
 * Main configuration schema
 *
 * `dialect` is checked against the supported dialects after loading, so a
 * `--dialect` flag can supply or override it.
 */
export const Config = S.Struct({
  /** Target dialect: postgres, mysql or sqlite */
  dialect: S.optional(S.String),

  /** Directory of IR documents (*.json), relative to the config file */
  input: S.optionalWith(S.String, { default: () => "." }),

  /** Output directory root, relative to the config file */
  outputDir: S.optionalWith(S.String, { default: () => "src/generated" }),

  /** Module generated code imports its errors and helpers from */
  runtimeModule: S.optionalWith(S.NonEmptyString, { default: () => "@sqlweave/runtime" }),

  /** Naming transform chains */
  inflection: S.optional(InflectionSettings),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type.
 */
export interface ConfigInput {
  /** Target dialect: "postgres", "mysql" or "sqlite" */
  readonly dialect?: string;

  /** Directory of IR documents (default: ".") */
  readonly input?: string;

  /** Output directory root (default: "src/generated") */
  readonly outputDir?: string;

  /** Runtime module specifier (default: "@sqlweave/runtime") */
  readonly runtimeModule?: string;

  /**
   * Naming transform chains. Omitted chains default to `["camelCase"]`.
   *
   * @example
   * ```typescript
   * inflection: {
   *   fieldName: [],              // keep column names as-is
   *   functionName: ["camelCase"], // get_user → getUser
   * }
   * ```
   */
  readonly inflection?: InflectionConfig;
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  readonly dialect?: string;
  readonly input: string;
  readonly outputDir: string;
  readonly runtimeModule: string;
  readonly inflection?: InflectionConfig;
  /**
   * Directory containing the config file.
   * Relative `input` and `outputDir` resolve against it.
   */
  readonly configDir?: string;
}
