/**
 * Core Inflection Service - naming transformations
 *
 * Maps IR names (snake_case columns, parameters, query names) onto TypeScript
 * identifiers. Users configure transform chains (e.g., ["camelCase"]) which
 * are applied in order; the result is always passed through safeIdentifier.
 */
import { Context, Layer, String as Str } from "effect"

// ============================================================================
// Reserved Words
// ============================================================================

const RESERVED_WORDS = new Set([
  "await", "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "implements", "import", "in",
  "instanceof", "interface", "let", "new", "null", "package", "private",
  "protected", "public", "return", "static", "super", "switch", "this",
  "throw", "true", "try", "typeof", "var", "void", "while", "with", "yield",
])

// ============================================================================
// Primitive Transforms
// ============================================================================

/**
 * `get_user_by_id` → `GetUserById`. Empty segments are dropped, an `id`
 * segment in any case becomes `Id`, other segments keep their tail as-is.
 */
export const pascalCase = (text: string): string =>
  text
    .split("_")
    .filter(part => part.length > 0)
    .map(part => (part.toLowerCase() === "id" ? "Id" : Str.capitalize(part)))
    .join("")

/** `created_at` → `createdAt` */
export const camelCase = (text: string): string => Str.uncapitalize(pascalCase(text))

/** `GetUserById` → `get_user_by_id` */
export const snakeCase = (text: string): string =>
  text.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase()

/**
 * Make `text` usable as a binding name: illegal characters become `_`, a
 * leading digit gets a `_` prefix, reserved words get a trailing `_`.
 */
export const safeIdentifier = (text: string): string => {
  const cleaned = text.replace(/[^A-Za-z0-9_$]/g, "_")
  const named = cleaned.length === 0 ? "_" : cleaned
  const leading = /^[0-9]/.test(named) ? `_${named}` : named
  return RESERVED_WORDS.has(leading) ? `${leading}_` : leading
}

/** `get_user_by_id` → `GetUserByIdResult` */
export const generateClassName = (queryName: string): string =>
  `${pascalCase(queryName)}Result`

// ============================================================================
// Transform Registry
// ============================================================================

/**
 * Available transform names that can be used in transform chains.
 */
export type TransformName =
  | "camelCase"
  | "pascalCase"
  | "snakeCase"
  | "capitalize"
  | "uncapitalize"
  | "lowercase"
  | "uppercase"

export const TRANSFORM_NAMES: readonly TransformName[] = [
  "camelCase",
  "pascalCase",
  "snakeCase",
  "capitalize",
  "uncapitalize",
  "lowercase",
  "uppercase",
]

const transformRegistry: Record<TransformName, (s: string) => string> = {
  camelCase,
  pascalCase,
  snakeCase,
  capitalize: Str.capitalize,
  uncapitalize: Str.uncapitalize,
  lowercase: (s) => s.toLowerCase(),
  uppercase: (s) => s.toUpperCase(),
}

/**
 * A chain of transforms to apply in order.
 * Empty array = identity (preserve as-is).
 */
export type TransformChain = readonly TransformName[]

export function applyTransformChain(input: string, chain: TransformChain): string {
  return chain.reduce((s, name) => transformRegistry[name](s), input)
}

// ============================================================================
// Core Inflection Interface
// ============================================================================

export interface CoreInflection {
  readonly camelCase: (text: string) => string
  readonly pascalCase: (text: string) => string
  readonly snakeCase: (text: string) => string
  readonly safeIdentifier: (text: string) => string
  /** Record type name for a query: `list_users` → `ListUsersResult` */
  readonly className: (queryName: string) => string
  /** Record field / member property name for a response column */
  readonly fieldName: (column: string) => string
  /** Property name in the generated parameter interface */
  readonly parameterName: (name: string) => string
  /** Exported function name for a query */
  readonly functionName: (queryName: string) => string
}

/** Service tag */
export class Inflection extends Context.Tag("Inflection")<Inflection, CoreInflection>() {}

// ============================================================================
// Inflection Configuration
// ============================================================================

/**
 * Transform chains for the configurable names. Omitted chains fall back to
 * `["camelCase"]`; an explicit empty chain keeps the IR name as-is.
 *
 * @example
 * ```typescript
 * const config: InflectionConfig = {
 *   // created_at → created_at
 *   fieldName: [],
 *   // get_user → GET_USER
 *   functionName: ["uppercase"],
 * }
 * ```
 */
export interface InflectionConfig {
  readonly fieldName?: TransformChain
  readonly parameterName?: TransformChain
  readonly functionName?: TransformChain
}

const DEFAULT_CHAIN: TransformChain = ["camelCase"]

// ============================================================================
// Default Inflection
// ============================================================================

export const defaultInflection: CoreInflection = {
  camelCase,
  pascalCase,
  snakeCase,
  safeIdentifier,
  className: generateClassName,
  fieldName: (column) => safeIdentifier(camelCase(column)),
  parameterName: (name) => safeIdentifier(camelCase(name)),
  functionName: (queryName) => safeIdentifier(camelCase(queryName)),
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a CoreInflection instance with optional configuration.
 *
 * @example
 * ```typescript
 * const inflection = createInflection({ fieldName: [] })
 * inflection.fieldName("created_at") // "created_at"
 * ```
 */
export function createInflection(config?: InflectionConfig): CoreInflection {
  if (!config) return defaultInflection

  const fieldChain = config.fieldName ?? DEFAULT_CHAIN
  const parameterChain = config.parameterName ?? DEFAULT_CHAIN
  const functionChain = config.functionName ?? DEFAULT_CHAIN

  return {
    ...defaultInflection,
    fieldName: (column) => safeIdentifier(applyTransformChain(column, fieldChain)),
    parameterName: (name) => safeIdentifier(applyTransformChain(name, parameterChain)),
    functionName: (queryName) => safeIdentifier(applyTransformChain(queryName, functionChain)),
  }
}

/**
 * Create an Effect Layer that provides inflection with optional configuration.
 *
 * @example
 * ```typescript
 * Effect.gen(function* () {
 *   const inflection = yield* Inflection
 *   // ...
 * }).pipe(Effect.provide(makeInflectionLayer({ fieldName: [] })))
 * ```
 */
export function makeInflectionLayer(config?: InflectionConfig): Layer.Layer<Inflection> {
  return Layer.succeed(Inflection, createInflection(config))
}

/** Default inflection layer */
export const InflectionLive = makeInflectionLayer()
