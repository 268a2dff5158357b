/**
 * Query context and the helpers generated code calls at run time.
 */
import { ValidationError } from "./errors.js"

/**
 * Per-call options passed as the last argument of a generated function.
 */
export interface QueryContext {
  /** Skip the guards that stop UPDATE/DELETE statements without a WHERE clause */
  readonly allowUnsafeMutations?: boolean
  /** Values for system columns (`created_at`, `updated_by`, ...) keyed by column name */
  readonly systemValues?: Readonly<Record<string, unknown>>
}

const isArray = <T>(value: readonly T[] | T): value is readonly T[] => Array.isArray(value)

/**
 * Coerce a loop collection into an array: null and undefined become `[]`,
 * a single value becomes `[value]`.
 */
export function toArray<T>(value: readonly T[] | T | null | undefined): T[] {
  if (value === null || value === undefined) return []
  if (isArray(value)) return [...value]
  return [value]
}

/**
 * Resolve a system column value from the context, falling back to the
 * column's default. Fails when neither is available.
 */
export function systemValue(ctx: QueryContext, field: string, fallback?: () => unknown): unknown {
  const value = ctx.systemValues?.[field]
  if (value !== undefined) return value
  if (fallback) return fallback()
  throw new ValidationError({
    message: `System value '${field}' is not set on the query context and has no default`,
    funcName: "systemValue",
    parameter: field,
  })
}
