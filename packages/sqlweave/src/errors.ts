/**
 * Core error types for sqlweave
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect"

// Base error type with common fields
interface ErrorBase {
  readonly message: string
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

export class UnsupportedDialect extends Data.TaggedError("UnsupportedDialect")<
  ErrorBase & { readonly dialect: string; readonly supported: readonly string[] }
> {}

// IR errors
export class IrDecodeError extends Data.TaggedError("IrDecodeError")<
  ErrorBase & { readonly source: string; readonly errors: readonly string[] }
> {}

export class UnsupportedType extends Data.TaggedError("UnsupportedType")<
  ErrorBase & {
    readonly typeName: string
    readonly context: "parameter" | "response" | "type conversion"
    readonly hints: readonly string[]
    readonly field?: string
  }
> {}

export class ShapeError extends Data.TaggedError("ShapeError")<
  ErrorBase & { readonly functionName: string }
> {}

export class ExpressionError extends Data.TaggedError("ExpressionError")<
  ErrorBase & { readonly exprIndex: number; readonly expressionCount: number }
> {}

// Emission errors
export class EmitConflict extends Data.TaggedError("EmitConflict")<
  ErrorBase & { readonly path: string; readonly sources: readonly string[] }
> {}

export class WriteError extends Data.TaggedError("WriteError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

/** Errors a single query can fail with while its module is generated */
export type GenerationError = UnsupportedType | ShapeError | ExpressionError

// Union of all errors for convenience
export type SqlweaveError =
  | ConfigNotFound
  | ConfigInvalid
  | UnsupportedDialect
  | IrDecodeError
  | UnsupportedType
  | ShapeError
  | ExpressionError
  | EmitConflict
  | WriteError
