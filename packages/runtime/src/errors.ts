/**
 * Errors raised by generated query functions
 *
 * Every error carries the name of the generated function that raised it,
 * and, where one was built, the SQL text and the parameters it ran with.
 */
import { Data, Predicate } from "effect"

export type MutationKind = "update" | "delete"

// Fields shared by every query error
interface QueryErrorBase {
  readonly message: string
  readonly funcName: string
  readonly query?: string
  readonly params?: Readonly<Record<string, unknown>>
}

/** A `one` query matched no rows */
export class NotFoundError extends Data.TaggedError("NotFoundError")<QueryErrorBase> {}

/** A required parameter or system value was missing */
export class ValidationError extends Data.TaggedError("ValidationError")<
  QueryErrorBase & { readonly parameter: string }
> {}

/** The driver rejected the statement */
export class DatabaseError extends Data.TaggedError("DatabaseError")<
  QueryErrorBase & { readonly cause: unknown }
> {}

/** An UPDATE or DELETE would have run without a WHERE clause */
export class UnsafeMutationError extends Data.TaggedError("UnsafeMutationError")<
  QueryErrorBase & { readonly mutationKind: MutationKind; readonly hint: string }
> {}

export type QueryError = NotFoundError | ValidationError | DatabaseError | UnsafeMutationError

const QUERY_ERROR_TAGS: ReadonlySet<string> = new Set([
  "NotFoundError",
  "ValidationError",
  "DatabaseError",
  "UnsafeMutationError",
])

/**
 * Narrow an unknown thrown value to one of the query errors.
 */
export const isQueryError = (u: unknown): u is QueryError =>
  Predicate.hasProperty(u, "_tag") &&
  typeof u._tag === "string" &&
  QUERY_ERROR_TAGS.has(u._tag) &&
  u instanceof Error

/**
 * Wrap a driver failure, keeping the original error as `cause`.
 * Query errors pass through unchanged.
 */
export const toDatabaseError = (
  cause: unknown,
  details: { readonly funcName: string; readonly query?: string; readonly params?: Readonly<Record<string, unknown>> },
): QueryError => {
  if (isQueryError(cause)) return cause
  const reason = cause instanceof Error ? cause.message : String(cause)
  return new DatabaseError({ ...details, message: `${details.funcName} failed: ${reason}`, cause })
}
