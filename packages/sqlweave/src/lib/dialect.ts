/**
 * Dialects and their driver conventions
 *
 * Every dialect-dependent choice in generated code goes through an
 * exhaustive switch over the closed Dialect union.
 */
import { Effect } from "effect"
import { UnsupportedDialect } from "../errors.js"

export type Dialect = "postgres" | "mysql" | "sqlite"

export const SUPPORTED_DIALECTS: readonly Dialect[] = ["postgres", "mysql", "sqlite"]

const isDialect = (value: string): value is Dialect =>
  SUPPORTED_DIALECTS.some((dialect) => dialect === value)

/**
 * Resolve a configured dialect tag. Case-insensitive.
 */
export const parseDialect = (value: string): Effect.Effect<Dialect, UnsupportedDialect> => {
  const normalized = value.trim().toLowerCase()
  return isDialect(normalized)
    ? Effect.succeed(normalized)
    : Effect.fail(
        new UnsupportedDialect({
          message: `Unsupported dialect "${value}". Supported: ${SUPPORTED_DIALECTS.join(", ")}`,
          dialect: value,
          supported: SUPPORTED_DIALECTS,
        })
      )
}

/**
 * Placeholder token for the 1-based parameter `position`.
 */
export const placeholder = (dialect: Dialect, position: number): string => {
  switch (dialect) {
    case "postgres":
      return `$${position}`
    case "mysql":
    case "sqlite":
      return "?"
  }
}

/**
 * Template literal text for a placeholder whose position is only known at
 * run time, e.g. `$${args.length + 1}`.
 */
export const runtimePlaceholder = (dialect: Dialect, position: string): string => {
  switch (dialect) {
    case "postgres":
      return `$\${${position}}`
    case "mysql":
    case "sqlite":
      return "?"
  }
}

/** Whether placeholders carry their position (and so depend on argument order) */
export const numberedPlaceholders = (dialect: Dialect): boolean => {
  switch (dialect) {
    case "postgres":
      return true
    case "mysql":
    case "sqlite":
      return false
  }
}

export interface DriverImport {
  /** Type of the `db` argument of generated functions */
  readonly dbType: string
  readonly source: string
  /** Extra value imports needed by streaming execution */
  readonly streaming?: { readonly name: string; readonly source: string; readonly isDefault: boolean }
}

export const driverImport = (dialect: Dialect): DriverImport => {
  switch (dialect) {
    case "postgres":
      return {
        dbType: "ClientBase",
        source: "pg",
        streaming: { name: "QueryStream", source: "pg-query-stream", isDefault: true },
      }
    case "mysql":
      return { dbType: "Connection", source: "mysql2/promise" }
    case "sqlite":
      return { dbType: "Database", source: "better-sqlite3" }
  }
}
