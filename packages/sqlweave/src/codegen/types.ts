/**
 * IR primitive type tags → TypeScript type annotations
 */
import { Effect } from "effect"
import type { namedTypes as n } from "ast-types"
import { conjure } from "../lib/conjure.js"
import { UnsupportedType } from "../errors.js"

const { ts } = conjure

export type TypeContext = "parameter" | "response" | "type conversion"

export interface TsType {
  readonly node: n.TSType
  /** Printed annotation, e.g. `string[] | null` */
  readonly text: string
}

const HINTS: Record<TypeContext, readonly string[]> = {
  parameter: [
    "Basic types: int, string, bool, float, decimal, timestamp (aliases: date, time, datetime), bytes, any",
    "Arrays: string[], int[], etc.",
    "Optional parameters are typed `T | null` and may be omitted",
  ],
  response: [
    "Supported types: int, string, bool, float, decimal, timestamp, bytes, any",
    "Arrays: T[]",
    "Nullable columns are typed `T | null`",
  ],
  "type conversion": [
    "Supported basic types: int, int32, int64, string, bool, boolean, float, float32, float64, double, decimal, timestamp, date, time, datetime, bytes, any",
    "Array types: append [] to any basic type (e.g., int[], string[])",
    "Nullable types: pass nullable to add `| null`",
  ],
}

const basicType = (tag: string): n.TSType | undefined => {
  switch (tag) {
    case "int":
    case "int32":
    case "float":
    case "float32":
    case "float64":
    case "double":
      return ts.number()
    // 64-bit integers and decimals keep their precision as text
    case "int64":
    case "decimal":
    case "string":
      return ts.string()
    case "bool":
    case "boolean":
      return ts.boolean()
    case "timestamp":
    case "date":
    case "time":
    case "datetime":
      return ts.ref("Date")
    case "bytes":
      return ts.ref("Uint8Array")
    case "any":
      return ts.any()
    default:
      return undefined
  }
}

const resolve = (tag: string): n.TSType | undefined => {
  if (tag.endsWith("[]")) {
    const element = resolve(tag.slice(0, -2).trim())
    return element === undefined ? undefined : ts.array(element)
  }
  return basicType(tag)
}

export const unsupportedType = (
  typeName: string,
  context: TypeContext,
  field?: string
): UnsupportedType =>
  new UnsupportedType({
    message:
      field === undefined
        ? `unsupported ${context} type '${typeName}'`
        : `unsupported ${context} type '${typeName}' for '${field}'`,
    typeName,
    context,
    hints: HINTS[context],
    field,
  })

/**
 * Map an IR type tag (case-insensitive) to a TypeScript type.
 *
 * @param field - offending field or parameter, reported on failure
 */
export const toTsType = (
  typeName: string,
  nullable: boolean,
  context: TypeContext = "type conversion",
  field?: string
): Effect.Effect<TsType, UnsupportedType> => {
  const base = resolve(typeName.trim().toLowerCase())
  if (base === undefined) {
    return Effect.fail(unsupportedType(typeName, context, field))
  }
  const node = nullable ? ts.union(base, ts.null()) : base
  return Effect.succeed({ node, text: conjure.printInline(node) })
}
