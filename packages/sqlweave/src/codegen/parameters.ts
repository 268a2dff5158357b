/**
 * Parameters of generated functions
 *
 * Caller parameters arrive as one `params` object typed by a generated
 * interface; system fields (timestamps, audit columns) are resolved from
 * `ctx.systemValues` with an optional default.
 */
import { Effect } from "effect"
import { conjure } from "../lib/conjure.js"
import type { UnsupportedType } from "../errors.js"
import type { ImplicitParameter, Instruction, Parameter } from "../ir/index.js"
import { line, type Statement } from "../lib/statements.js"
import type { CoreInflection } from "../services/inflection.js"
import { toTsType, type TsType } from "./types.js"

export interface TypedParameter {
  readonly name: string
  /** Property name in the parameter interface */
  readonly property: string
  readonly optional: boolean
  readonly type: TsType
}

export interface ParameterSet {
  readonly typeName: string
  readonly parameters: readonly TypedParameter[]
}

export const PARAMS_ARGUMENT = "params"

export const typeParameters = (
  inflection: CoreInflection,
  queryName: string,
  parameters: readonly Parameter[]
): Effect.Effect<ParameterSet, UnsupportedType> =>
  Effect.gen(function* () {
    const typed: TypedParameter[] = []
    for (const parameter of parameters) {
      typed.push({
        name: parameter.name,
        property: inflection.parameterName(parameter.name),
        optional: parameter.optional,
        type: yield* toTsType(parameter.type, parameter.optional, "parameter", parameter.name),
      })
    }
    return { typeName: `${inflection.pascalCase(queryName)}Params`, parameters: typed }
  })

/** `export interface XParams { ... }`, optional members as `name?: T | null` */
export const renderParamsInterface = (set: ParameterSet): string =>
  conjure.print(
    conjure.decl.interface(
      set.typeName,
      set.parameters.map((p) => ({ name: p.property, type: p.type.node, optional: p.optional }))
    )
  )

/** `{ ...params }`, the parameter map attached to runtime errors */
export const paramsSnapshot = (set: ParameterSet): string | undefined =>
  set.parameters.length === 0 ? undefined : `{ ...${PARAMS_ARGUMENT} }`

/**
 * Null checks for required parameters, for callers outside the type system.
 */
export const requiredChecks = (set: ParameterSet, funcName: string): readonly Statement[] =>
  set.parameters
    .filter((p) => !p.optional)
    .flatMap((p) => [
      line(0, `if (${PARAMS_ARGUMENT}.${p.property} == null) {`),
      line(1, "throw new ValidationError({"),
      line(2, `message: ${JSON.stringify(`${p.name} is required`)},`),
      line(2, `funcName: ${JSON.stringify(funcName)},`),
      line(2, `parameter: ${JSON.stringify(p.name)},`),
      line(2, `params: { ...${PARAMS_ARGUMENT} },`),
      line(1, "});"),
      line(0, "}"),
    ])

// ============================================================================
// System values
// ============================================================================

export interface SystemValue {
  readonly field: string
  readonly local: string
  readonly default?: unknown
  readonly hasDefault: boolean
}

/** `created_at` → `sysCreatedAt` */
export const systemLocalName = (inflection: CoreInflection, field: string): string =>
  `sys${inflection.pascalCase(field)}`

/**
 * Source for a default: strings with `(` or `.` are code, everything else
 * is a JSON literal.
 */
export const defaultSource = (value: unknown): string => {
  if (value === null) return "null"
  if (typeof value === "string") {
    return value.includes("(") || value.includes(".") ? value : JSON.stringify(value)
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  return JSON.stringify(value)
}

/**
 * Declared implicit parameters, then fields only referenced by
 * ADD_SYSTEM_PARAM, each once.
 */
export const collectSystemValues = (
  inflection: CoreInflection,
  implicit: readonly ImplicitParameter[],
  instructions: readonly Instruction[]
): readonly SystemValue[] => {
  const values = new Map<string, SystemValue>()
  for (const parameter of implicit) {
    if (values.has(parameter.name)) continue
    values.set(parameter.name, {
      field: parameter.name,
      local: systemLocalName(inflection, parameter.name),
      default: parameter.default,
      hasDefault: parameter.default !== undefined,
    })
  }
  for (const inst of instructions) {
    if (inst._tag !== "AddSystemParam" || values.has(inst.field)) continue
    values.set(inst.field, {
      field: inst.field,
      local: systemLocalName(inflection, inst.field),
      hasDefault: false,
    })
  }
  return [...values.values()]
}

export const systemValueStatements = (values: readonly SystemValue[]): readonly Statement[] =>
  values.map((value) =>
    line(
      0,
      value.hasDefault
        ? `const ${value.local} = systemValue(ctx, ${JSON.stringify(value.field)}, () => ${defaultSource(value.default)});`
        : `const ${value.local} = systemValue(ctx, ${JSON.stringify(value.field)});`
    )
  )
