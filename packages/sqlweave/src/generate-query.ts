/**
 * Per-query generation
 *
 * Runs every lowering stage for one QueryDefinition and prints its module.
 * Pure apart from debug logging; the Inflection service decides names.
 */
import { Effect } from "effect"
import type { GenerationError } from "./errors.js"
import type { QueryDefinition } from "./ir/index.js"
import type { Dialect } from "./lib/dialect.js"
import type { Fragment } from "./lib/statements.js"
import { Inflection } from "./services/inflection.js"
import { detectShape } from "./hierarchy/detect.js"
import { buildSchemas, ensureUniqueFields, orderedSchemas, renderInterface, type RecordSchema } from "./hierarchy/schema.js"
import { Scope } from "./codegen/expression.js"
import { buildSql, type SqlBuild } from "./codegen/sql-builder.js"
import { synthesizeExecution, type Execution } from "./codegen/execution.js"
import { synthesizeGuards } from "./codegen/where-guard.js"
import {
  collectSystemValues,
  PARAMS_ARGUMENT,
  paramsSnapshot,
  renderParamsInterface,
  requiredChecks,
  systemLocalName,
  systemValueStatements,
  typeParameters,
} from "./codegen/parameters.js"
import { renderModule, type ReturnType } from "./codegen/module.js"

export interface GenerateQueryOptions {
  readonly dialect: Dialect
  readonly runtimeModule: string
}

export interface GeneratedQuery {
  /** IR query name */
  readonly queryName: string
  /** Exported TypeScript function name */
  readonly functionName: string
  /** Record schemas, dependency ordered; empty for affinity none */
  readonly schemas: readonly RecordSchema[]
  readonly sql: SqlBuild
  readonly guards: Fragment
  readonly execution: Execution
  readonly returnType: ReturnType
  /** Complete module source */
  readonly source: string
}

/**
 * Generate the module for one query.
 */
export const generateQuery = (
  query: QueryDefinition,
  options: GenerateQueryOptions
): Effect.Effect<GeneratedQuery, GenerationError, Inflection> =>
  Effect.gen(function* () {
    const inflection = yield* Inflection
    const funcName = inflection.functionName(query.functionName)

    const params = yield* typeParameters(inflection, query.functionName, query.parameters)
    const scope = params.parameters.reduce(
      (acc, p) => acc.push(p.name, `${PARAMS_ARGUMENT}.${p.property}`),
      Scope.empty
    )

    const shape = yield* detectShape(query.responses)
    const built = query.affinity === "none" ? undefined : buildSchemas(inflection, query.functionName, shape)
    const schemaSet = built === undefined ? undefined : yield* ensureUniqueFields(query.functionName, built)

    const systemValues = collectSystemValues(inflection, query.implicitParameters, query.instructions)
    const sql = yield* buildSql(
      {
        dialect: options.dialect,
        inflection,
        expressions: query.expressions,
        scope,
        systemLocal: (field) => systemLocalName(inflection, field),
      },
      query.instructions
    )

    const guards = yield* synthesizeGuards(query.statementType, query.whereMeta, {
      inflection,
      expressions: query.expressions,
      scope,
      funcName,
    })

    const snapshot = paramsSnapshot(params)
    const execution = yield* synthesizeExecution({
      dialect: options.dialect,
      affinity: query.affinity,
      shape,
      schemas: schemaSet,
      funcName,
      queryName: query.functionName,
      paramsSource: snapshot,
    })

    const rootType = schemaSet?.root.typeName ?? ""
    const returnType: ReturnType =
      query.affinity === "none"
        ? { kind: "rowCount" }
        : query.affinity === "one"
          ? { kind: "record", typeName: rootType }
          : { kind: "stream", typeName: rootType }

    const schemas = schemaSet === undefined ? [] : orderedSchemas(schemaSet)
    const checks = requiredChecks(params, funcName)
    const hasParams = params.parameters.length > 0
    const usesLoops = !sql.static && query.instructions.some((inst) => inst._tag === "LoopStart")

    const runtime = [
      "toDatabaseError",
      ...execution.runtime,
      ...(checks.length > 0 ? ["ValidationError"] : []),
      ...(systemValues.length > 0 ? ["systemValue"] : []),
      ...(guards.length > 0 ? ["UnsafeMutationError"] : []),
      ...(usesLoops ? ["toArray"] : []),
    ]

    const errorContext = snapshot === undefined
      ? `{ funcName: ${JSON.stringify(funcName)}, query: sql }`
      : `{ funcName: ${JSON.stringify(funcName)}, query: sql, params: ${snapshot} }`

    const source = renderModule({
      dialect: options.dialect,
      runtimeModule: options.runtimeModule,
      funcName,
      description: query.description,
      returnType,
      declarations: [
        ...schemas.map(renderInterface),
        ...(hasParams ? [renderParamsInterface(params)] : []),
      ],
      paramsType: hasParams ? params.typeName : undefined,
      usesContext: systemValues.length > 0 || guards.length > 0,
      driverTypes: execution.driverTypes,
      streams: execution.streams,
      runtime,
      prelude: [...checks, ...systemValueStatements(systemValues)],
      sql,
      guards,
      execution: execution.statements,
      errorContext,
    })

    yield* Effect.logDebug(`generated ${funcName}`).pipe(
      Effect.annotateLogs({ query: query.functionName, static: String(sql.static) })
    )

    return {
      queryName: query.functionName,
      functionName: funcName,
      schemas,
      sql,
      guards,
      execution,
      returnType,
      source,
    }
  })
