/**
 * Query execution
 *
 * Emits the statements that run the built SQL through the driver and turn
 * rows into records: an affected-row count, a single record, or an async
 * generator. Hierarchical results are folded from joined rows; for many
 * rows only the parent currently being filled is kept in memory.
 */
import { Effect } from "effect"
import { ShapeError } from "../errors.js"
import type { ResponseAffinity } from "../ir/index.js"
import type { Dialect } from "../lib/dialect.js"
import { line, type Statement } from "../lib/statements.js"
import { findParentKeyFields, isHierarchical, topLevelKeys, type Shape, type ShapeField } from "../hierarchy/detect.js"
import type { RecordField, RecordSchema, SchemaSet } from "../hierarchy/schema.js"

export interface ExecutionOptions {
  readonly dialect: Dialect
  readonly affinity: ResponseAffinity
  readonly shape: Shape
  readonly schemas: SchemaSet | undefined
  /** Generated function name, reported in runtime errors */
  readonly funcName: string
  /** IR query name, reported in generation errors */
  readonly queryName: string
  /** Object literal source for the error `params` field, if any */
  readonly paramsSource?: string
}

export interface Execution {
  readonly statements: readonly Statement[]
  /** Type-only names imported from the driver module */
  readonly driverTypes: readonly string[]
  /** Value names imported from the runtime module */
  readonly runtime: readonly string[]
  /** Whether the streaming helper of the driver is imported */
  readonly streams: boolean
}

const ROW_TYPE = "Record<string, unknown>"

// ============================================================================
// Driver idioms
// ============================================================================

/** Statements producing `rowCount` from an execution result */
const affectedRows = (dialect: Dialect): readonly string[] => {
  switch (dialect) {
    case "postgres":
      return ["const result = await db.query(sql, args);", "return result.rowCount ?? 0;"]
    case "mysql":
      return [
        "const [result] = await db.query<ResultSetHeader>(sql, args);",
        "return result.affectedRows;",
      ]
    case "sqlite":
      return ["return db.prepare(sql).run(...args).changes;"]
  }
}

/** Statements binding `row` to the first row, or undefined */
const fetchOne = (dialect: Dialect): readonly string[] => {
  switch (dialect) {
    case "postgres":
      return [
        "const result = await db.query(sql, args);",
        `const row: ${ROW_TYPE} | undefined = result.rows[0];`,
      ]
    case "mysql":
      return [
        "const [rows] = await db.query<RowDataPacket[]>(sql, args);",
        `const row: ${ROW_TYPE} | undefined = rows[0];`,
      ]
    case "sqlite":
      return [`const row = db.prepare(sql).get(...args) as ${ROW_TYPE} | undefined;`]
  }
}

/** Statements binding `rows` to every row */
const fetchAll = (dialect: Dialect): readonly string[] => {
  switch (dialect) {
    case "postgres":
      return ["const result = await db.query(sql, args);", `const rows: ${ROW_TYPE}[] = result.rows;`]
    case "mysql":
      return ["const [rows] = await db.query<RowDataPacket[]>(sql, args);"]
    case "sqlite":
      return [`const rows = db.prepare(sql).all(...args) as ${ROW_TYPE}[];`]
  }
}

/** Setup statements and the loop header that pulls rows one at a time */
const streamRows = (dialect: Dialect): { readonly setup: readonly string[]; readonly loop: string } => {
  switch (dialect) {
    case "postgres":
      return {
        setup: ["const stream = db.query(new QueryStream(sql, args));"],
        loop: `for await (const row of stream as AsyncIterable<${ROW_TYPE}>) {`,
      }
    case "mysql":
      return {
        setup: ["const stream = db.connection.query(sql, args).stream();"],
        loop: `for await (const row of stream as AsyncIterable<${ROW_TYPE}>) {`,
      }
    case "sqlite":
      return {
        setup: [],
        loop: `for (const row of db.prepare(sql).iterate(...args) as IterableIterator<${ROW_TYPE}>) {`,
      }
  }
}

const mysqlTypes = (affinity: ResponseAffinity): readonly string[] => {
  switch (affinity) {
    case "none":
      return ["ResultSetHeader"]
    case "one":
      return ["RowDataPacket"]
    case "many":
      return []
  }
}

// ============================================================================
// Row mapping
// ============================================================================

export const columnAccess = (column: string): string => `row[${JSON.stringify(column)}]`

const fieldValue = (field: RecordField): string =>
  field.column === undefined
    ? field.defaultLiteral ?? "[]"
    : `${columnAccess(field.column)} as ${field.type.text}`

/**
 * An object literal for `schema` built from `row`, opened by `opener` and
 * closed by `closer`.
 */
export const objectLiteral = (
  indent: number,
  schema: RecordSchema,
  opener: string,
  closer: string
): readonly Statement[] => [
  line(indent, `${opener}{`),
  ...schema.fields.map((field) => line(indent + 1, `${field.name}: ${fieldValue(field)},`)),
  line(indent, `}${closer}`),
]

/** `row["id"]`, or a JSON tuple when the key spans several columns */
export const parentKeySource = (fields: readonly ShapeField[]): string =>
  fields.length === 1 && fields[0] !== undefined
    ? columnAccess(fields[0].column)
    : `JSON.stringify([${fields.map((field) => columnAccess(field.column)).join(", ")}])`

/**
 * For each top-level group with columns of its own: when any of them is
 * non-null in the current row, push a child record onto `target`.
 */
export const attachChildren = (
  indent: number,
  shape: Shape,
  schemas: SchemaSet,
  target: string
): readonly Statement[] =>
  topLevelKeys(shape).flatMap((key) => {
    const node = shape.nodes.get(key)
    const schema = schemas.groups.find((group) => group.pathKey === key)
    const list = schemas.root.fields.find((field) => field.listOf === key)
    if (node === undefined || schema === undefined || list === undefined || node.fields.length === 0) {
      return []
    }
    const present = node.fields.map((field) => `${columnAccess(field.column)} != null`).join(" || ")
    return [
      line(indent, `if (${present}) {`),
      ...objectLiteral(indent + 1, schema, `${target}.${list.name}.push(`, ");"),
      line(indent, "}"),
    ]
  })

// ============================================================================
// Synthesis
// ============================================================================

const notFound = (indent: number, options: ExecutionOptions): readonly Statement[] => [
  line(indent, "throw new NotFoundError({"),
  line(indent + 1, `message: ${JSON.stringify(`${options.funcName}: no row found`)},`),
  line(indent + 1, `funcName: ${JSON.stringify(options.funcName)},`),
  line(indent + 1, "query: sql,"),
  ...(options.paramsSource === undefined ? [] : [line(indent + 1, `params: ${options.paramsSource},`)]),
  line(indent, "});"),
]

const shapeError = (options: ExecutionOptions, reason: string) =>
  new ShapeError({ message: `${options.queryName}: ${reason}`, functionName: options.queryName })

const requireSchemas = (options: ExecutionOptions): Effect.Effect<SchemaSet, ShapeError> =>
  options.schemas === undefined
    ? Effect.fail(shapeError(options, `response affinity "${options.affinity}" requires response columns`))
    : Effect.succeed(options.schemas)

const requireParentKey = (options: ExecutionOptions): Effect.Effect<readonly ShapeField[], ShapeError> => {
  const fields = findParentKeyFields(options.shape)
  return fields.length === 0
    ? Effect.fail(
        shapeError(options, "hierarchical result needs a root column named id or ending in _id")
      )
    : Effect.succeed(fields)
}

const lines = (indent: number, texts: readonly string[]): readonly Statement[] =>
  texts.map((text) => line(indent, text))

const oneFlat = (options: ExecutionOptions, schemas: SchemaSet): readonly Statement[] => [
  ...lines(0, fetchOne(options.dialect)),
  line(0, "if (row == null) {"),
  ...notFound(1, options),
  line(0, "}"),
  ...objectLiteral(0, schemas.root, "return ", ";"),
]

const oneHierarchical = (options: ExecutionOptions, schemas: SchemaSet): readonly Statement[] => [
  ...lines(0, fetchAll(options.dialect)),
  line(0, `let current: ${schemas.root.typeName} | undefined;`),
  line(0, "for (const row of rows) {"),
  line(1, "if (current === undefined) {"),
  ...objectLiteral(2, schemas.root, "current = ", ";"),
  line(1, "}"),
  ...attachChildren(1, options.shape, schemas, "current"),
  line(0, "}"),
  line(0, "if (current === undefined) {"),
  ...notFound(1, options),
  line(0, "}"),
  line(0, "return current;"),
]

const manyFlat = (options: ExecutionOptions, schemas: SchemaSet): readonly Statement[] => {
  const { setup, loop } = streamRows(options.dialect)
  return [
    ...lines(0, setup),
    line(0, loop),
    ...objectLiteral(1, schemas.root, "yield ", ";"),
    line(0, "}"),
  ]
}

const manyHierarchical = (
  options: ExecutionOptions,
  schemas: SchemaSet,
  keyFields: readonly ShapeField[]
): readonly Statement[] => {
  const { setup, loop } = streamRows(options.dialect)
  return [
    ...lines(0, setup),
    line(0, `let current: ${schemas.root.typeName} | undefined;`),
    line(0, "let currentKey: unknown;"),
    line(0, loop),
    line(1, `const key = ${parentKeySource(keyFields)};`),
    line(1, "if (current === undefined || key !== currentKey) {"),
    line(2, "if (current !== undefined) {"),
    line(3, "yield current;"),
    line(2, "}"),
    ...objectLiteral(2, schemas.root, "current = ", ";"),
    line(2, "currentKey = key;"),
    line(1, "}"),
    ...attachChildren(1, options.shape, schemas, "current"),
    line(0, "}"),
    line(0, "if (current !== undefined) {"),
    line(1, "yield current;"),
    line(0, "}"),
  ]
}

const driverTypesFor = (options: ExecutionOptions): readonly string[] => {
  switch (options.dialect) {
    case "postgres":
      return ["ClientBase"]
    case "mysql":
      return ["Connection", ...mysqlTypes(options.affinity)]
    case "sqlite":
      return ["Database"]
  }
}

/**
 * Execution statements for a query's response affinity and shape.
 */
export const synthesizeExecution = (options: ExecutionOptions): Effect.Effect<Execution, ShapeError> =>
  Effect.gen(function* () {
    const hierarchical = isHierarchical(options.shape)
    const done = (statements: readonly Statement[], runtime: readonly string[] = []): Execution => ({
      statements,
      driverTypes: driverTypesFor(options),
      runtime,
      streams: options.affinity === "many" && options.dialect === "postgres",
    })

    switch (options.affinity) {
      case "none":
        return done(lines(0, affectedRows(options.dialect)))
      case "one": {
        const schemas = yield* requireSchemas(options)
        if (!hierarchical) return done(oneFlat(options, schemas), ["NotFoundError"])
        yield* requireParentKey(options)
        return done(oneHierarchical(options, schemas), ["NotFoundError"])
      }
      case "many": {
        const schemas = yield* requireSchemas(options)
        if (!hierarchical) return done(manyFlat(options, schemas))
        const keyFields = yield* requireParentKey(options)
        return done(manyHierarchical(options, schemas, keyFields))
      }
    }
  })
