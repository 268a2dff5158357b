/**
 * Record schemas for query results
 *
 * One interface per hierarchy node, deepest first so every child type is
 * declared before the parent that lists it, then the top-level record.
 */
import { Array as Arr, Effect, Order } from "effect"
import { ShapeError } from "../errors.js"
import { conjure } from "../lib/conjure.js"
import type { CoreInflection } from "../services/inflection.js"
import type { TsType } from "../codegen/types.js"
import {
  isHierarchical,
  PATH_DELIMITER,
  sortedChildren,
  topLevelKeys,
  type HierarchyNode,
  type Shape,
  type ShapeField,
} from "./detect.js"

const { ts } = conjure

export interface RecordField {
  readonly name: string
  /** Source column for scalar fields */
  readonly column?: string
  readonly type: TsType
  readonly hasDefault: boolean
  readonly defaultLiteral?: string
  /** Path key of the child group for list fields */
  readonly listOf?: string
}

export interface RecordSchema {
  readonly typeName: string
  /** Path key of the hierarchy node, absent for the top-level record */
  readonly pathKey?: string
  readonly fields: readonly RecordField[]
}

export interface SchemaSet {
  /** Group records, deepest first */
  readonly groups: readonly RecordSchema[]
  readonly root: RecordSchema
}

const scalarField = (inflection: CoreInflection, field: ShapeField): RecordField => ({
  name: inflection.fieldName(field.localName),
  column: field.column,
  type: field.type,
  hasDefault: field.nullable,
  defaultLiteral: field.nullable ? "null" : undefined,
})

const listField = (name: string, childTypeName: string, childKey: string): RecordField => {
  const node = ts.array(ts.ref(childTypeName))
  return {
    name,
    type: { node, text: conjure.printInline(node) },
    hasDefault: true,
    defaultLiteral: "[]",
    listOf: childKey,
  }
}

const byDepthDescThenKey: Order.Order<HierarchyNode> = Order.combine(
  Order.mapInput(Order.reverse(Order.number), (node: HierarchyNode) => node.pathSegments.length),
  Order.mapInput(Order.string, (node: HierarchyNode) => node.key)
)

/** `GetBoardResult` + `["board", "list"]` → `GetBoardResultBoardList` */
export const groupTypeName = (
  inflection: CoreInflection,
  queryName: string,
  node: HierarchyNode
): string => inflection.className(queryName) + node.pathSegments.map(inflection.pascalCase).join("")

const buildHierarchical = (
  inflection: CoreInflection,
  queryName: string,
  shape: Shape
): SchemaSet => {
  const nodes = Arr.sort([...shape.nodes.values()], byDepthDescThenKey)
  const typeNames = new Map(nodes.map((node) => [node.key, groupTypeName(inflection, queryName, node)]))
  const typeNameOf = (key: string): string => typeNames.get(key) ?? key

  const groups = nodes.map((node): RecordSchema => ({
    typeName: typeNameOf(node.key),
    pathKey: node.key,
    fields: [
      ...node.fields.map((field) => scalarField(inflection, field)),
      ...sortedChildren(node).map(([segment, childKey]) =>
        listField(inflection.fieldName(segment), typeNameOf(childKey), childKey)
      ),
    ],
  }))

  const root: RecordSchema = {
    typeName: inflection.className(queryName),
    fields: [
      ...shape.rootFields.map((field) => scalarField(inflection, field)),
      ...topLevelKeys(shape).map((key) =>
        listField(inflection.fieldName(key), typeNameOf(key), key)
      ),
    ],
  }

  return { groups, root }
}

const buildFlat = (inflection: CoreInflection, queryName: string, shape: Shape): SchemaSet => {
  const fields = shape.rootFields.map((field) => scalarField(inflection, field))
  const [optional, required] = Arr.partition(fields, (field) => !field.hasDefault)
  return {
    groups: [],
    root: { typeName: inflection.className(queryName), fields: [...required, ...optional] },
  }
}

/**
 * Record schemas for a detected shape, or undefined when the query returns
 * no columns.
 */
export const buildSchemas = (
  inflection: CoreInflection,
  queryName: string,
  shape: Shape
): SchemaSet | undefined => {
  if (isHierarchical(shape)) return buildHierarchical(inflection, queryName, shape)
  if (shape.rootFields.length === 0) return undefined
  return buildFlat(inflection, queryName, shape)
}

/** Column a field is read from, or the group a list field collects */
const fieldSource = (field: RecordField): string =>
  field.column ?? `${field.listOf ?? field.name}${PATH_DELIMITER}*`

/**
 * Fail when two fields of one record end up with the same property name,
 * e.g. `user_id` and `userId`, or `cards` next to a `cards__id` group.
 */
export const ensureUniqueFields = (
  queryName: string,
  set: SchemaSet
): Effect.Effect<SchemaSet, ShapeError> => {
  for (const schema of orderedSchemas(set)) {
    const seen = new Map<string, RecordField>()
    for (const field of schema.fields) {
      const previous = seen.get(field.name)
      if (previous !== undefined) {
        return Effect.fail(
          new ShapeError({
            message: `${queryName}: field '${field.name}' of ${schema.typeName} is produced by both ${fieldSource(previous)} and ${fieldSource(field)}`,
            functionName: queryName,
          })
        )
      }
      seen.set(field.name, field)
    }
  }
  return Effect.succeed(set)
}

/** All schemas in declaration order */
export const orderedSchemas = (set: SchemaSet): readonly RecordSchema[] => [...set.groups, set.root]

/** `export interface ...` source for one record */
export const renderInterface = (schema: RecordSchema): string =>
  conjure.print(
    conjure.decl.interface(
      schema.typeName,
      schema.fields.map((field) => ({ name: field.name, type: field.type.node }))
    )
  )
