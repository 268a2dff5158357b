/**
 * Hierarchical shape detection
 *
 * Response columns named `group__nested__column` describe nested records.
 * Detection rebuilds the group forest as an arena keyed by path key
 * (`group__nested`), so no node holds a reference to another.
 */
import { Effect } from "effect"
import type { ResponseField } from "../ir/index.js"
import type { UnsupportedType } from "../errors.js"
import { toTsType, type TsType } from "../codegen/types.js"

export const PATH_DELIMITER = "__"

export interface ShapeField {
  /** Column name as returned by the driver */
  readonly column: string
  /** Name within its group (the last path segment) */
  readonly localName: string
  readonly nullable: boolean
  readonly type: TsType
}

export interface HierarchyNode {
  readonly pathSegments: readonly string[]
  readonly key: string
  readonly fields: readonly ShapeField[]
  /** next segment → child path key */
  readonly children: ReadonlyMap<string, string>
}

export interface Shape {
  readonly nodes: ReadonlyMap<string, HierarchyNode>
  readonly rootFields: readonly ShapeField[]
}

export const pathKey = (segments: readonly string[]): string => segments.join(PATH_DELIMITER)

export const isHierarchical = (shape: Shape): boolean => shape.nodes.size > 0

interface MutableNode {
  readonly pathSegments: readonly string[]
  readonly fields: ShapeField[]
  readonly children: Map<string, string>
}

/**
 * Split response fields into root fields and the group forest.
 *
 * Fails with UnsupportedType naming the first field whose type is unknown.
 */
export const detectShape = (
  responses: readonly ResponseField[]
): Effect.Effect<Shape, UnsupportedType> =>
  Effect.gen(function* () {
    const arena = new Map<string, MutableNode>()
    const rootFields: ShapeField[] = []

    const ensure = (segments: readonly string[]): MutableNode => {
      const key = pathKey(segments)
      const existing = arena.get(key)
      if (existing) return existing

      const node: MutableNode = { pathSegments: segments, fields: [], children: new Map() }
      arena.set(key, node)
      const last = segments[segments.length - 1]
      if (segments.length > 1 && last !== undefined) {
        ensure(segments.slice(0, -1)).children.set(last, key)
      }
      return node
    }

    for (const response of responses) {
      const type = yield* toTsType(response.type, response.nullable, "response", response.name)
      const segments = response.name.split(PATH_DELIMITER)
      const localName = segments[segments.length - 1] ?? response.name

      const field: ShapeField = {
        column: response.name,
        localName,
        nullable: response.nullable,
        type,
      }

      if (segments.length < 2) {
        rootFields.push(field)
      } else {
        ensure(segments.slice(0, -1)).fields.push(field)
      }
    }

    const nodes = new Map<string, HierarchyNode>()
    for (const [key, node] of arena) {
      nodes.set(key, {
        pathSegments: node.pathSegments,
        key,
        fields: node.fields,
        children: node.children,
      })
    }
    return { nodes, rootFields }
  })

/** Top-level (path length 1) group keys, sorted ascending */
export const topLevelKeys = (shape: Shape): readonly string[] =>
  [...shape.nodes.values()]
    .filter((node) => node.pathSegments.length === 1)
    .map((node) => node.key)
    .sort()

/** Child keys of a node, sorted by segment */
export const sortedChildren = (node: HierarchyNode): readonly (readonly [string, string])[] =>
  [...node.children.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

/**
 * The first root field named `id` or ending in `_id` (case-insensitive).
 */
export const findParentKeyFields = (shape: Shape): readonly ShapeField[] => {
  const key = shape.rootFields.find((field) => {
    const normalized = field.column.toLowerCase()
    return normalized === "id" || normalized.endsWith("_id")
  })
  return key === undefined ? [] : [key]
}
