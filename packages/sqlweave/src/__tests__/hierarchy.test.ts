/**
 * Hierarchical shape detection and record schema tests
 */
import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  detectShape,
  findParentKeyFields,
  isHierarchical,
  topLevelKeys,
} from "../hierarchy/detect.js"
import { buildSchemas, ensureUniqueFields, orderedSchemas, renderInterface } from "../hierarchy/schema.js"
import { defaultInflection } from "../services/inflection.js"
import type { ResponseField } from "../ir/index.js"

const field = (name: string, type = "int", nullable = false): ResponseField => ({ name, type, nullable })

const boardResponses: readonly ResponseField[] = [
  field("id"),
  field("title", "string"),
  field("lists__id"),
  field("lists__name", "string"),
  field("lists__cards__id"),
  field("lists__cards__body", "string", true),
  field("owner__id"),
  field("owner__email", "string"),
]

describe("detectShape", () => {
  it.effect("keeps plain columns as root fields", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("id"), field("name", "string")])
      expect(isHierarchical(shape)).toBe(false)
      expect(shape.rootFields.map((f) => f.column)).toEqual(["id", "name"])
    })
  )

  it.effect("builds the group forest with ancestors on demand", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("lists__cards__id"), field("lists__id")])
      expect([...shape.nodes.keys()].sort()).toEqual(["lists", "lists__cards"])

      const lists = shape.nodes.get("lists")
      expect(lists?.pathSegments).toEqual(["lists"])
      expect(lists?.fields.map((f) => f.localName)).toEqual(["id"])
      expect([...(lists?.children.entries() ?? [])]).toEqual([["cards", "lists__cards"]])

      const cards = shape.nodes.get("lists__cards")
      expect(cards?.fields.map((f) => f.column)).toEqual(["lists__cards__id"])
    })
  )

  it.effect("sorts top-level groups by path key", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape(boardResponses)
      expect(topLevelKeys(shape)).toEqual(["lists", "owner"])
    })
  )

  it.effect("names the field with an unknown type", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(detectShape([field("id"), field("lists__tag", "citext")]))
      expect(error.field).toBe("lists__tag")
      expect(error.context).toBe("response")
    })
  )
})

describe("findParentKeyFields", () => {
  it.effect("picks the first root column named id or ending in _id", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("name", "string"), field("Board_ID"), field("id")])
      expect(findParentKeyFields(shape).map((f) => f.column)).toEqual(["Board_ID"])
    })
  )

  it.effect("ignores grouped columns", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("title", "string"), field("lists__id")])
      expect(findParentKeyFields(shape)).toEqual([])
    })
  )
})

describe("buildSchemas", () => {
  it.effect("orders flat fields required before optional", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([
        field("id"),
        field("nickname", "string", true),
        field("email", "string"),
        field("last_seen", "timestamp", true),
        field("created_at", "timestamp"),
      ])
      const set = buildSchemas(defaultInflection, "get_user", shape)
      expect(set?.groups).toEqual([])
      expect(set?.root.typeName).toBe("GetUserResult")
      expect(set?.root.fields.map((f) => f.name)).toEqual([
        "id",
        "email",
        "createdAt",
        "nickname",
        "lastSeen",
      ])
      expect(set?.root.fields.map((f) => f.defaultLiteral)).toEqual([
        undefined,
        undefined,
        undefined,
        "null",
        "null",
      ])
    })
  )

  it.effect("returns nothing without response columns", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([])
      expect(buildSchemas(defaultInflection, "delete_user", shape)).toBeUndefined()
    })
  )

  it.effect("declares children before their parents", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape(boardResponses)
      const set = buildSchemas(defaultInflection, "get_board", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")

      const names = orderedSchemas(set).map((s) => s.typeName)
      expect(names).toEqual([
        "GetBoardResultListsCards",
        "GetBoardResultLists",
        "GetBoardResultOwner",
        "GetBoardResult",
      ])

      orderedSchemas(set).forEach((schema, position) => {
        for (const f of schema.fields) {
          if (f.listOf === undefined) continue
          const childPosition = names.indexOf(f.type.text.replace("[]", ""))
          expect(childPosition).toBeGreaterThanOrEqual(0)
          expect(childPosition).toBeLessThan(position)
        }
      })
    })
  )

  it.effect("lists child groups after scalar fields", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape(boardResponses)
      const set = buildSchemas(defaultInflection, "get_board", shape)
      expect(set?.root.fields.map((f) => [f.name, f.type.text, f.defaultLiteral])).toEqual([
        ["id", "number", undefined],
        ["title", "string", undefined],
        ["lists", "GetBoardResultLists[]", "[]"],
        ["owner", "GetBoardResultOwner[]", "[]"],
      ])
      expect(set?.groups[1]?.fields.map((f) => f.name)).toEqual(["id", "name", "cards"])
    })
  )
})

describe("ensureUniqueFields", () => {
  it.effect("rejects a column named like a child group", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("id"), field("cards", "string"), field("cards__id")])
      const set = buildSchemas(defaultInflection, "get_board", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")
      const error = yield* Effect.flip(ensureUniqueFields("get_board", set))
      expect(error._tag).toBe("ShapeError")
      expect(error.functionName).toBe("get_board")
      expect(error.message).toBe(
        "get_board: field 'cards' of GetBoardResult is produced by both cards and cards__*"
      )
    })
  )

  it.effect("rejects columns that inflect to the same name", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("user_id"), field("userId")])
      const set = buildSchemas(defaultInflection, "get_user", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")
      const error = yield* Effect.flip(ensureUniqueFields("get_user", set))
      expect(error.message).toBe(
        "get_user: field 'userId' of GetUserResult is produced by both user_id and userId"
      )
    })
  )

  it.effect("checks fields inside groups", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("id"), field("lists__card_id"), field("lists__cardId")])
      const set = buildSchemas(defaultInflection, "get_board", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")
      const error = yield* Effect.flip(ensureUniqueFields("get_board", set))
      expect(error.message).toBe(
        "get_board: field 'cardId' of GetBoardResultLists is produced by both lists__card_id and lists__cardId"
      )
    })
  )

  it.effect("passes distinct fields through", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape(boardResponses)
      const set = buildSchemas(defaultInflection, "get_board", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")
      expect(yield* ensureUniqueFields("get_board", set)).toBe(set)
    })
  )
})

describe("renderInterface", () => {
  it.effect("prints an exported interface", () =>
    Effect.gen(function* () {
      const shape = yield* detectShape([field("id"), field("bio", "string", true)])
      const set = buildSchemas(defaultInflection, "get_user", shape)
      if (set === undefined) return yield* Effect.dieMessage("expected schemas")
      expect(renderInterface(set.root)).toBe(
        "export interface GetUserResult {\n  id: number;\n  bio: string | null;\n}"
      )
    })
  )
})
