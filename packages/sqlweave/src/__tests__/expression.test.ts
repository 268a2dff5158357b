/**
 * Expression rendering tests
 */
import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import { renderExpression, Scope } from "../codegen/expression.js"
import { Step, type Expression } from "../ir/index.js"
import { defaultInflection } from "../services/inflection.js"

const expr = (...steps: Step[]): Expression => ({ steps })
const id = (name: string) => Step.Identifier({ name })
const member = (property: string, safe = false) => Step.Member({ property, safe })
const index = (position: number, safe = false) => Step.Index({ position, safe })

const render = (expressions: readonly Expression[], scope = Scope.empty, at = 0) =>
  renderExpression(defaultInflection, expressions, at, scope)

describe("Scope", () => {
  it("resolves the innermost binding first", () => {
    const scope = Scope.empty.push("item", "item1").push("item", "item2")
    expect(scope.lookup("item")).toEqual(Option.some("item2"))
    expect(scope.pop().lookup("item")).toEqual(Option.some("item1"))
    expect(scope.pop().pop().lookup("item")).toEqual(Option.none())
  })

  it("is unchanged by push on another value", () => {
    const outer = Scope.empty.push("a", "x")
    outer.push("b", "y")
    expect(outer.depth).toBe(1)
    expect(outer.lookup("b")).toEqual(Option.none())
  })

  it("pops an empty scope to itself", () => {
    expect(Scope.empty.pop()).toBe(Scope.empty)
  })
})

describe("renderExpression", () => {
  it.effect("renders unbound roots as parameter names", () =>
    Effect.gen(function* () {
      expect(yield* render([expr(id("user_id"))])).toBe("userId")
    })
  )

  it.effect("resolves roots through the scope", () =>
    Effect.gen(function* () {
      const scope = Scope.empty.push("user", "params.user")
      expect(yield* render([expr(id("user"), member("created_at"), index(2))], scope)).toBe(
        "params.user.createdAt[2]"
      )
    })
  )

  it.effect("guards a safe member step", () =>
    Effect.gen(function* () {
      const scope = Scope.empty.push("a", "x")
      expect(yield* render([expr(id("a"), member("b"), member("c", true))], scope)).toBe(
        "x.b == null ? null : x.b.c"
      )
    })
  )

  it.effect("guards a safe index step with a length check", () =>
    Effect.gen(function* () {
      const scope = Scope.empty.push("arr", "y")
      expect(yield* render([expr(id("arr"), index(0, true))], scope)).toBe(
        "y == null || y.length <= 0 ? null : y[0]"
      )
    })
  )

  it.effect("nests guards with the innermost closest to the access", () =>
    Effect.gen(function* () {
      expect(yield* render([expr(id("a"), member("b", true), member("c", true))])).toBe(
        "a == null ? null : a.b == null ? null : a.b.c"
      )
    })
  )

  it.effect("fails for an index out of range", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(render([expr(id("a"))], Scope.empty, 3))
      expect(error.message).toBe("Expression 3 is out of range (1 expressions)")
      expect(error.exprIndex).toBe(3)
    })
  )

  it.effect("fails for an expression without steps", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(render([expr()]))
      expect(error.message).toBe("Expression 0 has no steps (1 expressions)")
    })
  )

  it.effect("fails when the first step is not an identifier", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(render([expr(member("b"))]))
      expect(error.message).toBe("Expression 0 does not start with an identifier (1 expressions)")
    })
  )
})
