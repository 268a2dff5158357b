/**
 * Mutation guards
 *
 * UPDATE and DELETE statements whose WHERE clause can vanish at run time
 * (every optional filter inactive, or no WHERE at all) throw
 * UnsafeMutationError unless the caller sets `ctx.allowUnsafeMutations`.
 */
import { Effect } from "effect"
import type { ExpressionError } from "../errors.js"
import type { Expression, StatementType, WhereSafetyMetadata } from "../ir/index.js"
import { line, type Statement } from "../lib/statements.js"
import type { CoreInflection } from "../services/inflection.js"
import { renderExpression, type Scope } from "./expression.js"

export type MutationKind = "update" | "delete"

export interface Guard {
  /** Absent for a guard that always fires */
  readonly condition?: string
  readonly hint: string
}

export interface GuardOptions {
  readonly inflection: CoreInflection
  readonly expressions: readonly Expression[]
  readonly scope: Scope
  readonly funcName: string
}

export const mutationKindOf = (statementType: StatementType | undefined): MutationKind | undefined =>
  statementType === "update" || statementType === "delete" ? statementType : undefined

const SIMPLE_EXPRESSION = /^[\w$.[\]]+$/

/** Parenthesize anything that is not a plain access chain */
const group = (expr: string): string => (SIMPLE_EXPRESSION.test(expr) ? expr : `(${expr})`)

const negate = (expr: string): string => `!${group(expr)}`

const NO_WHERE_HINT = "statement has no WHERE clause"
const ALL_REMOVED_HINT = "every optional filter is inactive"

/**
 * Guards in emission order, de-duplicated by condition text.
 */
export const collectGuards = (
  meta: WhereSafetyMetadata,
  options: GuardOptions
): Effect.Effect<readonly Guard[], ExpressionError> =>
  Effect.gen(function* () {
    const render = (exprIndex: number) =>
      renderExpression(options.inflection, options.expressions, exprIndex, options.scope)
    const guards: Guard[] = []
    const seen = new Set<string>()
    const add = (guard: Guard) => {
      const key = guard.condition ?? ""
      if (seen.has(key)) return
      seen.add(key)
      guards.push(guard)
    }

    if (meta.status === "fullscan") {
      add({ hint: NO_WHERE_HINT })
    }

    for (const condition of meta.dynamicConditions) {
      if (condition.hasElse) continue
      const expr = yield* render(condition.exprIndex)
      const text = condition.negatedWhenEmpty ? negate(expr) : expr
      add({ condition: text, hint: text })
    }

    for (const combo of meta.removalCombos) {
      if (combo.length === 0) {
        add({ hint: ALL_REMOVED_HINT })
        continue
      }
      const literals: string[] = []
      for (const literal of combo) {
        const expr = yield* render(literal.exprIndex)
        literals.push(literal.when ? group(expr) : negate(expr))
      }
      const text = literals.join(" && ")
      add({ condition: text, hint: text })
    }

    return guards
  })

const throwUnsafe = (
  indent: number,
  kind: MutationKind,
  guard: Guard,
  funcName: string
): readonly Statement[] => [
  line(indent, "throw new UnsafeMutationError({"),
  line(indent + 1, `message: ${JSON.stringify(`${kind.toUpperCase()} without WHERE clause is not allowed`)},`),
  line(indent + 1, `funcName: ${JSON.stringify(funcName)},`),
  line(indent + 1, `hint: ${JSON.stringify(guard.hint)},`),
  line(indent + 1, "query: sql,"),
  line(indent + 1, `mutationKind: ${JSON.stringify(kind)},`),
  line(indent, "});"),
]

/**
 * The guard block; empty when the statement is not a mutation, has no
 * metadata, or nothing can strip its WHERE clause. Nothing is emitted after
 * the first guard that always fires.
 */
export const synthesizeGuards = (
  statementType: StatementType | undefined,
  meta: WhereSafetyMetadata | undefined,
  options: GuardOptions
): Effect.Effect<readonly Statement[], ExpressionError> =>
  Effect.gen(function* () {
    const kind = mutationKindOf(statementType)
    if (kind === undefined || meta === undefined) return []

    const guards = yield* collectGuards(meta, options)
    if (guards.length === 0) return []

    const body: Statement[] = []
    for (const guard of guards) {
      if (guard.condition === undefined) {
        body.push(...throwUnsafe(1, kind, guard, options.funcName))
        break
      }
      body.push(line(1, `if (${guard.condition}) {`))
      body.push(...throwUnsafe(2, kind, guard, options.funcName))
      body.push(line(1, "}"))
    }

    return [line(0, "if (!ctx.allowUnsafeMutations) {"), ...body, line(0, "}")]
  })
