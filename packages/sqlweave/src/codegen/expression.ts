/**
 * Expression rendering
 *
 * Turns an IR expression (identifier root + member/index steps) into a
 * TypeScript expression. Roots bound by enclosing loops resolve through the
 * Scope; anything else is taken as a parameter name.
 */
import { Effect, List, Option } from "effect"
import type { namedTypes as n } from "ast-types"
import { conjure } from "../lib/conjure.js"
import { ExpressionError } from "../errors.js"
import type { Expression, Step } from "../ir/index.js"
import type { CoreInflection } from "../services/inflection.js"

const { op } = conjure

// ============================================================================
// Scope
// ============================================================================

interface Binding {
  readonly name: string
  readonly target: string
}

/**
 * Immutable stack of name → generated identifier bindings. Lookups are
 * innermost-first.
 */
export class Scope {
  static readonly empty = new Scope(List.empty())

  private constructor(private readonly bindings: List.List<Binding>) {}

  push(name: string, target: string): Scope {
    return new Scope(List.prepend(this.bindings, { name, target }))
  }

  /** Drop the innermost binding */
  pop(): Scope {
    return List.isCons(this.bindings) ? new Scope(this.bindings.tail) : this
  }

  lookup(name: string): Option.Option<string> {
    return Option.map(
      List.findFirst(this.bindings, (binding) => binding.name === name),
      (binding) => binding.target
    )
  }

  get depth(): number {
    return List.size(this.bindings)
  }
}

// ============================================================================
// Rendering
// ============================================================================

/** `params.user` → params.user as an AST chain */
const targetExpression = (target: string): n.Expression => {
  const [head = target, ...rest] = target.split(".")
  return rest.reduce((chain, part) => chain.prop(part), conjure.id(head)).build()
}

const access = (inflection: CoreInflection, base: n.Expression, step: Step): n.Expression => {
  switch (step._tag) {
    case "Member":
      return conjure.chain(base).prop(inflection.fieldName(step.property)).build()
    case "Index":
      return conjure.chain(base).index(conjure.num(step.position)).build()
    case "Identifier":
      return conjure.id(inflection.parameterName(step.name)).build()
  }
}

/**
 * Apply the remaining steps to `base`. A safe step guards its base:
 * `base == null ? null : rest`, plus a length check for indexes.
 */
const fold = (
  inflection: CoreInflection,
  base: n.Expression,
  steps: readonly Step[]
): n.Expression => {
  const [step, ...remaining] = steps
  if (step === undefined) return base

  const rest = fold(inflection, access(inflection, base, step), remaining)
  if (step._tag === "Member" && step.safe) {
    return op.ternary(op.isNullish(base), conjure.null(), rest)
  }
  if (step._tag === "Index" && step.safe) {
    const tooShort = op.binary(
      conjure.chain(base).prop("length").build(),
      "<=",
      conjure.num(step.position)
    )
    return op.ternary(op.or(op.isNullish(base), tooShort), conjure.null(), rest)
  }
  return rest
}

const expressionError = (index: number, count: number, reason: string): ExpressionError =>
  new ExpressionError({
    message: `Expression ${index} ${reason} (${count} expressions)`,
    exprIndex: index,
    expressionCount: count,
  })

/**
 * Render expression `index` as TypeScript source.
 */
export const renderExpression = (
  inflection: CoreInflection,
  expressions: readonly Expression[],
  index: number,
  scope: Scope
): Effect.Effect<string, ExpressionError> => {
  const expression = expressions[index]
  if (expression === undefined) {
    return Effect.fail(expressionError(index, expressions.length, "is out of range"))
  }
  const [root, ...steps] = expression.steps
  if (root === undefined) {
    return Effect.fail(expressionError(index, expressions.length, "has no steps"))
  }
  if (root._tag !== "Identifier") {
    return Effect.fail(expressionError(index, expressions.length, "does not start with an identifier"))
  }

  const base = Option.match(scope.lookup(root.name), {
    onNone: () => conjure.id(inflection.parameterName(root.name)).build(),
    onSome: targetExpression,
  })
  return Effect.succeed(conjure.printInline(fold(inflection, base, steps)))
}
