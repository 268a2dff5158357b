/**
 * SQL builder lowering
 *
 * Walks the instruction stream once. Streams without control flow collapse
 * into one SQL string and an argument list known at generation time; any
 * conditional or loop turns the stream into statements that assemble
 * `sqlParts` and `args` at run time.
 */
import { Effect } from "effect"
import type { ExpressionError } from "../errors.js"
import type { Expression, Instruction } from "../ir/index.js"
import { numberedPlaceholders, placeholder, runtimePlaceholder, type Dialect } from "../lib/dialect.js"
import { line, type Fragment, type Statement } from "../lib/statements.js"
import type { CoreInflection } from "../services/inflection.js"
import { renderExpression, type Scope } from "./expression.js"

export const PLACEHOLDER_MARKER = "?"

export type SqlBuild =
  | { readonly static: true; readonly sql: string; readonly args: readonly string[] }
  | { readonly static: false; readonly statements: Fragment }

export interface SqlBuilderOptions {
  readonly dialect: Dialect
  readonly inflection: CoreInflection
  readonly expressions: readonly Expression[]
  /** Scope that resolves roots before loops bind anything */
  readonly scope: Scope
  /** Local variable holding a resolved system field */
  readonly systemLocal: (field: string) => string
}

type Frame =
  | { readonly kind: "if" }
  | { readonly kind: "for"; readonly index: string; readonly items: string }

// ============================================================================
// Helpers
// ============================================================================

/** Control flow forces run-time assembly */
export const isDynamic = (instructions: readonly Instruction[]): boolean =>
  instructions.some(
    (inst) =>
      inst._tag === "If" ||
      inst._tag === "ElseIf" ||
      inst._tag === "Else" ||
      inst._tag === "LoopStart" ||
      inst._tag === "LoopEnd"
  )

/** Pad a bare AND/OR delimiter with single spaces */
export const padBoundaryToken = (text: string): string => {
  const trimmed = text.trim()
  if (trimmed === "") return text
  const upper = trimmed.toUpperCase()
  return upper === "AND" || upper === "OR" ? ` ${trimmed} ` : text
}

/**
 * A delimiter outside loops is dropped when nothing can follow it: the next
 * instruction closes a block or a parenthesis, resets the boundary, or the
 * stream ends.
 */
export const skipsDelimiter = (instructions: readonly Instruction[], position: number): boolean => {
  const next = instructions[position + 1]
  if (next === undefined) return true
  switch (next._tag) {
    case "EmitStatic":
      return next.text.trim().startsWith(")")
    case "End":
    case "Boundary":
      return true
    default:
      return false
  }
}

/** Whether a `boundaryNeeded` flag is read anywhere outside loops */
const usesBoundaryFlag = (instructions: readonly Instruction[]): boolean => {
  let depth = 0
  return instructions.some((inst, position) => {
    if (inst._tag === "LoopStart") depth++
    if (inst._tag === "LoopEnd") depth--
    return inst._tag === "EmitUnlessBoundary" && depth === 0 && !skipsDelimiter(instructions, position)
  })
}

const countMarkers = (text: string): number => text.split(PLACEHOLDER_MARKER).length - 1

const replaceMarkers = (text: string, next: () => string): string =>
  text.split(PLACEHOLDER_MARKER).reduce((acc, part, i) => (i === 0 ? part : acc + next() + part), "")

const escapeTemplate = (text: string): string =>
  text.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${")

/**
 * Source of a string expression for `text`. Numbered placeholders are
 * computed from the arguments pushed so far.
 */
const fragmentSource = (dialect: Dialect, text: string): string => {
  if (!numberedPlaceholders(dialect) || countMarkers(text) === 0) {
    return JSON.stringify(text)
  }
  let k = 0
  const body = replaceMarkers(escapeTemplate(text), () => runtimePlaceholder(dialect, `args.length + ${++k}`))
  return `\`${body}\``
}

const innermostLoop = (stack: readonly Frame[]) => {
  for (let i = stack.length - 1; i >= 0; i--) {
    const frame = stack[i]
    if (frame?.kind === "for") return frame
  }
  return undefined
}

// ============================================================================
// Static path
// ============================================================================

const buildStatic = (
  options: SqlBuilderOptions,
  instructions: readonly Instruction[]
): Effect.Effect<SqlBuild, ExpressionError> =>
  Effect.gen(function* () {
    const { dialect, inflection, expressions, scope } = options
    let counter = 0
    let sql = ""
    let boundaryNeeded = false
    const args: string[] = []
    const nextPlaceholder = () => placeholder(dialect, ++counter)

    for (const [position, inst] of instructions.entries()) {
      switch (inst._tag) {
        case "EmitStatic":
          sql += replaceMarkers(padBoundaryToken(inst.text), nextPlaceholder)
          boundaryNeeded = true
          break
        case "EmitEval":
          args.push(yield* renderExpression(inflection, expressions, inst.exprIndex, scope))
          sql += nextPlaceholder()
          boundaryNeeded = true
          break
        case "AddParam":
          args.push(yield* renderExpression(inflection, expressions, inst.exprIndex, scope))
          break
        case "AddSystemParam":
          args.push(options.systemLocal(inst.field))
          break
        case "EmitUnlessBoundary":
          if (boundaryNeeded && !skipsDelimiter(instructions, position)) {
            sql += padBoundaryToken(inst.text)
          }
          break
        case "Boundary":
          boundaryNeeded = false
          break
        default:
          return yield* Effect.dieMessage(`${inst._tag} at instruction ${position} has no open block`)
      }
    }

    return { static: true as const, sql, args }
  })

// ============================================================================
// Dynamic path
// ============================================================================

const buildDynamic = (
  options: SqlBuilderOptions,
  instructions: readonly Instruction[]
): Effect.Effect<SqlBuild, ExpressionError> =>
  Effect.gen(function* () {
    const { dialect, inflection, expressions } = options
    const statements: Statement[] = []
    const stack: Frame[] = []
    const trackBoundary = usesBoundaryFlag(instructions)
    let indent = 0
    let loops = 0
    let scope = options.scope

    const emit = (text: string) => statements.push(line(indent, text))
    const render = (exprIndex: number) => renderExpression(inflection, expressions, exprIndex, scope)
    const markContent = () => {
      if (trackBoundary) emit("boundaryNeeded = true;")
    }
    const malformed = (position: number, reason: string) =>
      Effect.dieMessage(`Malformed instruction stream at ${position}: ${reason}`)

    emit("const sqlParts: string[] = [];")
    emit("const args: unknown[] = [];")
    if (trackBoundary) emit("let boundaryNeeded = false;")

    for (const [position, inst] of instructions.entries()) {
      switch (inst._tag) {
        case "EmitStatic": {
          emit(`sqlParts.push(${fragmentSource(dialect, padBoundaryToken(inst.text))});`)
          markContent()
          break
        }
        case "EmitEval": {
          const value = yield* render(inst.exprIndex)
          emit(`sqlParts.push(${fragmentSource(dialect, PLACEHOLDER_MARKER)});`)
          emit(`args.push(${value});`)
          markContent()
          break
        }
        case "AddParam": {
          emit(`args.push(${yield* render(inst.exprIndex)});`)
          break
        }
        case "AddSystemParam": {
          emit(`args.push(${options.systemLocal(inst.field)});`)
          break
        }
        case "If": {
          emit(`if (${yield* render(inst.exprIndex)}) {`)
          stack.push({ kind: "if" })
          indent++
          break
        }
        case "ElseIf": {
          if (stack[stack.length - 1]?.kind !== "if") {
            return yield* malformed(position, "ELSE_IF without IF")
          }
          const condition = yield* render(inst.exprIndex)
          indent--
          emit(`} else if (${condition}) {`)
          indent++
          break
        }
        case "Else": {
          if (stack[stack.length - 1]?.kind !== "if") {
            return yield* malformed(position, "ELSE without IF")
          }
          indent--
          emit("} else {")
          indent++
          break
        }
        case "End": {
          if (stack.pop()?.kind !== "if") {
            return yield* malformed(position, "END does not close an IF")
          }
          indent--
          emit("}")
          break
        }
        case "LoopStart": {
          const collection = yield* render(inst.collectionExprIndex)
          loops++
          const items = `items${loops}`
          const index = `index${loops}`
          // the Item suffix keeps loop variables apart from items<n>/index<n>
          const item = `${inflection.safeIdentifier(inflection.camelCase(inst.variable))}Item${loops}`
          emit(`const ${items} = toArray(${collection});`)
          emit(`for (const [${index}, ${item}] of ${items}.entries()) {`)
          stack.push({ kind: "for", index, items })
          scope = scope.push(inst.variable, item)
          indent++
          break
        }
        case "LoopEnd": {
          if (stack.pop()?.kind !== "for") {
            return yield* malformed(position, "LOOP_END does not close a LOOP_START")
          }
          scope = scope.pop()
          indent--
          emit("}")
          break
        }
        case "EmitUnlessBoundary": {
          const loop = innermostLoop(stack)
          if (loop === undefined && skipsDelimiter(instructions, position)) break
          emit(
            loop === undefined
              ? "if (boundaryNeeded) {"
              : `if (${loop.index} < ${loop.items}.length - 1) {`
          )
          statements.push(line(indent + 1, `sqlParts.push(${JSON.stringify(padBoundaryToken(inst.text))});`))
          emit("}")
          break
        }
        case "Boundary": {
          if (trackBoundary) emit("boundaryNeeded = false;")
          break
        }
      }
    }

    if (stack.length > 0) {
      return yield* malformed(instructions.length, `${stack.length} unclosed block(s)`)
    }

    emit('const sql = sqlParts.join("");')
    return { static: false as const, statements }
  })

/**
 * Lower an instruction stream into SQL text plus arguments, either at
 * generation time or as run-time statements.
 *
 * Malformed nesting is a defect, not a failure.
 */
export const buildSql = (
  options: SqlBuilderOptions,
  instructions: readonly Instruction[]
): Effect.Effect<SqlBuild, ExpressionError> =>
  isDynamic(instructions) ? buildDynamic(options, instructions) : buildStatic(options, instructions)
