/**
 * Query IR - the in-memory model of one optimized query document
 *
 * Produced by the document decoder (document.ts) and consumed, read-only,
 * by every code generation stage.
 */
import { Data } from "effect"

// ============================================================================
// Expressions
// ============================================================================

/**
 * One access step of an expression.
 *
 * A `safe` step is null-propagating: when the value it is applied to is
 * null (or, for an index, too short) the rest of the chain is null.
 */
export type Step = Data.TaggedEnum<{
  Identifier: { readonly name: string }
  Member: { readonly property: string; readonly safe: boolean }
  Index: { readonly position: number; readonly safe: boolean }
}>

export const Step = Data.taggedEnum<Step>()

/** An identifier-rooted chain of steps, referenced by index from instructions */
export interface Expression {
  readonly steps: readonly Step[]
}

// ============================================================================
// Instructions
// ============================================================================

/**
 * Optimized instruction stream, consumed once, left to right.
 */
export type Instruction = Data.TaggedEnum<{
  EmitStatic: { readonly text: string }
  EmitEval: { readonly exprIndex: number }
  AddParam: { readonly exprIndex: number }
  AddSystemParam: { readonly field: string }
  If: { readonly exprIndex: number }
  ElseIf: { readonly exprIndex: number }
  Else: {}
  End: {}
  LoopStart: { readonly variable: string; readonly collectionExprIndex: number }
  LoopEnd: {}
  EmitUnlessBoundary: { readonly text: string }
  Boundary: {}
}>

export const Instruction = Data.taggedEnum<Instruction>()

// ============================================================================
// Query definition
// ============================================================================

export type StatementType = "select" | "insert" | "update" | "delete"

export type ResponseAffinity = "none" | "one" | "many"

export interface Parameter {
  readonly name: string
  readonly type: string
  readonly optional: boolean
  readonly description?: string
}

/** A system column filled from the query context rather than from the caller */
export interface ImplicitParameter {
  readonly name: string
  readonly type: string
  /** JSON literal, or a string of code when it contains `(` or `.` */
  readonly default?: unknown
}

export interface ResponseField {
  readonly name: string
  readonly type: string
  readonly nullable: boolean
}

export type WhereStatus = "fullscan" | "exists" | "conditional"

export interface DynamicCondition {
  readonly exprIndex: number
  /** The condition describes when the filter is present; its absence is unsafe */
  readonly negatedWhenEmpty: boolean
  readonly hasElse: boolean
  readonly description?: string
}

export interface RemovalLiteral {
  readonly exprIndex: number
  readonly when: boolean
}

/**
 * Which condition outcomes would leave an UPDATE/DELETE without a WHERE clause.
 */
export interface WhereSafetyMetadata {
  readonly status: WhereStatus
  readonly dynamicConditions: readonly DynamicCondition[]
  readonly removalCombos: readonly (readonly RemovalLiteral[])[]
  readonly rawText?: string
}

export interface QueryDefinition {
  readonly functionName: string
  readonly description?: string
  readonly statementType?: StatementType
  readonly affinity: ResponseAffinity
  readonly parameters: readonly Parameter[]
  readonly implicitParameters: readonly ImplicitParameter[]
  readonly responses: readonly ResponseField[]
  readonly instructions: readonly Instruction[]
  readonly expressions: readonly Expression[]
  readonly whereMeta?: WhereSafetyMetadata
}
