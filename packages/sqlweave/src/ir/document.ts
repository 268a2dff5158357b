/**
 * IR document schema and decoder
 *
 * Query documents are JSON files written by the upstream SQL parser and
 * optimizer. Field names follow the producer's snake_case; decoding maps
 * them onto the camelCase QueryDefinition model.
 */
import { Effect, Schema as S, pipe } from "effect";
import { IrDecodeError } from "../errors.js";
import {
  Instruction,
  Step,
  type QueryDefinition,
  type WhereSafetyMetadata,
} from "./query-ir.js";

// ============================================================================
// Document schema
// ============================================================================

const ExprIndex = S.NonNegativeInt;

const StepDocument = S.Union(
  S.Struct({ kind: S.Literal("identifier"), name: S.String }),
  S.Struct({
    kind: S.Literal("member"),
    property: S.String,
    safe: S.optionalWith(S.Boolean, { default: () => false }),
  }),
  S.Struct({
    kind: S.Literal("index"),
    index: S.NonNegativeInt,
    safe: S.optionalWith(S.Boolean, { default: () => false }),
  }),
);

const InstructionDocument = S.Union(
  S.Struct({ op: S.Literal("EMIT_STATIC"), value: S.String }),
  S.Struct({ op: S.Literal("EMIT_EVAL"), expr_index: ExprIndex }),
  S.Struct({ op: S.Literal("ADD_PARAM"), expr_index: ExprIndex }),
  S.Struct({ op: S.Literal("ADD_SYSTEM_PARAM"), system_field: S.String }),
  S.Struct({ op: S.Literal("IF"), expr_index: ExprIndex }),
  // ELSEIF is the spelling older producers emit
  S.Struct({ op: S.Literal("ELSE_IF", "ELSEIF"), expr_index: ExprIndex }),
  S.Struct({ op: S.Literal("ELSE") }),
  S.Struct({ op: S.Literal("END") }),
  S.Struct({ op: S.Literal("LOOP_START"), variable: S.String, collection_expr_index: ExprIndex }),
  S.Struct({ op: S.Literal("LOOP_END") }),
  S.Struct({ op: S.Literal("EMIT_UNLESS_BOUNDARY"), value: S.String }),
  S.Struct({ op: S.Literal("BOUNDARY") }),
);

const WhereMetaDocument = S.Struct({
  status: S.Literal("fullscan", "exists", "conditional"),
  dynamic_conditions: S.optionalWith(
    S.Array(
      S.Struct({
        expr_index: ExprIndex,
        negated_when_empty: S.optionalWith(S.Boolean, { default: () => false }),
        has_else: S.optionalWith(S.Boolean, { default: () => false }),
        description: S.optional(S.String),
      }),
    ),
    { default: () => [] },
  ),
  removal_combos: S.optionalWith(
    S.Array(S.Array(S.Struct({ expr_index: ExprIndex, when: S.Boolean }))),
    { default: () => [] },
  ),
  raw_text: S.optional(S.String),
});

/**
 * One query document as written by the IR producer.
 */
export const QueryDocument = S.Struct({
  function_name: S.NonEmptyString,
  description: S.optional(S.String),
  statement_type: S.optional(S.Literal("select", "insert", "update", "delete")),
  response_affinity: S.optionalWith(S.Literal("none", "one", "many"), {
    default: () => "none" as const,
  }),
  parameters: S.optionalWith(
    S.Array(
      S.Struct({
        name: S.NonEmptyString,
        type: S.String,
        optional: S.optionalWith(S.Boolean, { default: () => false }),
        description: S.optional(S.String),
      }),
    ),
    { default: () => [] },
  ),
  implicit_parameters: S.optionalWith(
    S.Array(S.Struct({ name: S.NonEmptyString, type: S.String, default: S.optional(S.Unknown) })),
    { default: () => [] },
  ),
  responses: S.optionalWith(
    S.Array(
      S.Struct({
        name: S.NonEmptyString,
        type: S.String,
        is_nullable: S.optionalWith(S.Boolean, { default: () => false }),
      }),
    ),
    { default: () => [] },
  ),
  instructions: S.Array(InstructionDocument),
  expressions: S.optionalWith(S.Array(S.Struct({ steps: S.Array(StepDocument) })), {
    default: () => [],
  }),
  where_meta: S.optional(WhereMetaDocument),
});

export type QueryDocument = S.Schema.Type<typeof QueryDocument>;

// ============================================================================
// Document → QueryDefinition
// ============================================================================

type StepDocument = S.Schema.Type<typeof StepDocument>;
type InstructionDocument = S.Schema.Type<typeof InstructionDocument>;

const toStep = (step: StepDocument): Step => {
  switch (step.kind) {
    case "identifier":
      return Step.Identifier({ name: step.name });
    case "member":
      return Step.Member({ property: step.property, safe: step.safe });
    case "index":
      return Step.Index({ position: step.index, safe: step.safe });
  }
};

const toInstruction = (inst: InstructionDocument): Instruction => {
  switch (inst.op) {
    case "EMIT_STATIC":
      return Instruction.EmitStatic({ text: inst.value });
    case "EMIT_EVAL":
      return Instruction.EmitEval({ exprIndex: inst.expr_index });
    case "ADD_PARAM":
      return Instruction.AddParam({ exprIndex: inst.expr_index });
    case "ADD_SYSTEM_PARAM":
      return Instruction.AddSystemParam({ field: inst.system_field });
    case "IF":
      return Instruction.If({ exprIndex: inst.expr_index });
    case "ELSE_IF":
    case "ELSEIF":
      return Instruction.ElseIf({ exprIndex: inst.expr_index });
    case "ELSE":
      return Instruction.Else();
    case "END":
      return Instruction.End();
    case "LOOP_START":
      return Instruction.LoopStart({
        variable: inst.variable,
        collectionExprIndex: inst.collection_expr_index,
      });
    case "LOOP_END":
      return Instruction.LoopEnd();
    case "EMIT_UNLESS_BOUNDARY":
      return Instruction.EmitUnlessBoundary({ text: inst.value });
    case "BOUNDARY":
      return Instruction.Boundary();
  }
};

const toWhereMeta = (
  meta: NonNullable<QueryDocument["where_meta"]>,
): WhereSafetyMetadata => ({
  status: meta.status,
  dynamicConditions: meta.dynamic_conditions.map(cond => ({
    exprIndex: cond.expr_index,
    negatedWhenEmpty: cond.negated_when_empty,
    hasElse: cond.has_else,
    description: cond.description,
  })),
  removalCombos: meta.removal_combos.map(combo =>
    combo.map(lit => ({ exprIndex: lit.expr_index, when: lit.when })),
  ),
  rawText: meta.raw_text,
});

/**
 * Map a decoded document onto the QueryDefinition model.
 */
export function toQueryDefinition(doc: QueryDocument): QueryDefinition {
  return {
    functionName: doc.function_name,
    description: doc.description,
    statementType: doc.statement_type,
    affinity: doc.response_affinity,
    parameters: doc.parameters.map(p => ({
      name: p.name,
      type: p.type,
      optional: p.optional,
      description: p.description,
    })),
    implicitParameters: doc.implicit_parameters.map(p => ({
      name: p.name,
      type: p.type,
      default: p.default,
    })),
    responses: doc.responses.map(r => ({ name: r.name, type: r.type, nullable: r.is_nullable })),
    instructions: doc.instructions.map(toInstruction),
    expressions: doc.expressions.map(expr => ({ steps: expr.steps.map(toStep) })),
    whereMeta: doc.where_meta ? toWhereMeta(doc.where_meta) : undefined,
  };
}

/**
 * Decode an unknown JSON value into a QueryDefinition.
 *
 * @param source - file path or label used in error messages
 */
export const decodeQueryDocument = (
  input: unknown,
  source: string,
): Effect.Effect<QueryDefinition, IrDecodeError> =>
  pipe(
    S.decodeUnknown(QueryDocument)(input),
    Effect.map(toQueryDefinition),
    Effect.mapError(
      parseError =>
        new IrDecodeError({
          message: `Invalid query document in ${source}`,
          source,
          errors: [parseError.message],
        }),
    ),
  );

/**
 * Parse JSON text and decode it into a QueryDefinition.
 */
export const parseQueryDocument = (
  text: string,
  source: string,
): Effect.Effect<QueryDefinition, IrDecodeError> =>
  pipe(
    Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: error =>
        new IrDecodeError({
          message: `Malformed JSON in ${source}`,
          source,
          errors: [error instanceof Error ? error.message : String(error)],
        }),
    }),
    Effect.flatMap(json => decodeQueryDocument(json, source)),
  );
