/**
 * Conjure - AST Builder DSL for recast
 *
 * A small immutable API for constructing the TypeScript AST nodes the
 * generator prints: type annotations, record interfaces and the
 * null-propagating access chains of rendered expressions.
 *
 * @example
 * ```typescript
 * const access = conjure.id("params").prop("user").index(conjure.num(0)).build()
 * conjure.printInline(access) // params.user[0]
 *
 * const type = conjure.ts.union(conjure.ts.string(), conjure.ts.null())
 * conjure.printInline(type) // string | null
 * ```
 */
import recast from "recast"
import type { namedTypes as n } from "ast-types"

const b = recast.types.builders

// =============================================================================
// Type Casts
// =============================================================================

/**
 * The recast/ast-types builder signatures use kind unions that do not accept
 * the namedTypes interfaces directly. These helpers are the interop seam.
 */

/** Cast to expression for call arguments */
const asExpr = (node: n.Expression): any => node

/** Cast for member expression object */
const asMemberObj = (node: n.Expression): any => node

/** Cast for TypeScript types */
const asTSType = (node: n.TSType): any => node

/** Cast for top-level declarations */
const asDeclaration = (node: n.Declaration): any => node

// =============================================================================
// Chain Builder
// =============================================================================

/**
 * Fluent builder for property access and indexing.
 */
export interface ChainBuilder {
  /** The underlying AST node */
  readonly node: n.Expression

  /** Property access: `.name` */
  prop(name: string): ChainBuilder

  /** Computed property access: `[expr]` */
  index(expr: n.Expression): ChainBuilder

  /** Finalize and return the expression */
  build(): n.Expression
}

function createChain(start: n.Expression): ChainBuilder {
  return {
    node: start,

    prop(name) {
      return createChain(
        b.memberExpression(asMemberObj(this.node), b.identifier(name))
      )
    },

    index(expr) {
      return createChain(
        b.memberExpression(asMemberObj(this.node), asExpr(expr), true)
      )
    },

    build() {
      return this.node
    },
  }
}

// =============================================================================
// Operators
// =============================================================================

type BinaryOp = "===" | "!==" | "==" | "!=" | "<" | ">" | "<=" | ">="

/**
 * Operator helpers for building expressions.
 */
const op = {
  /** Generic binary expression */
  binary: (left: n.Expression, operator: BinaryOp, right: n.Expression) =>
    b.binaryExpression(operator, asExpr(left), asExpr(right)),

  /** Ternary/conditional expression */
  ternary: (
    test: n.Expression,
    consequent: n.Expression,
    alternate: n.Expression
  ) => b.conditionalExpression(asExpr(test), asExpr(consequent), asExpr(alternate)),

  /** Loose null check: `expr == null` */
  isNullish: (expr: n.Expression) =>
    b.binaryExpression("==", asExpr(expr), b.nullLiteral()),

  /** Logical or: `||` */
  or: (left: n.Expression, right: n.Expression) =>
    b.logicalExpression("||", asExpr(left), asExpr(right)),
} as const

// =============================================================================
// TypeScript Type Helpers
// =============================================================================

/**
 * TypeScript type node builders.
 */
const ts = {
  string: () => b.tsStringKeyword(),
  number: () => b.tsNumberKeyword(),
  boolean: () => b.tsBooleanKeyword(),
  any: () => b.tsAnyKeyword(),
  null: () => b.tsNullKeyword(),

  /** Type reference: `TypeName` or `TypeName<T>` */
  ref: (name: string, typeParams?: n.TSType[]) => {
    const ref = b.tsTypeReference(b.identifier(name))
    if (typeParams && typeParams.length > 0) {
      ref.typeParameters = b.tsTypeParameterInstantiation(
        typeParams.map(asTSType)
      )
    }
    return ref
  },

  /** Array type: `T[]` */
  array: (elementType: n.TSType) => b.tsArrayType(asTSType(elementType)),

  /** Union type: `A | B | C` */
  union: (...types: n.TSType[]) => b.tsUnionType(types.map(asTSType)),
} as const

// =============================================================================
// Declarations
// =============================================================================

export interface InterfaceMember {
  readonly name: string
  readonly type: n.TSType
  readonly optional?: boolean
}

const decl = {
  /** `export interface Name { member: T; ... }` */
  interface: (name: string, members: readonly InterfaceMember[]) => {
    const body = b.tsInterfaceBody(
      members.map((member) => {
        const signature = b.tsPropertySignature(
          b.identifier(member.name),
          b.tsTypeAnnotation(asTSType(member.type))
        )
        if (member.optional) {
          signature.optional = true
        }
        return signature
      })
    )
    return b.exportNamedDeclaration(
      asDeclaration(b.tsInterfaceDeclaration(b.identifier(name), body))
    )
  },
} as const

// =============================================================================
// Printing
// =============================================================================

const PRINT_OPTIONS = { tabWidth: 2, quote: "double" } as const

// =============================================================================
// Main API
// =============================================================================

/**
 * Conjure - AST Builder DSL
 */
export const conjure = {
  /** Start a chain from an identifier */
  id: (name: string) => createChain(b.identifier(name)),

  /** Start a chain from any expression */
  chain: (expr: n.Expression) => createChain(expr),

  /** String literal */
  str: (value: string) => b.stringLiteral(value),

  /** Numeric literal */
  num: (value: number) => b.numericLiteral(value),

  /** null */
  null: () => b.nullLiteral(),

  op,
  ts,
  decl,

  /** Print AST node to code string */
  print: (node: n.Node) => recast.print(node, PRINT_OPTIONS).code,

  /** Print an expression or type on a single line */
  printInline: (node: n.Node) =>
    recast.print(node, { ...PRINT_OPTIONS, wrapColumn: Number.MAX_SAFE_INTEGER }).code,
} as const

export default conjure
