/**
 * Module assembly
 *
 * Prints one generated query module: imports, record interfaces, the
 * parameter interface and the query function.
 */
import type { Dialect } from "../lib/dialect.js"
import { driverImport } from "../lib/dialect.js"
import { indentFragment, line, renderFragment, type Fragment, type Statement } from "../lib/statements.js"
import type { SqlBuild } from "./sql-builder.js"

export type ReturnType =
  | { readonly kind: "rowCount" }
  | { readonly kind: "record"; readonly typeName: string }
  | { readonly kind: "stream"; readonly typeName: string }

export const returnTypeSource = (returnType: ReturnType): string => {
  switch (returnType.kind) {
    case "rowCount":
      return "Promise<number>"
    case "record":
      return `Promise<${returnType.typeName}>`
    case "stream":
      return `AsyncGenerator<${returnType.typeName}>`
  }
}

export interface ModuleParts {
  readonly dialect: Dialect
  readonly runtimeModule: string
  readonly funcName: string
  readonly description?: string
  readonly returnType: ReturnType
  /** Printed interfaces, in declaration order */
  readonly declarations: readonly string[]
  /** `params` argument type, absent when the query takes none */
  readonly paramsType?: string
  /** Whether the function takes a QueryContext */
  readonly usesContext: boolean
  readonly driverTypes: readonly string[]
  readonly streams: boolean
  readonly runtime: readonly string[]
  readonly prelude: Fragment
  readonly sql: SqlBuild
  readonly guards: Fragment
  readonly execution: Fragment
  /** Object literal source for the error context passed to toDatabaseError */
  readonly errorContext: string
}

/** `const sql = ...` and `const args = ...`, or the run-time builder */
export const sqlStatements = (sql: SqlBuild): Fragment =>
  sql.static
    ? [
        line(0, `const sql = ${JSON.stringify(sql.sql)};`),
        line(0, `const args: unknown[] = [${sql.args.join(", ")}];`),
      ]
    : sql.statements

const unique = (names: readonly string[]): readonly string[] => [...new Set(names)].sort()

const renderImports = (parts: ModuleParts): readonly string[] => {
  const driver = driverImport(parts.dialect)
  const imports = [`import type { ${unique(parts.driverTypes).join(", ")} } from ${JSON.stringify(driver.source)};`]
  if (parts.streams && driver.streaming !== undefined) {
    const { name, source, isDefault } = driver.streaming
    imports.push(
      isDefault
        ? `import ${name} from ${JSON.stringify(source)};`
        : `import { ${name} } from ${JSON.stringify(source)};`
    )
  }
  imports.push(`import { ${unique(parts.runtime).join(", ")} } from ${JSON.stringify(parts.runtimeModule)};`)
  if (parts.usesContext) {
    imports.push(`import type { QueryContext } from ${JSON.stringify(parts.runtimeModule)};`)
  }
  return imports
}

const signature = (parts: ModuleParts): string => {
  const driver = driverImport(parts.dialect)
  const args = [`db: ${driver.dbType}`]
  if (parts.paramsType !== undefined) args.push(`params: ${parts.paramsType}`)
  if (parts.usesContext) args.push("ctx: QueryContext = {}")
  const keyword = parts.returnType.kind === "stream" ? "async function*" : "async function"
  return `export ${keyword} ${parts.funcName}(${args.join(", ")}): ${returnTypeSource(parts.returnType)} {`
}

/** Function body at indentation 0 */
export const functionBody = (parts: ModuleParts): Fragment => {
  const body: Statement[] = [
    ...parts.prelude,
    ...sqlStatements(parts.sql),
    ...parts.guards,
    line(0, "try {"),
    ...indentFragment(parts.execution, 1),
    line(0, "} catch (error) {"),
    line(1, `throw toDatabaseError(error, ${parts.errorContext});`),
    line(0, "}"),
  ]
  return body
}

const docComment = (description: string | undefined): readonly string[] =>
  description === undefined || description.trim() === ""
    ? []
    : [
        "/**",
        ...description
          .trim()
          .replaceAll("*/", "*\\/")
          .split("\n")
          .map((text) => ` * ${text}`.trimEnd()),
        " */",
      ]

export const renderModule = (parts: ModuleParts): string => {
  const sections = [
    renderImports(parts).join("\n"),
    ...parts.declarations,
    [
      ...docComment(parts.description),
      signature(parts),
      renderFragment(indentFragment(functionBody(parts), 1)),
      "}",
    ].join("\n"),
  ]
  return `${sections.join("\n\n")}\n`
}
