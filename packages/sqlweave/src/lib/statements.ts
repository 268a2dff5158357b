/**
 * Generated statements
 *
 * Function bodies are built as flat lists of lines with an explicit
 * indentation level, so nesting can be checked without comparing whitespace.
 */

export interface Statement {
  readonly indent: number
  readonly text: string
}

export type Fragment = readonly Statement[]

export const INDENT_UNIT = "  "

export const line = (indent: number, text: string): Statement => ({ indent, text })

/** Shift every statement of a fragment by `levels` */
export const indentFragment = (fragment: Fragment, levels: number): Fragment =>
  fragment.map((s) => ({ indent: s.indent + levels, text: s.text }))

export const renderStatement = (s: Statement): string =>
  s.text.length === 0 ? "" : INDENT_UNIT.repeat(s.indent) + s.text

export const renderFragment = (fragment: Fragment): string =>
  fragment.map(renderStatement).join("\n")
