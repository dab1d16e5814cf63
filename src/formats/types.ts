import type { ParameterType } from '../schema/types.js'

export type FormatName =
  | 'toml'
  | 'yaml'
  | 'json'
  | 'json5'
  | 'jsonc'
  | 'hjson'
  | 'ini'
  | 'xml'

/**
 * What a dialect may know about the command while parsing. Only INI uses
 * it, to type values its syntax leaves as strings.
 */
export interface ParseContext {
  typeOf(id: string): ParameterType | undefined
}

/**
 * One supported configuration dialect.
 */
export interface FormatSpec {
  readonly name: FormatName
  /** File name patterns, matched against the base name of a candidate. */
  readonly patterns: readonly string[]
  /**
   * Parse raw text. Throws on syntax errors; the caller decides whether the
   * result has a usable shape.
   */
  parse(content: string, context: ParseContext): unknown
}

export const EMPTY_PARSE_CONTEXT: ParseContext = {
  typeOf: () => undefined,
}
