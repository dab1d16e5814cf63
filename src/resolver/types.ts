import type { NestedDocument } from '../parser/types.js'
import type { ParameterNode } from '../schema/types.js'

/**
 * Where a resolved value came from, highest precedence first.
 */
export const VALUE_SOURCES = ['CLI', 'CONFIG_FILE', 'ENVIRONMENT', 'DEFAULT'] as const

export type ValueSource = (typeof VALUE_SOURCES)[number]

export interface ResolvedValue {
  id: string
  value: unknown
  source: ValueSource
}

/**
 * Values keyed by dotted id, as a Map or a plain record.
 */
export type ValueMapping = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>

export interface ResolveInput {
  schema: ReadonlyMap<string, ParameterNode>
  /** Values given explicitly on the command line. */
  cliValues?: ValueMapping
  document?: NestedDocument | null
  /** Values read from the environment variables bound to each parameter. */
  envValues?: ValueMapping
  /** Static defaults; the schema's own defaults when left out. */
  defaults?: ValueMapping
  /** Ids never read from the document. */
  excluded?: Iterable<string>
}
