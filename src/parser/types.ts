import type { PlainObject } from '../config/merge.js'
import type { FormatName } from '../formats/types.js'

/**
 * Parsed content of one configuration source: string keys mapping to
 * scalars, lists or nested documents.
 */
export type NestedDocument = PlainObject

/**
 * Where the winning document came from.
 */
export interface ConfigSource {
  /** Absolute file path, or the URL as given. */
  location: string
  kind: 'file' | 'url'
  format: FormatName
}

export type ParseResult =
  | { found: true; document: NestedDocument; source: ConfigSource }
  | { found: false }

export const NOT_FOUND: ParseResult = { found: false }
