import { SchemaDefinitionError } from '../errors.js'
import type { FormatName, FormatSpec } from './types.js'
import {
  tomlFormat,
  yamlFormat,
  jsonFormat,
  json5Format,
  jsoncFormat,
  hjsonFormat,
  iniFormat,
  xmlFormat,
} from './dialects/index.js'

/**
 * Every supported dialect, in priority order. When several formats match
 * the same file they are tried in this order and the first to produce a
 * usable document wins.
 */
const FORMATS: readonly FormatSpec[] = [
  tomlFormat,
  yamlFormat,
  jsonFormat,
  json5Format,
  jsoncFormat,
  hjsonFormat,
  iniFormat,
  xmlFormat,
]

/**
 * Per-format pattern overrides. Key order is the priority order.
 */
export type FormatPatterns = Partial<Record<FormatName, string | readonly string[]>>

export type FormatSelection = readonly FormatName[] | FormatPatterns

export interface SelectOptions {
  /** Append the formats left out of a name list, in registry order. */
  keepUnspecified?: boolean
}

/**
 * Get the full format table, in priority order.
 */
export function registry(): FormatSpec[] {
  return [...FORMATS]
}

export function isFormatName(name: string): name is FormatName {
  return FORMATS.some((format) => format.name === name)
}

/**
 * Get a format by name.
 */
export function getFormat(name: FormatName): FormatSpec {
  const format = FORMATS.find((candidate) => candidate.name === name)
  if (!format) {
    throw new SchemaDefinitionError(`Unknown configuration format '${name}'`, 'formats')
  }
  return format
}

/**
 * Pick and order formats.
 *
 * - A list of names keeps those formats in the given order.
 * - A mapping keeps its keys in order, each with its own file patterns; the
 *   parse function of the format is unchanged.
 */
export function selectFormats(
  selection?: FormatSelection,
  options: SelectOptions = {}
): FormatSpec[] {
  if (selection === undefined) return registry()

  const selected: FormatSpec[] = isNameList(selection)
    ? selection.map((name) => getFormat(name))
    : Object.entries(selection).map(([name, patterns]) =>
        withPatterns(name, patterns)
      )

  for (const format of selected) {
    if (selected.filter((other) => other.name === format.name).length > 1) {
      throw new SchemaDefinitionError(`Format '${format.name}' selected twice`, 'formats')
    }
  }

  if (options.keepUnspecified) {
    for (const format of FORMATS) {
      if (!selected.some((chosen) => chosen.name === format.name)) {
        selected.push(format)
      }
    }
  }

  if (selected.length === 0) {
    throw new SchemaDefinitionError('No configuration format is enabled', 'formats')
  }

  return selected
}

/**
 * All file patterns of the formats, deduplicated and joined with `|`.
 */
export function filePattern(formats: readonly FormatSpec[]): string {
  const patterns: string[] = []
  for (const format of formats) {
    for (const pattern of format.patterns) {
      if (!patterns.includes(pattern)) patterns.push(pattern)
    }
  }
  return patterns.join('|')
}

function isNameList(selection: FormatSelection): selection is readonly FormatName[] {
  return Array.isArray(selection)
}

function withPatterns(
  name: string,
  patterns: string | readonly string[] | undefined
): FormatSpec {
  if (!isFormatName(name)) {
    throw new SchemaDefinitionError(`Unknown configuration format '${name}'`, 'formats')
  }
  const base = getFormat(name)
  if (patterns === undefined) return base

  const list = typeof patterns === 'string' ? [patterns] : [...patterns]
  if (list.length === 0 || list.some((pattern) => pattern === '')) {
    throw new SchemaDefinitionError(`No pattern defined for format '${name}'`, 'formats')
  }
  if (new Set(list).size !== list.length) {
    throw new SchemaDefinitionError(`Duplicate patterns for format '${name}'`, 'formats')
  }

  return { ...base, patterns: list }
}
