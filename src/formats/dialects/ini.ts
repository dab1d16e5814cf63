import ini from 'ini'
import { getPath, isPlainObject, type PlainObject } from '../../config/merge.js'
import { joinId } from '../../schema/mapper.js'
import type { ParameterType } from '../../schema/types.js'
import type { FormatSpec, ParseContext } from '../types.js'

/**
 * Section whose options every other section inherits.
 */
export const DEFAULT_SECTION = 'DEFAULT'

const MAX_INTERPOLATION_DEPTH = 10

const INTERPOLATION_PATTERN = /\$\{([^}]*)\}/g

const TRUE_VALUES = new Set(['1', 'yes', 'true', 'on'])
const FALSE_VALUES = new Set(['0', 'no', 'false', 'off'])

/**
 * INI dialect.
 *
 * Dots in section names nest them: `[my-cli.subcommand]`. Values may
 * reference other values with `${option}` (same section or DEFAULT) or
 * `${section:option}`. INI only knows strings, so each value is converted to
 * the type of the parameter it configures; lists and mappings are written as
 * JSON.
 */
export const iniFormat: FormatSpec = {
  name: 'ini',
  patterns: ['*.ini'],
  parse: (content, context) => parseIni(content, context),
}

export function parseIni(content: string, context: ParseContext): PlainObject {
  const raw = ini.parse(content)

  const defaults = raw[DEFAULT_SECTION]
  delete raw[DEFAULT_SECTION]
  const inherited: PlainObject = isPlainObject(defaults) ? defaults : {}

  const result: PlainObject = {}
  convertSection(raw, [], raw, inherited, context, result)
  return result
}

function convertSection(
  section: PlainObject,
  path: readonly string[],
  root: PlainObject,
  inherited: PlainObject,
  context: ParseContext,
  target: PlainObject
): void {
  const isRoot = path.length === 0
  // DEFAULT options show up in every named section, unless overridden
  const options = isRoot ? section : { ...inherited, ...section }

  for (const [key, value] of Object.entries(options)) {
    if (isPlainObject(value)) {
      const child: PlainObject = {}
      target[key] = child
      convertSection(value, [...path, key], root, inherited, context, child)
      continue
    }

    const id = joinId([...path, key])
    const expanded = interpolate(value, section, root, inherited, 0)
    target[key] = coerce(expanded, context.typeOf(id), id)
  }
}

function interpolate(
  value: unknown,
  section: PlainObject,
  root: PlainObject,
  inherited: PlainObject,
  depth: number
): unknown {
  if (typeof value !== 'string' || !value.includes('${')) return value
  if (depth >= MAX_INTERPOLATION_DEPTH) {
    throw new Error(`Interpolation too deep in '${value}'`)
  }

  return value.replace(INTERPOLATION_PATTERN, (_match, reference: string) => {
    const found = lookup(reference, section, root, inherited)
    const referenced = interpolate(found.value, found.section, root, inherited, depth + 1)
    if (referenced === null) return ''
    if (Array.isArray(referenced)) return JSON.stringify(referenced)
    return String(referenced)
  })
}

function lookup(
  reference: string,
  section: PlainObject,
  root: PlainObject,
  inherited: PlainObject
): { value: unknown; section: PlainObject } {
  const separator = reference.indexOf(':')

  if (separator === -1) {
    if (hasOwn(section, reference) && !isPlainObject(section[reference])) {
      return { value: section[reference], section }
    }
    if (hasOwn(inherited, reference)) {
      return { value: inherited[reference], section }
    }
    throw new Error(`Bad interpolation reference '\${${reference}}'`)
  }

  const sectionName = reference.slice(0, separator)
  const option = reference.slice(separator + 1)
  const target =
    sectionName === DEFAULT_SECTION
      ? inherited
      : getPath(root, sectionName.split('.'))

  if (isPlainObject(target)) {
    if (hasOwn(target, option) && !isPlainObject(target[option])) {
      return { value: target[option], section: target }
    }
    if (hasOwn(inherited, option)) {
      return { value: inherited[option], section: target }
    }
  }
  throw new Error(`Bad interpolation reference '\${${reference}}'`)
}

function hasOwn(object: PlainObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key)
}

function coerce(value: unknown, type: ParameterType | undefined, id: string): unknown {
  switch (type) {
    case 'integer': {
      const text = String(value).trim()
      if (!/^[-+]?\d+$/.test(text)) {
        throw new Error(`Invalid integer for ${id}: '${text}'`)
      }
      return parseInt(text, 10)
    }
    case 'float': {
      const text = String(value).trim()
      const number = Number(text)
      if (text === '' || !Number.isFinite(number)) {
        throw new Error(`Invalid float for ${id}: '${text}'`)
      }
      return number
    }
    case 'boolean': {
      if (typeof value === 'boolean') return value
      const text = String(value).trim().toLowerCase()
      if (TRUE_VALUES.has(text)) return true
      if (FALSE_VALUES.has(text)) return false
      throw new Error(`Invalid boolean for ${id}: '${text}'`)
    }
    case 'list':
    case 'mapping': {
      if (type === 'list' && Array.isArray(value)) return value
      const parsed: unknown = JSON.parse(String(value))
      return parsed
    }
    default:
      // Untyped and string parameters keep the literal text
      if (Array.isArray(value)) return value
      return value === null ? 'null' : String(value)
  }
}
