import { setPath, type PlainObject } from '../config/merge.js'
import { project, splitId } from '../schema/mapper.js'
import type { ResolveInput, ResolvedValue, ValueMapping } from './types.js'

/**
 * Merge every value source into one value per parameter.
 *
 * Precedence, highest first:
 * 1. CLI
 * 2. Configuration document (unless the id is excluded)
 * 3. Environment variables
 * 4. Static default
 *
 * Depends on its input only; the input is never modified.
 */
export function resolve(input: ResolveInput): Map<string, ResolvedValue> {
  const { schema } = input
  const excluded = new Set(input.excluded ?? [])

  const configurable = [...schema.values()]
    .filter((param) => !param.excluded && !excluded.has(param.id))
    .map((param) => param.id)
  const fromDocument = input.document
    ? project(input.document, configurable)
    : new Map<string, unknown>()

  const resolved = new Map<string, ResolvedValue>()

  for (const [id, param] of schema) {
    const cli = lookup(input.cliValues, id)
    if (cli !== undefined) {
      resolved.set(id, { id, value: cli, source: 'CLI' })
      continue
    }

    const documentValue = fromDocument.get(id)
    if (documentValue !== undefined) {
      resolved.set(id, { id, value: documentValue, source: 'CONFIG_FILE' })
      continue
    }

    const env = lookup(input.envValues, id)
    if (env !== undefined) {
      resolved.set(id, { id, value: env, source: 'ENVIRONMENT' })
      continue
    }

    const value = input.defaults ? lookup(input.defaults, id) : param.default
    resolved.set(id, { id, value, source: 'DEFAULT' })
  }

  return resolved
}

/**
 * Nest resolved values under their command path, below the root command:
 * `my-cli.sub.count` -> `{ sub: { count: ... } }`. Parameters without a
 * value are left out.
 */
export function toDefaultMap(
  values: ReadonlyMap<string, ResolvedValue>,
  rootName: string
): PlainObject {
  const map: PlainObject = {}

  for (const { id, value } of values.values()) {
    if (value === undefined) continue
    const parts = splitId(id)
    if (parts[0] !== rootName) continue
    setPath(map, parts.slice(1), value)
  }

  return map
}

/**
 * Count the resolved values per source.
 */
export function summarizeSources(
  values: ReadonlyMap<string, ResolvedValue>
): Record<ResolvedValue['source'], number> {
  const summary = { CLI: 0, CONFIG_FILE: 0, ENVIRONMENT: 0, DEFAULT: 0 }
  for (const { source } of values.values()) {
    summary[source]++
  }
  return summary
}

function lookup(mapping: ValueMapping | undefined, id: string): unknown {
  if (!mapping) return undefined
  if (isMap(mapping)) return mapping.get(id)
  return Object.prototype.hasOwnProperty.call(mapping, id) ? mapping[id] : undefined
}

function isMap(mapping: ValueMapping): mapping is ReadonlyMap<string, unknown> {
  return mapping instanceof Map
}
