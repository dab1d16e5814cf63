import { isPlainObject } from '../config/merge.js'
import { StrictViolationError } from '../errors.js'
import type { NestedDocument } from '../parser/types.js'
import { joinId } from '../schema/mapper.js'

export type StrictResult =
  | { ok: true }
  | {
      ok: false
      /** Local key of the offending leaf. */
      key: string
      /** Full dotted path of the offending leaf. */
      id: string
    }

/**
 * Look for the first leaf of the document that maps to no known parameter.
 *
 * Leaves are visited depth-first in key order; an empty mapping counts as a
 * leaf. The walk stops at the first violation.
 */
export function validateStrict(
  document: NestedDocument,
  known: Iterable<string>,
  excluded: Iterable<string> = []
): StrictResult {
  const allowed = new Set([...known, ...excluded])
  const violation = firstViolation(document, [], allowed)
  return violation ?? { ok: true }
}

/**
 * Same as validateStrict, but throws StrictViolationError.
 */
export function assertStrict(
  document: NestedDocument,
  known: Iterable<string>,
  excluded: Iterable<string> = []
): void {
  const result = validateStrict(document, known, excluded)
  if (!result.ok) {
    throw new StrictViolationError(result.key, result.id)
  }
}

function firstViolation(
  node: NestedDocument,
  path: readonly string[],
  allowed: ReadonlySet<string>
): StrictResult | undefined {
  for (const [key, value] of Object.entries(node)) {
    const childPath = [...path, key]
    const id = joinId(childPath)

    if (isPlainObject(value) && Object.keys(value).length > 0) {
      // A known or excluded id covers everything below it
      if (allowed.has(id)) continue
      const found = firstViolation(value, childPath, allowed)
      if (found) return found
      continue
    }

    if (!allowed.has(id)) {
      return { ok: false, key, id }
    }
  }

  return undefined
}
