/**
 * Plain mapping, the shape of every parsed configuration level.
 */
export type PlainObject = Record<string, unknown>

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Set a value at a path in an object.
 * Creates intermediate objects as needed.
 */
export function setPath(
  obj: PlainObject,
  parts: readonly string[],
  value: unknown
): void {
  let current = obj

  for (const part of parts.slice(0, -1)) {
    const existing = current[part]
    const next: PlainObject = isPlainObject(existing) ? existing : {}
    current[part] = next
    current = next
  }

  current[parts[parts.length - 1]] = value
}

/**
 * Get the value at a path in an object.
 * Missing levels, or levels that are not objects, give undefined.
 */
export function getPath(obj: PlainObject, parts: readonly string[]): unknown {
  let current: unknown = obj

  for (const part of parts) {
    if (!isPlainObject(current)) {
      return undefined
    }
    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined
    }
    current = current[part]
  }

  return current
}
