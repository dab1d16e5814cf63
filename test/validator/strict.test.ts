import { describe, it, expect } from 'vitest'
import { assertStrict, validateStrict } from '../../src/validator/strict.js'
import { StrictViolationError } from '../../src/errors.js'

const known = ['my-cli.flag', 'my-cli.sub.count', 'my-cli.env']

describe('validateStrict', () => {
  it('accepts documents with known keys only', () => {
    const document = { 'my-cli': { flag: true, sub: { count: 3 } } }
    expect(validateStrict(document, known)).toEqual({ ok: true })
  })

  it('reports the first unknown leaf', () => {
    const document = { 'my-cli': { flag: true, sub: { count: 3, extra: 1 }, other: 2 } }
    expect(validateStrict(document, known)).toEqual({
      ok: false,
      key: 'extra',
      id: 'my-cli.sub.extra',
    })
  })

  it('reports unknown top-level keys', () => {
    expect(validateStrict({ other: 1 }, known)).toEqual({ ok: false, key: 'other', id: 'other' })
  })

  it('does not look inside a mapping-valued parameter', () => {
    const document = { 'my-cli': { env: { ANY: '1', NESTED: { x: 1 } } } }
    expect(validateStrict(document, known)).toEqual({ ok: true })
  })

  it('treats an empty mapping as a leaf', () => {
    expect(validateStrict({ 'my-cli': { unknown: {} } }, known)).toEqual({
      ok: false,
      key: 'unknown',
      id: 'my-cli.unknown',
    })
  })

  it('allows excluded ids', () => {
    const document = { 'my-cli': { config: '/x.toml' } }
    expect(validateStrict(document, known, ['my-cli.config'])).toEqual({ ok: true })
  })

  it('accepts an empty document', () => {
    expect(validateStrict({}, known)).toEqual({ ok: true })
  })
})

describe('assertStrict', () => {
  it('throws with the offending key and id', () => {
    const document = { 'my-cli': { sub: { blah: 1 } } }
    expect(() => assertStrict(document, known)).toThrow(StrictViolationError)
    expect(() => assertStrict(document, known)).toThrow(
      "Parameter 'blah' found in configuration but not in the command schema (my-cli.sub.blah)."
    )
  })
})
