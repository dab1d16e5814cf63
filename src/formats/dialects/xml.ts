import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { FormatSpec } from '../types.js'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
})

/**
 * XML dialect. The root element is the top-level key, attributes get an `@`
 * prefix, repeated elements turn into lists and every value stays a string.
 * Empty elements are null.
 */
export const xmlFormat: FormatSpec = {
  name: 'xml',
  patterns: ['*.xml'],
  parse: (content) => {
    const validation = XMLValidator.validate(content)
    if (validation !== true) {
      const { msg, line, col } = validation.err
      throw new Error(`${msg} (line ${line}, column ${col})`)
    }
    const parsed: unknown = parser.parse(content)
    return blankToNull(parsed)
  },
}

function blankToNull(value: unknown): unknown {
  if (value === '') return null
  if (Array.isArray(value)) return value.map(blankToNull)
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]) => [key, blankToNull(child)])
    )
  }
  return value
}
