import Hjson from 'hjson'
import JSON5 from 'json5'
import stripJsonComments from 'strip-json-comments'
import type { FormatSpec } from '../types.js'

export const jsonFormat: FormatSpec = {
  name: 'json',
  patterns: ['*.json'],
  parse: (content) => JSON.parse(content),
}

export const json5Format: FormatSpec = {
  name: 'json5',
  patterns: ['*.json5'],
  parse: (content) => JSON5.parse(content),
}

// JSON with comments and trailing commas
export const jsoncFormat: FormatSpec = {
  name: 'jsonc',
  patterns: ['*.jsonc'],
  parse: (content) =>
    JSON.parse(stripJsonComments(content, { trailingCommas: true })),
}

// Human JSON: optional quotes, braces and commas, with comments
export const hjsonFormat: FormatSpec = {
  name: 'hjson',
  patterns: ['*.hjson'],
  parse: (content) => Hjson.parse(content),
}
