import { parse } from 'smol-toml'
import type { FormatSpec } from '../types.js'

export const tomlFormat: FormatSpec = {
  name: 'toml',
  patterns: ['*.toml'],
  parse: (content) => parse(content),
}
