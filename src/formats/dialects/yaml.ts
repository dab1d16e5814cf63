import { parse } from 'yaml'
import type { FormatSpec } from '../types.js'

export const yamlFormat: FormatSpec = {
  name: 'yaml',
  patterns: ['*.yaml', '*.yml'],
  parse: (content) => parse(content),
}
