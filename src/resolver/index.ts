export {
  VALUE_SOURCES,
  type ValueSource,
  type ResolvedValue,
  type ResolveInput,
  type ValueMapping,
} from './types.js'

export { resolve, toDefaultMap, summarizeSources } from './precedence.js'
