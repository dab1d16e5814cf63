export {
  NOT_FOUND,
  type NestedDocument,
  type ConfigSource,
  type ParseResult,
} from './types.js'

export {
  parseFirstMatch,
  formatMatchers,
  matchingFormats,
  isUsableDocument,
  tryParse,
  type ParseOptions,
} from './parser.js'

export {
  fetchAndParse,
  urlFileName,
  type FetchFunction,
  type RemoteOptions,
} from './remote.js'
