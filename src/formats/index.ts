export {
  EMPTY_PARSE_CONTEXT,
  type FormatName,
  type FormatSpec,
  type ParseContext,
} from './types.js'

export {
  registry,
  selectFormats,
  getFormat,
  isFormatName,
  filePattern,
  type FormatPatterns,
  type FormatSelection,
  type SelectOptions,
} from './registry.js'

export {
  tomlFormat,
  yamlFormat,
  jsonFormat,
  json5Format,
  jsoncFormat,
  hjsonFormat,
  iniFormat,
  xmlFormat,
  parseIni,
  DEFAULT_SECTION,
} from './dialects/index.js'
