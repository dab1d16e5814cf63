export {
  compilePattern,
  splitAlternatives,
  toPosix,
  toNative,
  CompiledPattern,
  type CompileOptions,
} from './compiler.js'

export {
  flagSet,
  defaultSearchFlags,
  defaultFileFlags,
  isCaseInsensitivePlatform,
  type PatternFlag,
  type FlagSet,
} from './flags.js'
