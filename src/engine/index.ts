export {
  ConfigResolver,
  resolveConfiguration,
  type ResolutionResult,
  type StrictOutcome,
} from './resolver.js'

export {
  DEFAULT_EXCLUDED_PARAMS,
  ResolverSettingsSchema,
  type ResolverDefinition,
  type ResolverSettings,
  type ResolveRequest,
} from './options.js'
