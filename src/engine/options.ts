import { z } from 'zod'
import type { AppDirOptions } from '../config/paths.js'
import type { EnvMapping } from '../config/env.js'
import type { FormatSelection } from '../formats/registry.js'
import type { DiagnosticLogger } from '../logging/logger.js'
import type { FetchFunction } from '../parser/remote.js'
import type { PatternFlag } from '../pattern/flags.js'
import type { ValueMapping } from '../resolver/types.js'
import type { CommandNode } from '../schema/types.js'

/**
 * Parameters never read from a configuration file, relative to the root
 * command: the config option itself cannot load another file, and the
 * others stop the command before it runs.
 */
export const DEFAULT_EXCLUDED_PARAMS = ['config', 'help', 'show_params', 'version'] as const

// Scalar settings of a resolver, checked when it is defined
export const ResolverSettingsSchema = z.object({
  defaultLocation: z.string().min(1).optional(),
  strict: z.boolean().default(false),
  searchParents: z.boolean().default(false),
  keepUnspecifiedFormats: z.boolean().default(false),
  fetchTimeout: z.number().int().positive().optional(),
  autoEnvPrefix: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable prefix')
    .optional(),
})

export type ResolverSettings = z.infer<typeof ResolverSettingsSchema>

/**
 * Everything fixed when the command is defined.
 */
export interface ResolverDefinition {
  command: CommandNode
  /** Search pattern or URL used when the invocation gives none. */
  defaultLocation?: string
  formats?: FormatSelection
  keepUnspecifiedFormats?: boolean
  searchFlags?: Iterable<PatternFlag>
  fileFlags?: Iterable<PatternFlag>
  searchParents?: boolean
  /** Dotted ids to ignore in configuration files. */
  excluded?: Iterable<string>
  strict?: boolean
  autoEnvPrefix?: string
  appDir?: AppDirOptions
  fetchTimeout?: number
  fetch?: FetchFunction
  logger?: DiagnosticLogger
}

/**
 * Everything known only when the command runs.
 */
export interface ResolveRequest {
  /** Search pattern or URL given by the user. */
  location?: string
  /** Skip configuration files altogether. */
  noConfig?: boolean
  cliValues?: ValueMapping
  env?: EnvMapping
  cwd?: string
}
