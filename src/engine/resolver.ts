import { ZodError } from 'zod'
import { collectEnvValues } from '../config/env.js'
import { defaultSearchPattern } from '../config/paths.js'
import { readSettings } from '../config/settings.js'
import type { PlainObject } from '../config/merge.js'
import { SchemaDefinitionError } from '../errors.js'
import { filePattern, selectFormats } from '../formats/registry.js'
import type { FormatSpec, ParseContext } from '../formats/types.js'
import { locate, isRemoteLocation } from '../locator/locator.js'
import { createLogger, type DiagnosticLogger } from '../logging/logger.js'
import { parseFirstMatch } from '../parser/parser.js'
import { fetchAndParse } from '../parser/remote.js'
import { NOT_FOUND, type ConfigSource, type NestedDocument, type ParseResult } from '../parser/types.js'
import { compilePattern } from '../pattern/compiler.js'
import { defaultFileFlags, defaultSearchFlags, type PatternFlag } from '../pattern/flags.js'
import { resolve, toDefaultMap } from '../resolver/precedence.js'
import type { ResolvedValue } from '../resolver/types.js'
import { flatten, joinId } from '../schema/mapper.js'
import type { CommandNode, ParameterNode } from '../schema/types.js'
import { assertStrict } from '../validator/strict.js'
import {
  DEFAULT_EXCLUDED_PARAMS,
  ResolverSettingsSchema,
  type ResolveRequest,
  type ResolverDefinition,
  type ResolverSettings,
} from './options.js'

export type StrictOutcome = 'disabled' | 'passed' | 'no_document'

/**
 * Outcome of one resolution pass.
 */
export interface ResolutionResult {
  /** One value per parameter, with its provenance. */
  values: Map<string, ResolvedValue>
  /** Resolved values nested under the root command, ready to install as defaults. */
  defaults: PlainObject
  /** The whole parsed document, including keys no parameter uses. */
  document: NestedDocument | null
  /** Where the document came from; null when no configuration was found. */
  source: ConfigSource | null
  /** Pattern or URL searched; null when configuration files were skipped. */
  location: string | null
  strict: StrictOutcome
}

/**
 * Resolves the defaults of a command's parameters from configuration
 * files, environment variables and the command line.
 *
 * Built once when the command is defined; `resolve()` runs once per
 * invocation and keeps no state between calls.
 */
export class ConfigResolver {
  readonly command: CommandNode
  readonly params: ReadonlyMap<string, ParameterNode>
  readonly formats: readonly FormatSpec[]
  readonly excluded: ReadonlySet<string>
  readonly defaultLocation: string

  private readonly settings: ResolverSettings
  private readonly searchFlags: PatternFlag[]
  private readonly fileFlags: PatternFlag[]
  private readonly context: ParseContext

  constructor(private readonly definition: ResolverDefinition) {
    this.settings = parseSettings(definition)
    this.command = definition.command
    this.params = flatten(definition.command)
    this.formats = selectFormats(definition.formats, {
      keepUnspecified: this.settings.keepUnspecifiedFormats,
    })
    this.excluded = this.buildExclusions(definition.excluded)
    this.searchFlags = [...(definition.searchFlags ?? defaultSearchFlags())]
    this.fileFlags = [...(definition.fileFlags ?? defaultFileFlags())]
    this.defaultLocation =
      this.settings.defaultLocation ??
      defaultSearchPattern(this.command.name, this.filePattern, definition.appDir)

    const params = this.params
    this.context = {
      typeOf: (id) => params.get(id)?.type,
    }
  }

  /**
   * All file patterns of the enabled formats, joined with `|`.
   */
  get filePattern(): string {
    return filePattern(this.formats)
  }

  /**
   * Run one resolution pass.
   *
   * Throws InvalidPatternError for a malformed search pattern and
   * StrictViolationError when strict mode rejects the document. Every other
   * problem with configuration files ends up as "no configuration found".
   */
  async resolve(request: ResolveRequest = {}): Promise<ResolutionResult> {
    const env = request.env ?? process.env
    const { settings: engine, ignored } = readSettings(env)
    const logger = this.definition.logger ?? createLogger({ level: engine.logLevel })
    for (const { variable, value, message } of ignored) {
      logger.warn({ variable, value }, `Ignoring ${variable}: ${message}`)
    }
    const fetchTimeout = this.settings.fetchTimeout ?? engine.fetchTimeout

    let location: string | null = null
    let found: ParseResult = NOT_FOUND

    if (request.noConfig) {
      logger.debug('Skip configuration file loading altogether')
    } else {
      location = request.location ?? this.defaultLocation
      found = await this.load(location, request, logger, fetchTimeout)
    }

    let strict: StrictOutcome = this.settings.strict ? 'no_document' : 'disabled'
    if (found.found && this.settings.strict) {
      assertStrict(found.document, this.params.keys(), this.excluded)
      strict = 'passed'
    }

    const envValues = collectEnvValues(this.params.values(), env, this.settings.autoEnvPrefix)

    const values = resolve({
      schema: this.params,
      cliValues: request.cliValues,
      document: found.found ? found.document : null,
      envValues,
      excluded: this.excluded,
    })

    return {
      values,
      defaults: toDefaultMap(values, this.command.name),
      document: found.found ? found.document : null,
      source: found.found ? found.source : null,
      location,
      strict,
    }
  }

  private async load(
    location: string,
    request: ResolveRequest,
    logger: DiagnosticLogger,
    fetchTimeout: number
  ): Promise<ParseResult> {
    const explicit = request.location !== undefined
    if (explicit) {
      logger.info({ location }, `Load configuration matching ${location}`)
    } else {
      logger.debug({ location }, `Load configuration matching ${location}`)
    }

    let result: ParseResult
    if (isRemoteLocation(location)) {
      result = await fetchAndParse(location, this.formats, {
        timeout: fetchTimeout,
        fetch: this.definition.fetch,
        fileFlags: this.fileFlags,
        context: this.context,
        logger,
      })
    } else {
      const pattern = compilePattern(location, this.searchFlags)
      const candidates = locate(pattern, {
        cwd: request.cwd,
        searchParents: this.settings.searchParents,
        logger,
      })
      result = parseFirstMatch(candidates, this.formats, {
        fileFlags: this.fileFlags,
        context: this.context,
        logger,
      })
    }

    if (result.found) {
      logger.debug(
        { location: result.source.location, format: result.source.format },
        'Configuration loaded'
      )
    } else if (explicit) {
      logger.warn({ location }, 'No configuration file found')
    } else {
      logger.debug({ location }, 'No configuration file found')
    }

    return result
  }

  private buildExclusions(excluded: Iterable<string> | undefined): Set<string> {
    const ids = new Set<string>()

    for (const param of this.params.values()) {
      if (param.excluded) ids.add(param.id)
    }

    if (excluded === undefined) {
      for (const name of DEFAULT_EXCLUDED_PARAMS) {
        ids.add(joinId([this.command.name, name]))
      }
      return ids
    }

    for (const id of excluded) {
      if (!this.params.has(id)) {
        throw new SchemaDefinitionError(
          `Excluded parameter '${id}' does not exist in command '${this.command.name}'`,
          'excluded'
        )
      }
      ids.add(id)
    }
    return ids
  }
}

/**
 * Define a resolver and run a single pass.
 */
export async function resolveConfiguration(
  definition: ResolverDefinition,
  request: ResolveRequest = {}
): Promise<ResolutionResult> {
  return new ConfigResolver(definition).resolve(request)
}

function parseSettings(definition: ResolverDefinition): ResolverSettings {
  try {
    return ResolverSettingsSchema.parse({
      defaultLocation: definition.defaultLocation,
      strict: definition.strict,
      searchParents: definition.searchParents,
      keepUnspecifiedFormats: definition.keepUnspecifiedFormats,
      fetchTimeout: definition.fetchTimeout,
      autoEnvPrefix: definition.autoEnvPrefix,
    })
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0]
      const field = issue.path.join('.')
      throw new SchemaDefinitionError(`Invalid resolver option '${field}': ${issue.message}`, field)
    }
    throw error
  }
}
