#!/usr/bin/env node
/**
 * strata-inspect: resolve the configuration of a command described in a
 * JSON file and print where every value came from.
 */

import { promises as fs } from 'fs'
import { ConfigResolver, type ResolutionResult } from '../engine/resolver.js'
import { StrataError, StrictViolationError } from '../errors.js'
import { defineCommand } from '../schema/mapper.js'
import type { CommandSpecInput } from '../schema/types.js'
import { bindCommandLine, parseArgs } from './args.js'

const VERSION = '0.1.0'

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { flags, rest } = parseArgs(argv)

  if (flags.help) {
    printHelp()
    return 0
  }

  if (flags.version) {
    console.log(VERSION)
    return 0
  }

  if (typeof flags.schema !== 'string') {
    console.error('Error: --schema <file> is required')
    printHelp()
    return 2
  }

  try {
    const spec: CommandSpecInput = JSON.parse(await fs.readFile(flags.schema, 'utf-8'))
    const command = defineCommand(spec)
    const resolver = new ConfigResolver({
      command,
      strict: flags.strict === true,
      searchParents: flags['search-parents'] === true,
      autoEnvPrefix: typeof flags['env-prefix'] === 'string' ? flags['env-prefix'] : undefined,
    })

    const bound = bindCommandLine(rest, command)
    for (const option of bound.unknown) {
      console.error(`Warning: ignoring unknown option ${option}`)
    }

    const result = await resolver.resolve({
      location: typeof flags.config === 'string' ? flags.config : undefined,
      noConfig: flags['no-config'] === true,
      cliValues: bound.cliValues,
    })

    console.log(JSON.stringify(formatResult(result), null, 2))
    return 0
  } catch (error) {
    if (error instanceof StrictViolationError) {
      console.error(`Error: ${error.message}`)
      return 2
    }
    if (error instanceof StrataError) {
      console.error(`Error: ${error.message}`)
      return 1
    }
    throw error
  }
}

/**
 * JSON-friendly view of a resolution result.
 */
export function formatResult(result: ResolutionResult): Record<string, unknown> {
  const values: Record<string, { value: unknown; source: string }> = {}
  for (const [id, resolved] of result.values) {
    values[id] = { value: resolved.value ?? null, source: resolved.source }
  }

  return {
    location: result.location,
    source: result.source,
    strict: result.strict,
    values,
    document: result.document,
  }
}

function printHelp(): void {
  console.log(`strata-inspect - show how a command's parameters get their values

Usage:
  strata-inspect --schema <file.json> [options] [-- <command line>]

Options:
  --schema <file>       JSON description of the command tree
  --config <pattern>    Configuration file, glob pattern or URL
  --no-config           Ignore configuration files
  --strict              Reject configuration keys unknown to the command
  --search-parents      Also search parent directories
  --env-prefix <name>   Prefix of auto-generated environment variables
  -h, --help            Show this help
  -v, --version         Show version
`)
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error('Fatal error:', error)
      process.exit(1)
    })
}
