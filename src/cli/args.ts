/**
 * Argument parsing for the inspect CLI, and a minimal binder that maps a
 * command line onto a command tree.
 */

import type { CommandNode, ParameterNode } from '../schema/types.js'

export interface ParsedArgs {
  command?: string
  args: string[]
  flags: Record<string, boolean | string>
  /** Everything after a bare `--`. */
  rest: string[]
}

// Flags that never take a value
const BOOLEAN_FLAGS = new Set(['help', 'version', 'strict', 'search-parents'])

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, boolean | string> = {}
  const positional: string[] = []
  let rest: string[] = []

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (arg === '--') {
      rest = argv.slice(i + 1)
      break
    } else if (arg.startsWith('--')) {
      const key = arg.slice(2)
      if (BOOLEAN_FLAGS.has(key) || key.startsWith('no-')) {
        flags[key] = true
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
        flags[key] = argv[i + 1]
        i++
      } else {
        flags[key] = true
      }
    } else if (arg.startsWith('-')) {
      const key = arg.slice(1)
      if (key === 'h') flags.help = true
      else if (key === 'v') flags.version = true
      else flags[key] = true
    } else {
      positional.push(arg)
    }
    i++
  }

  return {
    command: positional[0],
    args: positional.slice(1),
    flags,
    rest,
  }
}

export interface BoundCommandLine {
  /** Root-to-leaf names of the invoked command. */
  commandPath: string[]
  /** Explicit values keyed by dotted id. */
  cliValues: Map<string, unknown>
  /** Options that match no parameter of the invoked command. */
  unknown: string[]
}

/**
 * Bind a command line to a command tree.
 *
 * - A positional word naming a subcommand descends into it.
 * - `--int-param 3` and `--int-param=3` set `int_param` of the current command.
 * - Boolean parameters take no value; `--no-flag` sets them to false.
 * - List parameters collect every occurrence.
 */
export function bindCommandLine(argv: string[], root: CommandNode): BoundCommandLine {
  const commandPath = [root.name]
  const cliValues = new Map<string, unknown>()
  const unknown: string[] = []
  let current = root

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (!arg.startsWith('--')) {
      const sub = current.commands.find((command) => command.name === arg)
      if (sub) {
        commandPath.push(sub.name)
        current = sub
      }
      continue
    }

    const [rawName, inline] = splitOption(arg.slice(2))
    let param = findParam(current, rawName)
    let negative = false
    if (!param && rawName.startsWith('no-')) {
      const positive = findParam(current, rawName.slice(3))
      if (positive?.type === 'boolean') {
        param = positive
        negative = true
      }
    }

    if (!param) {
      unknown.push(arg)
      continue
    }

    if (param.type === 'boolean') {
      const value = inline === undefined ? true : parseBoolean(inline)
      cliValues.set(param.id, negative ? !value : value)
      continue
    }

    let raw = inline
    if (raw === undefined && i + 1 < argv.length) {
      raw = argv[++i]
    }
    if (raw === undefined) {
      unknown.push(arg)
      continue
    }

    const value = coerce(raw, param)
    if (param.type === 'list') {
      const previous = cliValues.get(param.id)
      cliValues.set(param.id, Array.isArray(previous) ? [...previous, value] : [value])
    } else {
      cliValues.set(param.id, value)
    }
  }

  return { commandPath, cliValues, unknown }
}

function splitOption(option: string): [string, string | undefined] {
  const equals = option.indexOf('=')
  if (equals === -1) return [option, undefined]
  return [option.slice(0, equals), option.slice(equals + 1)]
}

/**
 * `--int-param` -> `int_param`
 */
function optionToName(option: string): string {
  return option.replace(/-/g, '_')
}

function findParam(command: CommandNode, option: string): ParameterNode | undefined {
  const name = optionToName(option)
  return command.params.find((param) => optionToName(param.name) === name)
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}

function coerce(raw: string, param: ParameterNode): unknown {
  switch (param.type) {
    case 'integer': {
      const value = parseInt(raw, 10)
      return Number.isNaN(value) ? raw : value
    }
    case 'float': {
      const value = parseFloat(raw)
      return Number.isNaN(value) ? raw : value
    }
    default:
      return raw
  }
}
