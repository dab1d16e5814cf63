import type { ParameterNode } from '../schema/types.js'

export type EnvMapping = Record<string, string | undefined>

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  // Boolean
  if (value === 'true') return true
  if (value === 'false') return false

  // Integer
  if (/^-?\d+$/.test(value)) return parseInt(value, 10)

  // Float
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  // JSON (arrays/objects)
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Fall through to string
    }
  }

  // String
  return value
}

/**
 * Produce an environment variable name from any string.
 * Alphanumeric runs are kept, joined with underscores and uppercased:
 * `my-cli.sub` -> `MY_CLI_SUB`
 */
export function cleanEnvVarId(id: string): string {
  return id
    .split(/[^a-zA-Z0-9]+/)
    .filter(Boolean)
    .join('_')
    .toUpperCase()
}

/**
 * Merge and deduplicate environment variable names, keeping their first
 * position. Empty entries are dropped. Names are uppercased on Windows,
 * where the environment is case-insensitive.
 */
export function mergeEnvVarIds(
  ids: ReadonlyArray<string | undefined>,
  platform: NodeJS.Platform = process.platform
): string[] {
  const merged: string[] = []
  for (const id of ids) {
    if (!id) continue
    const name = platform === 'win32' ? id.toUpperCase() : id
    if (!merged.includes(name)) merged.push(name)
  }
  return merged
}

/**
 * Auto-generated variable for a parameter. Each subcommand below the root
 * extends the prefix: `app.sub.count` with prefix `APP` -> `APP_SUB_COUNT`.
 */
export function autoEnvVarId(
  param: ParameterNode,
  prefix: string | undefined
): string | undefined {
  if (!prefix || !param.autoEnv) return undefined
  const commands = param.path.slice(1, -1).map(cleanEnvVarId)
  return [prefix, ...commands, param.name.toUpperCase()].join('_')
}

/**
 * All variables bound to a parameter, explicit ones first, the
 * auto-generated one last.
 */
export function paramEnvVarIds(
  param: ParameterNode,
  prefix?: string,
  platform?: NodeJS.Platform
): string[] {
  return mergeEnvVarIds([...param.envVars, autoEnvVarId(param, prefix)], platform)
}

/**
 * Read the environment values bound to each parameter.
 * The first defined variable wins. Values are kept as raw strings; typing
 * them is the argument parser's job.
 */
export function collectEnvValues(
  params: Iterable<ParameterNode>,
  env: EnvMapping,
  prefix?: string,
  platform?: NodeJS.Platform
): Map<string, string> {
  const values = new Map<string, string>()

  for (const param of params) {
    for (const name of paramEnvVarIds(param, prefix, platform)) {
      const value = env[name]
      if (value === undefined) continue
      values.set(param.id, value)
      break
    }
  }

  return values
}
