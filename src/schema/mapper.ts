import { ZodError } from 'zod'
import { SchemaDefinitionError } from '../errors.js'
import { getPath, type PlainObject } from '../config/merge.js'
import {
  CommandSpecSchema,
  ID_SEPARATOR,
  type CommandNode,
  type CommandSpec,
  type CommandSpecInput,
  type ParameterNode,
  type ParameterType,
} from './types.js'

/**
 * Join id segments: ['my-cli', 'sub', 'flag'] -> 'my-cli.sub.flag'
 */
export function joinId(parts: readonly string[]): string {
  return parts.join(ID_SEPARATOR)
}

export function splitId(id: string): string[] {
  return id.split(ID_SEPARATOR)
}

/**
 * Validate a command description and place every parameter in the tree.
 *
 * Throws SchemaDefinitionError when the description is malformed, or when
 * two parameters or subcommands of one command share a name.
 */
export function defineCommand(spec: CommandSpecInput): CommandNode {
  let parsed: CommandSpec
  try {
    parsed = CommandSpecSchema.parse(spec)
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0]
      const field = issue.path.join('.')
      throw new SchemaDefinitionError(
        `Invalid command definition at '${field}': ${issue.message}`,
        field
      )
    }
    throw error
  }

  return buildNode(parsed, [])
}

function buildNode(spec: CommandSpec, parentPath: readonly string[]): CommandNode {
  const path = [...parentPath, spec.name]
  const seen = new Set<string>()

  const claim = (name: string, kind: string): void => {
    if (seen.has(name)) {
      throw new SchemaDefinitionError(
        `Duplicate ${kind} '${name}' in command '${joinId(path)}'`,
        joinId([...path, name])
      )
    }
    seen.add(name)
  }

  const params = spec.params.map((param): ParameterNode => {
    claim(param.name, 'parameter')
    const paramPath = [...path, param.name]
    return {
      id: joinId(paramPath),
      name: param.name,
      path: paramPath,
      type: param.type,
      default: param.default,
      excluded: param.excluded,
      envVars:
        param.envVar === undefined
          ? []
          : typeof param.envVar === 'string'
            ? [param.envVar]
            : [...param.envVar],
      autoEnv: param.autoEnv,
    }
  })

  const commands = spec.commands.map((command) => {
    claim(command.name, 'subcommand')
    return buildNode(command, path)
  })

  return { name: spec.name, path, params, commands }
}

/**
 * Flatten the command tree into its parameters, keyed by dotted id.
 * Parameters of a command come before those of its subcommands.
 */
export function flatten(command: CommandNode): Map<string, ParameterNode> {
  const result = new Map<string, ParameterNode>()

  const walk = (node: CommandNode): void => {
    for (const param of node.params) {
      result.set(param.id, param)
    }
    for (const sub of node.commands) {
      walk(sub)
    }
  }

  walk(command)
  return result
}

/**
 * Expected type of every parameter, keyed by dotted id.
 */
export function parameterTypes(command: CommandNode): Map<string, ParameterType> {
  const types = new Map<string, ParameterType>()
  for (const [id, param] of flatten(command)) {
    types.set(id, param.type)
  }
  return types
}

/**
 * Pick the values of known ids out of a parsed document.
 *
 * Missing levels mean no value, and so does null (blank YAML keys, empty
 * XML elements). Keys of the document that match no id are ignored. Values
 * are returned untouched.
 */
export function project(
  document: PlainObject,
  ids: Iterable<string>
): Map<string, unknown> {
  const values = new Map<string, unknown>()

  for (const id of ids) {
    const value = getPath(document, splitId(id))
    if (value === undefined || value === null) continue
    values.set(id, value)
  }

  return values
}
