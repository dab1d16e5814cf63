import { z } from 'zod'

/**
 * Separator between levels of a dotted id: `my-cli.subcommand.int_param`.
 */
export const ID_SEPARATOR = '.'

export const ParameterTypeSchema = z.enum([
  'string',
  'integer',
  'float',
  'boolean',
  'list',
  'mapping',
])

const NameSchema = z
  .string()
  .min(1)
  .regex(/^[^.\s]+$/, 'must not contain dots or whitespace')

// One option or argument of a command
export const ParameterSpecSchema = z.object({
  name: NameSchema,
  type: ParameterTypeSchema.default('string'),
  default: z.unknown().optional(),
  envVar: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
  autoEnv: z.boolean().default(true),
  excluded: z.boolean().default(false),
})

export type ParameterType = z.infer<typeof ParameterTypeSchema>
export type ParameterSpec = z.output<typeof ParameterSpecSchema>
export type ParameterSpecInput = z.input<typeof ParameterSpecSchema>

export interface CommandSpecInput {
  name: string
  params?: ParameterSpecInput[]
  commands?: CommandSpecInput[]
}

export interface CommandSpec {
  name: string
  params: ParameterSpec[]
  commands: CommandSpec[]
}

// Command tree handed over by the embedding CLI
export const CommandSpecSchema: z.ZodType<CommandSpec, z.ZodTypeDef, CommandSpecInput> =
  z.lazy(() =>
    z.object({
      name: NameSchema,
      params: z.array(ParameterSpecSchema).default([]),
      commands: z.array(CommandSpecSchema).default([]),
    })
  )

/**
 * A parameter placed in the command tree.
 */
export interface ParameterNode {
  /** Fully-qualified dotted id, root command first. */
  id: string
  name: string
  /** Id segments: command path followed by the parameter name. */
  path: readonly string[]
  type: ParameterType
  default: unknown
  /** Never read from a configuration file. */
  excluded: boolean
  /** Explicitly bound environment variables, in lookup order. */
  envVars: readonly string[]
  /** Whether the auto-generated <PREFIX>_<NAME> variable applies. */
  autoEnv: boolean
}

export interface CommandNode {
  name: string
  path: readonly string[]
  params: readonly ParameterNode[]
  commands: readonly CommandNode[]
}
