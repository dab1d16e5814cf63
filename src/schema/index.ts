export {
  ID_SEPARATOR,
  ParameterTypeSchema,
  ParameterSpecSchema,
  CommandSpecSchema,
  type ParameterType,
  type ParameterSpec,
  type ParameterSpecInput,
  type CommandSpec,
  type CommandSpecInput,
  type ParameterNode,
  type CommandNode,
} from './types.js'

export {
  defineCommand,
  flatten,
  parameterTypes,
  project,
  joinId,
  splitId,
} from './mapper.js'
