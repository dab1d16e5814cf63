// Engine entry point
export * from './engine/index.js'

// Components
export * from './pattern/index.js'
export * from './formats/index.js'
export * from './locator/index.js'
export * from './parser/index.js'
export * from './schema/index.js'
export * from './resolver/index.js'
export * from './validator/index.js'

// Ambient
export * from './config/index.js'
export * from './logging/index.js'
export * from './errors.js'

// Binding helpers
export { parseArgs, bindCommandLine, type ParsedArgs, type BoundCommandLine } from './cli/args.js'
