/**
 * Error codes raised by the engine.
 */
export type StrataErrorCode =
  | 'invalid_pattern'
  | 'strict_violation'
  | 'schema_definition'

/**
 * Base class for every error the engine lets escape.
 *
 * Recoverable conditions (missing files, unparseable candidates, network
 * failures) never surface as errors; they are logged and skipped.
 */
export class StrataError extends Error {
  constructor(
    message: string,
    public readonly code: StrataErrorCode
  ) {
    super(message)
    this.name = 'StrataError'
  }
}

/**
 * A search or file pattern could not be compiled.
 */
export class InvalidPatternError extends StrataError {
  constructor(
    message: string,
    public readonly pattern: string
  ) {
    super(`Invalid pattern '${pattern}': ${message}`, 'invalid_pattern')
    this.name = 'InvalidPatternError'
  }
}

/**
 * Strict mode found a configuration key the command does not know about.
 */
export class StrictViolationError extends StrataError {
  constructor(
    public readonly key: string,
    public readonly id: string
  ) {
    super(
      `Parameter '${key}' found in configuration but not in the command schema (${id}).`,
      'strict_violation'
    )
    this.name = 'StrictViolationError'
  }
}

/**
 * The embedding CLI described its parameters or engine options incorrectly.
 * Raised while the command is being defined, never during an invocation.
 */
export class SchemaDefinitionError extends StrataError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'schema_definition')
    this.name = 'SchemaDefinitionError'
  }
}
