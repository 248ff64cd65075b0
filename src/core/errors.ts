/**
 * Configuration errors
 *
 * Every failure surfaced by the library extends ConfigurationError and
 * carries a machine-readable `code`, so callers can branch without
 * instanceof checks across bundles.
 */

export type ConfigurationErrorCode =
  | 'MALFORMED_KEY'
  | 'KEY_NOT_FOUND'
  | 'AMBIGUOUS_KEY'
  | 'READ_ONLY'
  | 'INTERPOLATION'
  | 'INVALID_OPTIONS'
  | 'INVALID_SOURCE'

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message)
    this.name = 'ConfigurationError'
    this.code = code
  }
}

/** The key string does not follow the key grammar. */
export class MalformedKeyError extends ConfigurationError {
  readonly key: string
  readonly position: number

  constructor(key: string, position: number, reason: string) {
    super('MALFORMED_KEY', `Malformed key '${key}' at ${String(position)}: ${reason}`)
    this.name = 'MalformedKeyError'
    this.key = key
    this.position = position
  }
}

export class KeyNotFoundError extends ConfigurationError {
  readonly key: string

  constructor(key: string) {
    super('KEY_NOT_FOUND', `No node found for key '${key}'`)
    this.name = 'KeyNotFoundError'
    this.key = key
  }
}

export class AmbiguousKeyError extends ConfigurationError {
  readonly key: string
  readonly matches: number

  constructor(key: string, matches: number) {
    super(
      'AMBIGUOUS_KEY',
      `Key '${key}' selects ${String(matches)} nodes, expected exactly one`,
    )
    this.name = 'AmbiguousKeyError'
    this.key = key
    this.matches = matches
  }
}

export class ReadOnlyConfigurationError extends ConfigurationError {
  readonly operation: string

  constructor(operation: string) {
    super('READ_ONLY', `Cannot ${operation}: configuration is read-only`)
    this.name = 'ReadOnlyConfigurationError'
    this.operation = operation
  }
}

export class InterpolationError extends ConfigurationError {
  readonly variable: string

  constructor(variable: string, message: string) {
    super('INTERPOLATION', message)
    this.name = 'InterpolationError'
    this.variable = variable
  }
}

export class InvalidOptionsError extends ConfigurationError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('INVALID_OPTIONS', `Invalid configuration options: ${issues.join('; ')}`)
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

/** A loader handed over data that does not describe a node tree. */
export class InvalidSourceError extends ConfigurationError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('INVALID_SOURCE', `Invalid node source: ${issues.join('; ')}`)
    this.name = 'InvalidSourceError'
    this.issues = issues
  }
}
