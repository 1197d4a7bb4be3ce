import type { ExprContext } from './types/translation.js'

// --- Base Error ---

export class RelSqlError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RelSqlError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code:
    | 'INVALID_NAME'
    | 'INVALID_QUOTE'
    | 'INVALID_QUOTING'
    | 'INVALID_ESCAPE'
    | 'INVALID_FLAG'
    | 'INVALID_RESERVED_WORD'
    | 'INVALID_FUNCTION_NAME'
    | 'INVALID_RULE'
    | 'UNKNOWN_DIALECT'
  message: string
  details: {
    dialect?: string | undefined
    field?: string | undefined
    fn?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends RelSqlError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Malformed Node Error ---

export interface MalformedNodeEntry {
  code:
    | 'UNKNOWN_NODE'
    | 'UNKNOWN_EXPRESSION'
    | 'EMPTY_IDENTIFIER'
    | 'EMPTY_SQL'
    | 'INVALID_LIMIT'
    | 'INVALID_JOIN_TYPE'
    | 'INVALID_JOIN_KEY'
    | 'INVALID_JOIN_VAR'
    | 'INVALID_SET_OP'
    | 'INVALID_SET_OP_OPERAND'
    | 'INVALID_ALIAS'
    | 'DUPLICATE_ALIAS'
    | 'INVALID_DIRECTION'
    | 'INVALID_COLUMN'
    | 'INVALID_FUNCTION_NAME'
    | 'INVALID_LITERAL'
    | 'INVALID_ARGUMENTS'
  message: string
  details: {
    path?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
    fn?: string | undefined
  }
}

export class MalformedNodeError extends RelSqlError {
  declare readonly code: 'MALFORMED_NODE'
  readonly errors: readonly MalformedNodeEntry[]

  constructor(errors: readonly MalformedNodeEntry[]) {
    super('MALFORMED_NODE', `Malformed node: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'MalformedNodeError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Unsupported Function Error ---

export interface UnsupportedFunctionDetails {
  fn: string
  context: ExprContext
  dialect: string
  reason?: string | undefined
}

export class UnsupportedFunctionError extends RelSqlError {
  declare readonly code: 'UNSUPPORTED_FUNCTION'
  readonly details: UnsupportedFunctionDetails

  constructor(details: UnsupportedFunctionDetails) {
    super('UNSUPPORTED_FUNCTION', defaultUnsupportedMessage(details))
    this.name = 'UnsupportedFunctionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Alias Collision Error ---

export class AliasCollisionError extends RelSqlError {
  declare readonly code: 'ALIAS_COLLISION'
  readonly details: { alias: string }

  constructor(alias: string) {
    super('ALIAS_COLLISION', `Alias '${alias}' is already used in this FROM clause`)
    this.name = 'AliasCollisionError'
    this.details = { alias }
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof RelSqlError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function defaultUnsupportedMessage(details: UnsupportedFunctionDetails): string {
  const base = `Function '${details.fn}' is not supported in ${details.context} context by dialect '${details.dialect}'`
  return details.reason !== undefined ? `${base}: ${details.reason}` : base
}
