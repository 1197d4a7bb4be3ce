import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type { DialectOptions } from './types/dialect.js'
import type { TranslationRule, TranslationTable } from './types/translation.js'
import {
  DIALECT_NAME_REGEX,
  describeValue,
  FUNCTION_NAME_REGEX,
  RESERVED_WORD_REGEX,
  SQL_FUNCTION_REGEX,
  SQL_KEYWORD_REGEX,
  SQL_OPERATOR_REGEX,
  SQL_TYPE_REGEX,
  TRANSLATION_CONTEXTS,
  VALID_ESCAPES,
  VALID_FRAMES,
  VALID_QUOTES,
  VALID_QUOTING,
} from './validation/rules.js'

// --- Dialect Options Validation ---

export function validateDialectOptions(options: DialectOptions): ConfigError | null {
  const errors: ConfigErrorEntry[] = []
  const dialect = options.name

  if (typeof options.name !== 'string' || !DIALECT_NAME_REGEX.test(options.name)) {
    errors.push({
      code: 'INVALID_NAME',
      message: `Dialect name must match ^[a-z][a-z0-9_-]*$, got ${describeValue(options.name)}`,
      details: { field: 'name', actual: describeValue(options.name) },
    })
  }

  if (!VALID_QUOTES.has(options.identifierQuote)) {
    errors.push({
      code: 'INVALID_QUOTE',
      message: `Dialect '${dialect}': identifierQuote must be '"' or '\`', got ${describeValue(options.identifierQuote)}`,
      details: { dialect, field: 'identifierQuote', actual: describeValue(options.identifierQuote) },
    })
  }

  if (options.quoteIdentifiers !== undefined && !VALID_QUOTING.has(options.quoteIdentifiers)) {
    errors.push({
      code: 'INVALID_QUOTING',
      message: `Dialect '${dialect}': quoteIdentifiers must be 'as-needed' or 'always', got ${describeValue(options.quoteIdentifiers)}`,
      details: { dialect, field: 'quoteIdentifiers', actual: describeValue(options.quoteIdentifiers) },
    })
  }

  if (options.stringEscape !== undefined && !VALID_ESCAPES.has(options.stringEscape)) {
    errors.push({
      code: 'INVALID_ESCAPE',
      message: `Dialect '${dialect}': stringEscape must be 'double' or 'backslash', got ${describeValue(options.stringEscape)}`,
      details: { dialect, field: 'stringEscape', actual: describeValue(options.stringEscape) },
    })
  }

  if (typeof options.requiresWindowFrameClause !== 'boolean') {
    errors.push({
      code: 'INVALID_FLAG',
      message: `Dialect '${dialect}': requiresWindowFrameClause must be a boolean`,
      details: {
        dialect,
        field: 'requiresWindowFrameClause',
        expected: 'boolean',
        actual: describeValue(options.requiresWindowFrameClause),
      },
    })
  }

  if (options.distinctSetOps !== undefined && typeof options.distinctSetOps !== 'boolean') {
    errors.push({
      code: 'INVALID_FLAG',
      message: `Dialect '${dialect}': distinctSetOps must be a boolean`,
      details: { dialect, field: 'distinctSetOps', expected: 'boolean', actual: describeValue(options.distinctSetOps) },
    })
  }

  if (options.reservedWords !== undefined) {
    if (!Array.isArray(options.reservedWords)) {
      errors.push({
        code: 'INVALID_RESERVED_WORD',
        message: `Dialect '${dialect}': reservedWords must be an array of strings`,
        details: { dialect, field: 'reservedWords', expected: 'string[]', actual: describeValue(options.reservedWords) },
      })
    } else {
      for (const word of options.reservedWords) {
        if (typeof word === 'string' && RESERVED_WORD_REGEX.test(word)) continue
        errors.push({
          code: 'INVALID_RESERVED_WORD',
          message: `Dialect '${dialect}': reserved word must match ^[a-z_][a-z0-9_]*$, got ${describeValue(word)}`,
          details: { dialect, field: 'reservedWords', actual: describeValue(word) },
        })
      }
    }
  }

  // --- Translation tables ---
  for (const context of TRANSLATION_CONTEXTS) {
    const table: TranslationTable | undefined = options[context]
    if (table === undefined) continue
    for (const [fn, rule] of Object.entries(table)) {
      if (!FUNCTION_NAME_REGEX.test(fn)) {
        errors.push({
          code: 'INVALID_FUNCTION_NAME',
          message: `Dialect '${dialect}': ${context} function name '${fn}' must match ^[A-Za-z_][A-Za-z0-9_]*$`,
          details: { dialect, field: context, fn },
        })
      }
      const problem = ruleProblem(rule)
      if (problem !== null) {
        errors.push({
          code: 'INVALID_RULE',
          message: `Dialect '${dialect}': ${context} rule for '${fn}' ${problem}`,
          details: { dialect, field: context, fn },
        })
      }
    }
  }

  if (errors.length === 0) {
    return null
  }

  return new ConfigError(errors)
}

// --- Helpers ---

function ruleProblem(rule: TranslationRule): string | null {
  switch (rule.kind) {
    case 'prefix':
      if (!SQL_FUNCTION_REGEX.test(rule.name)) return `has an invalid function name ${describeValue(rule.name)}`
      if (rule.arity !== undefined && !(Number.isInteger(rule.arity) && rule.arity >= 0)) {
        return `has an invalid arity ${describeValue(rule.arity)}`
      }
      return null
    case 'infix':
    case 'unary':
    case 'postfix':
      return SQL_OPERATOR_REGEX.test(rule.op) ? null : `has an invalid operator ${describeValue(rule.op)}`
    case 'cast':
      return SQL_TYPE_REGEX.test(rule.type) ? null : `has an invalid type ${describeValue(rule.type)}`
    case 'keyword':
      return SQL_KEYWORD_REGEX.test(rule.text) ? null : `has an invalid keyword ${describeValue(rule.text)}`
    case 'window':
      if (!SQL_FUNCTION_REGEX.test(rule.name)) return `has an invalid function name ${describeValue(rule.name)}`
      return VALID_FRAMES.has(rule.frame) ? null : `has an invalid frame ${describeValue(rule.frame)}`
    case 'custom':
      if (typeof rule.render !== 'function') return 'has no render function'
      if (rule.operator !== undefined && typeof rule.operator !== 'boolean') {
        return `has a non-boolean operator flag ${describeValue(rule.operator)}`
      }
      return null
    case 'unsupported':
      return null
    default: {
      const unknown: never = rule
      return `has an unknown kind in ${describeValue(unknown)}`
    }
  }
}
