// ── Enum Validation Constants ──────────────────────────────────

export const VALID_JOIN_TYPES = new Set<string>(['inner', 'left', 'right', 'full'])
export const VALID_SET_OPS = new Set<string>(['union', 'unionAll', 'intersect', 'except'])
export const VALID_DIRECTIONS = new Set<string>(['asc', 'desc'])

export const VALID_QUOTES = new Set<string>(['"', '`'])
export const VALID_QUOTING = new Set<string>(['as-needed', 'always'])
export const VALID_ESCAPES = new Set<string>(['double', 'backslash'])
export const VALID_FRAMES = new Set<string>(['none', 'cumulative', 'whole'])
export const TRANSLATION_CONTEXTS = ['scalar', 'aggregate', 'window'] as const

// ── Name / Token Patterns ──────────────────────────────────────

/** DSL function names, as they appear in calls. */
export const FUNCTION_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/

export const DIALECT_NAME_REGEX = /^[a-z][a-z0-9_-]*$/

/** SQL function names emitted by prefix and window rules; may be schema-qualified. */
export const SQL_FUNCTION_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/

/**
 * Symbolic operators (`<=`, `||`, `~`) or keyword operators (`IS NOT NULL`).
 * A symbolic operator may not open a comment (`--`, `/*`).
 */
export const SQL_OPERATOR_REGEX = /^(?:(?!.*(?:--|\/\*))[<>=!~%|&+\-*/^@#]+|[A-Za-z]+(?: [A-Za-z]+)*)$/

/** Entries of `reservedWords`: compared against bare identifiers, so lower-case. */
export const RESERVED_WORD_REGEX = /^[a-z_][a-z0-9_]*$/

/** Type names for casts: `DOUBLE PRECISION`, `VARCHAR(255)`, `Decimal(18, 4)`. */
export const SQL_TYPE_REGEX = /^[A-Za-z][A-Za-z0-9_]*(?: [A-Za-z][A-Za-z0-9_]*)*(?:\(\d+(?:, ?\d+)*\))?$/

export const SQL_KEYWORD_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(?: [A-Za-z_][A-Za-z0-9_]*)*$/

// ── Helpers ────────────────────────────────────────────────────

export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (value === undefined) return 'undefined'
  return JSON.stringify(value) ?? String(value)
}
