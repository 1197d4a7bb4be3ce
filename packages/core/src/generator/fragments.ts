import reservedWords from '../dialects/reservedWords.json' with { type: 'json' }

// ── Identifier / literal escaping (shared across all dialects) ─

/** Escape a double-quoted SQL identifier by doubling internal double-quotes. */
export function escapeIdentDQ(value: string): string {
  return value.replace(/"/g, '""')
}

/** Escape a backtick-quoted SQL identifier by doubling internal backticks. */
export function escapeIdentBT(value: string): string {
  return value.replace(/`/g, '``')
}

/** Standard SQL string body: `'` becomes `''`. */
export function escapeStringDouble(value: string): string {
  return value.replace(/'/g, "''")
}

const BACKSLASH_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\0': '\\x00',
}

/**
 * Backslash-style string body: `\` and `'` are backslash-escaped, and control
 * characters a literal may not hold raw become `\n`, `\r`, `\t` and `\x00`.
 */
export function escapeStringBackslash(value: string): string {
  return value.replace(/[\\'\n\r\t\0]/g, (ch) => BACKSLASH_ESCAPES[ch] ?? ch)
}

// ── Bare identifiers ───────────────────────────────────────────

/** Words reserved by every built-in dialect; each dialect adds its own. */
export const COMMON_RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords.common)

const BARE_IDENT_REGEX = /^[a-z_][a-z0-9_]*$/

/** True when `name` is word-like and not in `reserved`, so it can be emitted without quotes. */
export function isBareIdentifier(name: string, reserved: ReadonlySet<string> = COMMON_RESERVED_WORDS): boolean {
  return BARE_IDENT_REGEX.test(name) && !reserved.has(name)
}

const PLAIN_TABLE_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/

/** Raw SQL that is only a (dotted) table name and can sit in a FROM clause as is. */
export function isPlainTableName(text: string): boolean {
  return PLAIN_TABLE_NAME_REGEX.test(text)
}

/** Last segment of a dotted table name: `analytics.events` -> `events`. */
export function lastSegment(name: string): string {
  const parts = name.split('.')
  return parts[parts.length - 1] ?? name
}
