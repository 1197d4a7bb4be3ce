import type { TranslationTable } from './translation.js'

export type IdentifierQuote = '"' | '`'

/**
 * - `as-needed`: bare when the name is lower-case, word-like and not reserved
 * - `always`: every identifier is quoted
 */
export type IdentifierQuoting = 'as-needed' | 'always'

/**
 * - `double`: `'it''s'`
 * - `backslash`: `'it\'s'`
 */
export type StringEscape = 'double' | 'backslash'

export interface DialectOptions {
  name: string
  identifierQuote: IdentifierQuote
  quoteIdentifiers?: IdentifierQuoting | undefined
  stringEscape?: StringEscape | undefined
  /** Lower-case words this engine reserves, on top of the ones every dialect shares. */
  reservedWords?: readonly string[] | undefined
  /** When false, window expressions never carry a `ROWS ...` frame. */
  requiresWindowFrameClause: boolean
  /** Spell distinct set operations out: `UNION DISTINCT`, `INTERSECT DISTINCT`, `EXCEPT DISTINCT`. */
  distinctSetOps?: boolean | undefined
  scalar?: TranslationTable | undefined
  aggregate?: TranslationTable | undefined
  window?: TranslationTable | undefined
}
