import reservedWords from './reservedWords.json' with { type: 'json' }
import { Dialect } from './dialect.js'

// --- ANSI Dialect ---

/** Standard SQL with the base translation tables and no overrides. */
export class AnsiDialect extends Dialect {
  constructor() {
    super({
      name: 'ansi',
      identifierQuote: '"',
      requiresWindowFrameClause: true,
      reservedWords: reservedWords.ansi,
    })
  }
}
