import reservedWords from './reservedWords.json' with { type: 'json' }
import { sqlCast, sqlCustom, sqlPrefix } from '../translation/rules.js'
import { expectArgs } from '../translation/translator.js'
import { Dialect } from './dialect.js'

// --- Trino Dialect ---

export class TrinoDialect extends Dialect {
  constructor() {
    super({
      name: 'trino',
      identifierQuote: '"',
      requiresWindowFrameClause: true,
      reservedWords: reservedWords.trino,
      scalar: {
        regexMatch: sqlPrefix('REGEXP_LIKE', 2),
        regexExtract: sqlPrefix('REGEXP_EXTRACT', 2),
        regexReplace: sqlPrefix('REGEXP_REPLACE', 3),
        toFloat: sqlCast('DOUBLE'),
      },
      aggregate: {
        median: sqlCustom((args, ctx) => {
          const [x] = expectArgs(args, ctx, 1)
          return `APPROX_PERCENTILE(${x}, 0.5)`
        }),
      },
    })
  }
}
