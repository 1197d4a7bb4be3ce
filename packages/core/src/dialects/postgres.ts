import reservedWords from './reservedWords.json' with { type: 'json' }
import { sqlCast, sqlCustom, sqlInfix, sqlPrefix } from '../translation/rules.js'
import { expectArgs } from '../translation/translator.js'
import { Dialect } from './dialect.js'

// --- Postgres Dialect ---

export class PostgresDialect extends Dialect {
  constructor() {
    super({
      name: 'postgres',
      identifierQuote: '"',
      requiresWindowFrameClause: true,
      reservedWords: reservedWords.postgres,
      scalar: {
        ilike: sqlInfix('ILIKE'),
        regexMatch: sqlInfix('~'),
        regexExtract: sqlCustom((args, ctx) => {
          const [x, pattern] = expectArgs(args, ctx, 2)
          return `SUBSTRING(${x} FROM ${pattern})`
        }),
        // 'g' replaces every match, not only the first
        regexReplace: sqlCustom((args, ctx) => {
          const [x, pattern, replacement] = expectArgs(args, ctx, 3)
          return `REGEXP_REPLACE(${x}, ${pattern}, ${replacement}, 'g')`
        }),
        toString: sqlCast('TEXT'),
      },
      aggregate: {
        stringAgg: sqlPrefix('STRING_AGG', 2),
      },
    })
  }
}
