import reservedWords from './reservedWords.json' with { type: 'json' }
import { sqlCast, sqlCustom, sqlPrefix, sqlUnsupported } from '../translation/rules.js'
import { expectArgs } from '../translation/translator.js'
import { Dialect } from './dialect.js'

const NO_WINDOW_AGGREGATE = 'only the cumulative form (cumsum, cummean, cummin, cummax) is available over a window'

// --- BigQuery Dialect ---

/**
 * BigQuery takes no `ROWS` frame on window aggregates, so plain windowed
 * aggregates are refused and running aggregates render without a frame.
 */
export class BigQueryDialect extends Dialect {
  constructor() {
    super({
      name: 'bigquery',
      identifierQuote: '`',
      stringEscape: 'backslash',
      reservedWords: reservedWords.bigquery,
      requiresWindowFrameClause: false,
      distinctSetOps: true,
      scalar: {
        // Casts
        toBoolean: sqlCast('BOOL'),
        toInteger: sqlCast('INT64'),
        toFloat: sqlCast('FLOAT64'),
        toString: sqlCast('STRING'),

        mod: sqlPrefix('MOD', 2),

        // Date / time
        currentDate: sqlPrefix('CURRENT_DATE', 0),
        currentTimestamp: sqlPrefix('CURRENT_TIMESTAMP', 0),

        // Regular expressions
        regexMatch: sqlPrefix('REGEXP_CONTAINS', 2),
        regexExtract: sqlPrefix('REGEXP_EXTRACT', 2),
        regexReplace: sqlPrefix('REGEXP_REPLACE', 3),
      },
      aggregate: {
        sd: sqlPrefix('STDDEV', 1),
        var: sqlPrefix('VARIANCE', 1),
        median: sqlCustom((args, ctx) => {
          const [x] = expectArgs(args, ctx, 1)
          return `APPROX_QUANTILES(${x}, 2)[OFFSET(1)]`
        }),
      },
      window: {
        mean: sqlUnsupported(NO_WINDOW_AGGREGATE),
        sum: sqlUnsupported(NO_WINDOW_AGGREGATE),
        min: sqlUnsupported(NO_WINDOW_AGGREGATE),
        max: sqlUnsupported(NO_WINDOW_AGGREGATE),
        count: sqlUnsupported(NO_WINDOW_AGGREGATE),
      },
    })
  }
}
