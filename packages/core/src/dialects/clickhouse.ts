import reservedWords from './reservedWords.json' with { type: 'json' }
import { sqlPrefix } from '../translation/rules.js'
import { Dialect } from './dialect.js'

// --- ClickHouse Dialect ---

export class ClickHouseDialect extends Dialect {
  constructor() {
    super({
      name: 'clickhouse',
      identifierQuote: '`',
      stringEscape: 'backslash',
      reservedWords: reservedWords.clickhouse,
      requiresWindowFrameClause: true,
      distinctSetOps: true,
      scalar: {
        // Casts
        toBoolean: sqlPrefix('toBool', 1),
        toInteger: sqlPrefix('toInt64', 1),
        toFloat: sqlPrefix('toFloat64', 1),
        toString: sqlPrefix('toString', 1),
        toDate: sqlPrefix('toDate', 1),

        // Strings
        concat: sqlPrefix('concat'),
        length: sqlPrefix('lengthUTF8', 1),
        regexMatch: sqlPrefix('match', 2),
        regexExtract: sqlPrefix('extract', 2),
        regexReplace: sqlPrefix('replaceRegexpAll', 3),

        // Date / time
        currentDate: sqlPrefix('today', 0),
        currentTimestamp: sqlPrefix('now', 0),
      },
      aggregate: {
        countDistinct: sqlPrefix('uniqExact', 1),
        sd: sqlPrefix('stddevSamp', 1),
        var: sqlPrefix('varSamp', 1),
        median: sqlPrefix('median', 1),
      },
    })
  }
}
