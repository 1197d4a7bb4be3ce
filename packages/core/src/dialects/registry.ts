import { ConfigError } from '@relsql/validation'
import { AnsiDialect } from './ansi.js'
import { BigQueryDialect } from './bigquery.js'
import { ClickHouseDialect } from './clickhouse.js'
import type { Dialect } from './dialect.js'
import { PostgresDialect } from './postgres.js'
import { TrinoDialect } from './trino.js'

export type DialectName = 'ansi' | 'postgres' | 'trino' | 'clickhouse' | 'bigquery'

// ── Dialect Singletons ─────────────────────────────────────────

export const dialects: Readonly<Record<DialectName, Dialect>> = Object.freeze({
  ansi: new AnsiDialect(),
  postgres: new PostgresDialect(),
  trino: new TrinoDialect(),
  clickhouse: new ClickHouseDialect(),
  bigquery: new BigQueryDialect(),
})

const DIALECT_NAMES = new Set<string>(Object.keys(dialects))

export function isDialectName(name: string): name is DialectName {
  return DIALECT_NAMES.has(name)
}

export function getDialect(name: string): Dialect {
  if (!isDialectName(name)) {
    throw new ConfigError([
      {
        code: 'UNKNOWN_DIALECT',
        message: `Unknown dialect '${name}'`,
        details: { dialect: name, expected: [...DIALECT_NAMES].join(' | ') },
      },
    ])
  }
  return dialects[name]
}
