import { describe, expect, it } from 'vitest'
import { PostgresDialect } from '../../src/dialects/postgres.js'
import { renderSql } from '../../src/generator/generator.js'
import { agg, call, col, item, lit, select, table } from '../helpers.js'
import { describeSharedDialectTests } from './sharedDialectTests.js'
import { pgConfig } from './pgConfig.js'

const dialect = new PostgresDialect()

describeSharedDialectTests(dialect, pgConfig)

function selectOne(expr: Parameters<typeof item>[0]): string {
  return renderSql(select(table('t'), { select: [item(expr, 'v')] }), dialect)
}

describe('Postgres — functions', () => {
  it('ilike', () => {
    expect(renderSql(select(table('t'), { where: [call('ilike', col('name'), lit('a%'))] }), dialect)).toBe(
      "SELECT * FROM t WHERE name ILIKE 'a%'",
    )
  })

  it('regexExtract uses SUBSTRING FROM', () => {
    expect(selectOne(call('regexExtract', col('name'), lit('[0-9]+')))).toBe(
      "SELECT SUBSTRING(name FROM '[0-9]+') AS v FROM t",
    )
  })

  it('regexReplace replaces every match', () => {
    expect(selectOne(call('regexReplace', col('name'), lit('a'), lit('b')))).toBe(
      "SELECT REGEXP_REPLACE(name, 'a', 'b', 'g') AS v FROM t",
    )
  })

  it('stringAgg aggregate', () => {
    expect(selectOne(agg('stringAgg', col('name'), lit(', ')))).toBe("SELECT STRING_AGG(name, ', ') AS v FROM t")
  })

  it('regex operator is parenthesized inside logic', () => {
    const e = call('not', call('regexMatch', col('name'), lit('^a')))
    expect(selectOne(e)).toBe("SELECT NOT (name ~ '^a') AS v FROM t")
  })
})

describe('Postgres — quoting', () => {
  it('quotes columns named after Postgres reserved words', () => {
    const node = select(table('t'), { select: [item(col('default'), 'default'), item(col('to'), 'using')] })
    expect(renderSql(node, dialect)).toBe('SELECT "default", "to" AS "using" FROM t')
  })
})
