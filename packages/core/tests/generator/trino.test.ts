import { describe, expect, it } from 'vitest'
import { TrinoDialect } from '../../src/dialects/trino.js'
import { renderSql } from '../../src/generator/generator.js'
import { call, col, item, lit, select, table } from '../helpers.js'
import { describeSharedDialectTests } from './sharedDialectTests.js'
import { trinoConfig } from './trinoConfig.js'

const dialect = new TrinoDialect()

describeSharedDialectTests(dialect, trinoConfig)

function selectOne(expr: Parameters<typeof item>[0]): string {
  return renderSql(select(table('t'), { select: [item(expr, 'v')] }), dialect)
}

describe('Trino — functions', () => {
  it('toFloat casts to DOUBLE', () => {
    expect(selectOne(call('toFloat', col('x')))).toBe('SELECT CAST(x AS DOUBLE) AS v FROM t')
  })

  it('regexExtract and regexReplace', () => {
    expect(selectOne(call('regexExtract', col('s'), lit('\\d+')))).toBe("SELECT REGEXP_EXTRACT(s, '\\d+') AS v FROM t")
    expect(selectOne(call('regexReplace', col('s'), lit('a'), lit('b')))).toBe(
      "SELECT REGEXP_REPLACE(s, 'a', 'b') AS v FROM t",
    )
  })

  it('catalog-qualified tables', () => {
    expect(renderSql(table('hive.sales.orders'), dialect)).toBe('SELECT * FROM hive.sales.orders')
  })
})
