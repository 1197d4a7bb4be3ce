import { describe, expect, it } from 'vitest'
import { AnsiDialect } from '../../src/dialects/ansi.js'
import { renderSql } from '../../src/generator/generator.js'
import { call, col, item, lit, select, table } from '../helpers.js'
import { ansiConfig } from './ansiConfig.js'
import { describeSharedDialectTests } from './sharedDialectTests.js'

const dialect = new AnsiDialect()

describeSharedDialectTests(dialect, ansiConfig)

describe('ANSI — quoting', () => {
  it('doubles an embedded double quote', () => {
    expect(renderSql(table('my"table'), dialect)).toBe('SELECT * FROM "my""table"')
  })

  it('quotes mixed-case and reserved column names', () => {
    const node = select(table('t'), { select: [item(col('Amount'), 'Amount'), item(col('from'), 'src')] })
    expect(renderSql(node, dialect)).toBe('SELECT "Amount", "from" AS src FROM t')
  })

  it('leaves identifiers with digits and underscores bare', () => {
    const node = select(table('t_2024'), { where: [call('eq', col('_id'), lit(7))] })
    expect(renderSql(node, dialect)).toBe('SELECT * FROM t_2024 WHERE _id = 7')
  })
})
