import { describe, expect, it } from 'vitest'
import type { Expr, QueryNode, SelectQuery } from '../src/types/ir.js'
import { validateNode } from '../src/validation/nodeValidator.js'

// --- Helpers ---

function table(name: string): QueryNode {
  return { kind: 'identifier', name }
}

function col(name: string, tableAlias?: string): Expr {
  return { kind: 'column', name, table: tableAlias }
}

function select(from: QueryNode, overrides: Partial<SelectQuery> = {}): SelectQuery {
  return {
    kind: 'select',
    from,
    select: [],
    where: [],
    groupBy: [],
    having: [],
    orderBy: [],
    distinct: false,
    ...overrides,
  }
}

function codes(node: QueryNode): string[] {
  return validateNode(node)?.errors.map((e) => e.code) ?? []
}

// --- Valid trees ---

describe('validateNode — valid trees', () => {
  it('accepts leaves', () => {
    expect(validateNode(table('analytics.events'))).toBeNull()
    expect(validateNode({ kind: 'sql', text: 'SELECT 1' })).toBeNull()
  })

  it('accepts a full select over a join', () => {
    const node = select(
      {
        kind: 'join',
        x: table('orders'),
        y: table('customers'),
        vars: [{ alias: 'id', x: 'customer_id', y: 'id' }, { alias: 'name', y: 'name' }],
        type: 'left',
        by: [{ x: 'customer_id', y: 'id' }],
      },
      {
        select: [
          { expr: col('id'), alias: 'id' },
          { expr: { kind: 'aggregate', fn: 'count', args: [] }, alias: 'n' },
        ],
        where: [{ kind: 'call', fn: 'gt', args: [col('id'), { kind: 'literal', value: 0 }] }],
        groupBy: [col('id')],
        having: [{ kind: 'sql', text: 'COUNT(*) > 1' }],
        orderBy: [{ expr: col('id'), direction: 'desc' }],
        limit: 0,
        distinct: true,
      },
    )
    expect(validateNode(node)).toBeNull()
  })

  it('accepts an empty join key list', () => {
    const node: QueryNode = { kind: 'join', x: table('a'), y: table('b'), vars: [], type: 'inner', by: [] }
    expect(validateNode(node)).toBeNull()
  })
})

// --- Leaves ---

describe('validateNode — leaves', () => {
  it('rejects an empty identifier segment', () => {
    const err = validateNode(table('a..b'))
    expect(err?.code).toBe('MALFORMED_NODE')
    expect(err?.errors).toEqual([
      {
        code: 'EMPTY_IDENTIFIER',
        message: 'Identifier at $ has an empty name segment',
        details: { path: '$', actual: "'a..b'" },
      },
    ])
  })

  it('rejects blank raw SQL', () => {
    expect(validateNode({ kind: 'sql', text: '   ' })?.errors[0]).toEqual({
      code: 'EMPTY_SQL',
      message: 'Raw SQL at $ is empty',
      details: { path: '$' },
    })
  })
})

// --- SELECT ---

describe('validateNode — select', () => {
  it('reports the path of a nested problem', () => {
    const err = validateNode(select(select(table(''))))
    expect(err?.errors[0]?.details.path).toBe('$.from.from')
  })

  it('rejects a negative limit', () => {
    expect(validateNode(select(table('t'), { limit: -1 }))?.errors[0]).toEqual({
      code: 'INVALID_LIMIT',
      message: 'Limit at $ must be a non-negative integer, got -1',
      details: { path: '$', expected: 'non-negative integer', actual: '-1' },
    })
  })

  it('rejects a fractional limit', () => {
    expect(codes(select(table('t'), { limit: 1.5 }))).toEqual(['INVALID_LIMIT'])
  })

  it('rejects an empty select alias', () => {
    const node = select(table('t'), { select: [{ expr: col('a'), alias: '' }] })
    expect(validateNode(node)?.errors[0]?.message).toBe('Select item at $.select[0] has an empty alias')
  })

  it('rejects a repeated select alias', () => {
    const node = select(table('t'), {
      select: [
        { expr: col('a'), alias: 'a' },
        { expr: col('b'), alias: 'a' },
      ],
    })
    expect(validateNode(node)?.errors).toEqual([
      {
        code: 'DUPLICATE_ALIAS',
        message: "Select item at $.select[1] repeats alias 'a'",
        details: { path: '$.select[1]', actual: 'a' },
      },
    ])
  })

  it('rejects an unknown order direction', () => {
    // @ts-expect-error intentional: unknown direction
    const node = select(table('t'), { orderBy: [{ expr: col('a'), direction: 'up' }] })
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_DIRECTION',
      message: "Order key at $.orderBy[0] has direction 'up'",
      details: { path: '$.orderBy[0]', expected: 'asc | desc', actual: "'up'" },
    })
  })
})

// --- Expressions ---

describe('validateNode — expressions', () => {
  it('rejects a function name that is not an identifier', () => {
    const node = select(table('t'), { where: [{ kind: 'call', fn: 'drop table', args: [] }] })
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_FUNCTION_NAME',
      message: "Function name at $.where[0] must match ^[A-Za-z_][A-Za-z0-9_]*$, got 'drop table'",
      details: { path: '$.where[0]', fn: "'drop table'" },
    })
  })

  it('rejects a non-finite literal inside a window call', () => {
    const node = select(table('t'), {
      select: [
        {
          expr: {
            kind: 'window',
            fn: 'lag',
            args: [col('x'), { kind: 'literal', value: Number.POSITIVE_INFINITY }],
            partitionBy: [],
            orderBy: [],
          },
          alias: 'prev',
        },
      ],
    })
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_LITERAL',
      message: 'Literal at $.select[0].expr.args[1] must be a finite number, got Infinity',
      details: { path: '$.select[0].expr.args[1]', actual: 'Infinity' },
    })
  })

  it('rejects an empty column name', () => {
    const node = select(table('t'), { groupBy: [col('', 't')] })
    expect(validateNode(node)?.errors[0]?.details.path).toBe('$.groupBy[0]')
    expect(codes(node)).toEqual(['INVALID_COLUMN'])
  })

  it('checks window partition and order keys', () => {
    const node = select(table('t'), {
      select: [
        {
          expr: {
            kind: 'window',
            fn: 'rowNumber',
            args: [],
            partitionBy: [{ kind: 'sql', text: '' }],
            orderBy: [{ expr: col(''), direction: 'asc' }],
          },
          alias: 'rn',
        },
      ],
    })
    expect(validateNode(node)?.errors.map((e) => e.details.path)).toEqual([
      '$.select[0].expr.partitionBy[0]',
      '$.select[0].expr.orderBy[0].expr',
    ])
  })
})

// --- Joins ---

describe('validateNode — joins', () => {
  it('rejects an unknown join type', () => {
    // @ts-expect-error intentional: cross is not a join type
    const node: QueryNode = { kind: 'join', x: table('a'), y: table('b'), vars: [], type: 'cross', by: [] }
    expect(codes(node)).toEqual(['INVALID_JOIN_TYPE'])
  })

  it('rejects a join var with no column on either side', () => {
    const node: QueryNode = {
      kind: 'join',
      x: table('a'),
      y: table('b'),
      vars: [{ alias: 'id' }],
      type: 'inner',
      by: [],
    }
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_JOIN_VAR',
      message: 'Join var at $.vars[0] names no column on either side',
      details: { path: '$.vars[0]' },
    })
  })

  it('rejects a join key with a blank side', () => {
    const node: QueryNode = {
      kind: 'semiJoin',
      x: table('a'),
      y: table('b'),
      anti: false,
      by: [{ x: 'id', y: '' }],
    }
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_JOIN_KEY',
      message: 'Join key at $.by[0] needs a column on both sides',
      details: { path: '$.by[0]', actual: "'id' = ''" },
    })
  })

  it('rejects an empty side alias', () => {
    const node: QueryNode = {
      kind: 'semiJoin',
      x: table('a'),
      y: table('b'),
      anti: true,
      by: [],
      as: { x: '' },
    }
    expect(validateNode(node)?.errors[0]).toEqual({
      code: 'INVALID_ALIAS',
      message: 'Side alias at $.as.x is empty',
      details: { path: '$.as.x' },
    })
  })
})

// --- Set operations ---

describe('validateNode — set operations', () => {
  it('rejects an ordered operand', () => {
    const node: QueryNode = {
      kind: 'setOp',
      x: select(table('a'), { orderBy: [{ expr: col('id'), direction: 'asc' }] }),
      y: table('b'),
      type: 'union',
    }
    expect(validateNode(node)?.errors).toEqual([
      {
        code: 'INVALID_SET_OP_OPERAND',
        message: 'Set operand at $.x uses ORDER BY or LIMIT and cannot stand as a compound member',
        details: { path: '$.x' },
      },
    ])
  })

  it('rejects a limited operand of a nested set operation', () => {
    const inner: QueryNode = { kind: 'setOp', x: table('a'), y: select(table('b'), { limit: 5 }), type: 'except' }
    const node: QueryNode = { kind: 'setOp', x: table('c'), y: inner, type: 'unionAll' }
    expect(validateNode(node)?.errors[0]?.details.path).toBe('$.y.y')
  })

  it('accepts an ordered select nested below an operand', () => {
    const ordered = select(table('a'), { orderBy: [{ expr: col('id'), direction: 'asc' }], limit: 10 })
    const node: QueryNode = { kind: 'setOp', x: select(ordered), y: table('b'), type: 'intersect' }
    expect(validateNode(node)).toBeNull()
  })

  it('rejects an unknown set operation', () => {
    // @ts-expect-error intentional: unknown set operation
    const node: QueryNode = { kind: 'setOp', x: table('a'), y: table('b'), type: 'minus' }
    expect(codes(node)).toEqual(['INVALID_SET_OP'])
  })
})

// --- Collection ---

describe('validateNode — collection', () => {
  it('reports every problem in one error', () => {
    const node = select(table(''), {
      select: [{ expr: { kind: 'call', fn: '1bad', args: [] }, alias: '' }],
      limit: -3,
    })
    const err = validateNode(node)
    expect(err?.message).toBe('Malformed node: 4 errors')
    expect(err?.errors.map((e) => e.code)).toEqual([
      'INVALID_LIMIT',
      'INVALID_ALIAS',
      'INVALID_FUNCTION_NAME',
      'EMPTY_IDENTIFIER',
    ])
  })
})
