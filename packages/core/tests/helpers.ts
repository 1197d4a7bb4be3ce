import type {
  AggregateExpr,
  CallExpr,
  ColumnExpr,
  Expr,
  Identifier,
  JoinKey,
  JoinQuery,
  LiteralExpr,
  LiteralValue,
  OrderKey,
  QueryNode,
  RawSql,
  SelectItem,
  SelectQuery,
  SemiJoinQuery,
  SetOpQuery,
  SetOpType,
  WindowExpr,
} from '@relsql/validation'

// ── Leaves ─────────────────────────────────────────────────────

export function table(name: string): Identifier {
  return { kind: 'identifier', name }
}

export function raw(text: string): RawSql {
  return { kind: 'sql', text }
}

// ── Expressions ────────────────────────────────────────────────

export function col(name: string, tableAlias?: string): ColumnExpr {
  return { kind: 'column', name, table: tableAlias }
}

export function lit(value: LiteralValue): LiteralExpr {
  return { kind: 'literal', value }
}

export function call(fn: string, ...args: Expr[]): CallExpr {
  return { kind: 'call', fn, args }
}

export function agg(fn: string, ...args: Expr[]): AggregateExpr {
  return { kind: 'aggregate', fn, args }
}

export function windowed(
  fn: string,
  args: Expr[],
  spec: { partitionBy?: Expr[]; orderBy?: OrderKey[] } = {},
): WindowExpr {
  return { kind: 'window', fn, args, partitionBy: spec.partitionBy ?? [], orderBy: spec.orderBy ?? [] }
}

export function asc(expr: Expr): OrderKey {
  return { expr, direction: 'asc' }
}

export function desc(expr: Expr): OrderKey {
  return { expr, direction: 'desc' }
}

export function item(expr: Expr, alias: string): SelectItem {
  return { expr, alias }
}

// ── Nodes ──────────────────────────────────────────────────────

export function select(from: QueryNode, overrides: Partial<Omit<SelectQuery, 'kind' | 'from'>> = {}): SelectQuery {
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

export function key(x: string, y: string = x): JoinKey {
  return { x, y }
}

export function join(
  x: QueryNode,
  y: QueryNode,
  overrides: Partial<Omit<JoinQuery, 'kind' | 'x' | 'y'>> = {},
): JoinQuery {
  return { kind: 'join', x, y, vars: [], type: 'inner', by: [key('id')], ...overrides }
}

export function semiJoin(
  x: QueryNode,
  y: QueryNode,
  overrides: Partial<Omit<SemiJoinQuery, 'kind' | 'x' | 'y'>> = {},
): SemiJoinQuery {
  return { kind: 'semiJoin', x, y, anti: false, by: [key('id')], ...overrides }
}

export function setOp(type: SetOpType, x: QueryNode, y: QueryNode): SetOpQuery {
  return { kind: 'setOp', x, y, type }
}
