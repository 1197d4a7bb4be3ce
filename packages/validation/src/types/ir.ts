// --- Expressions ---

export type Expr = ColumnExpr | LiteralExpr | SqlExpr | CallExpr | AggregateExpr | WindowExpr

export interface ColumnExpr {
  readonly kind: 'column'
  readonly name: string
  readonly table?: string | undefined
}

export type LiteralValue = string | number | boolean | null

export interface LiteralExpr {
  readonly kind: 'literal'
  readonly value: LiteralValue
}

/** Pre-rendered SQL expression, emitted verbatim. */
export interface SqlExpr {
  readonly kind: 'sql'
  readonly text: string
}

export interface CallExpr {
  readonly kind: 'call'
  readonly fn: string
  readonly args: readonly Expr[]
}

export interface AggregateExpr {
  readonly kind: 'aggregate'
  readonly fn: string
  readonly args: readonly Expr[]
}

export interface WindowExpr {
  readonly kind: 'window'
  readonly fn: string
  readonly args: readonly Expr[]
  readonly partitionBy: readonly Expr[]
  readonly orderBy: readonly OrderKey[]
}

export type SortDirection = 'asc' | 'desc'

export interface OrderKey {
  readonly expr: Expr
  readonly direction: SortDirection
}

export interface SelectItem {
  readonly expr: Expr
  readonly alias: string
}

// --- Query nodes ---

export type QueryNode = SelectQuery | JoinQuery | SemiJoinQuery | SetOpQuery | Identifier | RawSql

export type QueryNodeKind = QueryNode['kind']

export interface SelectQuery {
  readonly kind: 'select'
  readonly from: QueryNode
  readonly select: readonly SelectItem[]
  /** AND-combined */
  readonly where: readonly Expr[]
  readonly groupBy: readonly Expr[]
  /** AND-combined */
  readonly having: readonly Expr[]
  readonly orderBy: readonly OrderKey[]
  readonly limit?: number | undefined
  readonly distinct: boolean
}

export type JoinType = 'inner' | 'left' | 'right' | 'full'

/** Equi-join key: column `x` of the left side equals column `y` of the right side. */
export interface JoinKey {
  readonly x: string
  readonly y: string
}

/**
 * One output column of a join. A column present on both sides (a key of a
 * full or right join) is coalesced.
 */
export interface JoinVar {
  readonly alias: string
  readonly x?: string | undefined
  readonly y?: string | undefined
}

/** Caller-chosen aliases for the two sides of a join. */
export interface SideAliases {
  readonly x?: string | undefined
  readonly y?: string | undefined
}

export interface JoinQuery {
  readonly kind: 'join'
  readonly x: QueryNode
  readonly y: QueryNode
  readonly vars: readonly JoinVar[]
  readonly type: JoinType
  readonly by: readonly JoinKey[]
  readonly as?: SideAliases | undefined
}

export interface SemiJoinQuery {
  readonly kind: 'semiJoin'
  readonly x: QueryNode
  readonly y: QueryNode
  readonly anti: boolean
  readonly by: readonly JoinKey[]
  readonly as?: SideAliases | undefined
}

export type SetOpType = 'union' | 'unionAll' | 'intersect' | 'except'

export interface SetOpQuery {
  readonly kind: 'setOp'
  readonly x: QueryNode
  readonly y: QueryNode
  readonly type: SetOpType
}

/** Table reference, optionally dot-qualified (`schema.table`). */
export interface Identifier {
  readonly kind: 'identifier'
  readonly name: string
}

/** Pre-rendered SQL, emitted verbatim. */
export interface RawSql {
  readonly kind: 'sql'
  readonly text: string
}
