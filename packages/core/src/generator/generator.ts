import type {
  DebugLogEntry,
  JoinKey,
  JoinQuery,
  JoinType,
  JoinVar,
  QueryNode,
  RenderResult,
  SelectItem,
  SelectQuery,
  SemiJoinQuery,
  SetOpQuery,
  SetOpType,
} from '@relsql/validation'
import { MalformedNodeError, validateNode } from '@relsql/validation'
import { debugEntry, withDebugLog } from '../debug/logger.js'
import type { Dialect } from '../dialects/dialect.js'
import type { AliasedFrom } from './aliasing.js'
import { AliasCounter, AliasScope, subquery } from './aliasing.js'
import { renderExpr, renderOperand, renderOrderKey } from './expressions.js'

// ── Public Types ───────────────────────────────────────────────

export interface RenderOptions {
  /** Render a complete statement (default) rather than a FROM-clause fragment. */
  readonly root?: boolean | undefined
}

export interface GenerateOptions extends RenderOptions {
  readonly debug?: boolean | undefined
}

// ── Entry Points ───────────────────────────────────────────────

export function renderSql(node: QueryNode, dialect: Dialect, options: RenderOptions = {}): string {
  return generateSql(node, dialect, options).sql
}

export function generateSql(node: QueryNode, dialect: Dialect, options: GenerateOptions = {}): RenderResult {
  const log: DebugLogEntry[] = []
  const debug = options.debug === true

  // 1. Validate
  const t0 = Date.now()
  const err = validateNode(node)
  if (err !== null) throw err
  if (debug) log.push(debugEntry('validation', 'Validated', Date.now() - t0))

  // 2. Render
  const t1 = Date.now()
  const gen = new SqlGenerator(dialect, debug ? log : undefined)
  const sql = gen.render(node, options.root ?? true)
  if (debug) log.push(debugEntry('rendering', `Rendered (${dialect.name})`, Date.now() - t1, { sql, dialect: dialect.name }))

  return withDebugLog({ sql, dialect: dialect.name }, debug, log)
}

// ── Keywords ───────────────────────────────────────────────────

const JOIN_KEYWORDS: Record<JoinType, string> = {
  inner: 'INNER JOIN',
  left: 'LEFT JOIN',
  right: 'RIGHT JOIN',
  full: 'FULL JOIN',
}

const SET_OP_KEYWORDS: Record<SetOpType, string> = {
  union: 'UNION',
  unionAll: 'UNION ALL',
  intersect: 'INTERSECT',
  except: 'EXCEPT',
}

const DEFAULT_LEFT_ALIAS = 'lhs'
const DEFAULT_RIGHT_ALIAS = 'rhs'

// ── Internal generator ─────────────────────────────────────────

class SqlGenerator {
  private readonly dialect: Dialect
  private readonly counter = new AliasCounter()
  private readonly log: DebugLogEntry[] | undefined

  constructor(dialect: Dialect, log: DebugLogEntry[] | undefined) {
    this.dialect = dialect
    this.log = log
  }

  render(node: QueryNode, root: boolean): string {
    switch (node.kind) {
      case 'identifier': {
        const table = this.dialect.quoteTable(node.name)
        return root ? `SELECT * FROM ${table}` : table
      }
      case 'sql':
        return node.text
      case 'select':
        return this.select(node)
      case 'join':
        return this.join(node)
      case 'semiJoin':
        return this.semiJoin(node)
      case 'setOp':
        return this.setOp(node)
      default: {
        const unknown: never = node
        throw new MalformedNodeError([
          {
            code: 'UNKNOWN_NODE',
            message: 'Unknown node',
            details: { actual: JSON.stringify(unknown) },
          },
        ])
      }
    }
  }

  // --- SELECT ---

  private select(q: SelectQuery): string {
    const scope = new AliasScope(this.counter)
    const from = this.alias(scope, q.from, this.render(q.from, false))

    const clauses: string[] = []
    clauses.push(this.selectClause(q))
    clauses.push(`FROM ${from.from}`)

    if (q.where.length > 0) {
      clauses.push(`WHERE ${this.predicates(q.where)}`)
    }

    if (q.groupBy.length > 0) {
      clauses.push(`GROUP BY ${q.groupBy.map((e) => renderExpr(e, this.dialect)).join(', ')}`)
    }

    if (q.having.length > 0) {
      clauses.push(`HAVING ${this.predicates(q.having)}`)
    }

    if (q.orderBy.length > 0) {
      clauses.push(`ORDER BY ${q.orderBy.map((o) => renderOrderKey(o, this.dialect)).join(', ')}`)
    }

    if (q.limit !== undefined) {
      clauses.push(`LIMIT ${String(q.limit)}`)
    }

    return clauses.join(' ')
  }

  private selectClause(q: SelectQuery): string {
    const items = q.select.length === 0 ? '*' : q.select.map((item) => this.selectItem(item)).join(', ')
    const distinct = q.distinct ? 'DISTINCT ' : ''
    return `SELECT ${distinct}${items}`
  }

  private selectItem(item: SelectItem): string {
    const sql = renderExpr(item.expr, this.dialect)
    if (item.expr.kind === 'column' && item.expr.name === item.alias) {
      return sql
    }
    return `${sql} AS ${this.dialect.quoteIdent(item.alias)}`
  }

  /** AND-combine; operator and raw SQL predicates are parenthesized once there is more than one. */
  private predicates(exprs: SelectQuery['where']): string {
    if (exprs.length === 1 && exprs[0] !== undefined) {
      return renderExpr(exprs[0], this.dialect)
    }
    return exprs.map((e) => renderOperand(e, this.dialect)).join(' AND ')
  }

  // --- JOIN ---

  private join(q: JoinQuery): string {
    const scope = new AliasScope(this.counter)
    const left = this.alias(scope, q.x, this.render(q.x, false), q.as?.x ?? DEFAULT_LEFT_ALIAS)
    const right = this.alias(scope, q.y, this.render(q.y, false), q.as?.y ?? DEFAULT_RIGHT_ALIAS)

    const vars = q.vars.length === 0 ? '*' : q.vars.map((v) => this.joinVar(v, left.name, right.name)).join(', ')
    const on = q.by.length === 0 ? '1 = 1' : this.keyPredicates(q.by, left.name, right.name)

    return `SELECT ${vars} FROM ${left.from} ${JOIN_KEYWORDS[q.type]} ${right.from} ON ${on}`
  }

  private joinVar(v: JoinVar, leftName: string, rightName: string): string {
    const alias = this.dialect.quoteIdent(v.alias)
    if (v.x !== undefined && v.y !== undefined) {
      return `COALESCE(${this.qualified(leftName, v.x)}, ${this.qualified(rightName, v.y)}) AS ${alias}`
    }
    const table = v.x !== undefined ? leftName : rightName
    const column = v.x ?? v.y ?? v.alias
    const sql = this.qualified(table, column)
    return column === v.alias ? sql : `${sql} AS ${alias}`
  }

  // --- SEMI / ANTI JOIN ---

  private semiJoin(q: SemiJoinQuery): string {
    const scope = new AliasScope(this.counter)
    const left = this.alias(scope, q.x, this.render(q.x, false), q.as?.x ?? DEFAULT_LEFT_ALIAS)
    const right = this.alias(scope, q.y, this.render(q.y, false), q.as?.y ?? DEFAULT_RIGHT_ALIAS)

    const where = q.by.length === 0 ? '' : ` WHERE ${this.keyPredicates(q.by, left.name, right.name)}`
    const exists = q.anti ? 'NOT EXISTS' : 'EXISTS'

    return `SELECT * FROM ${left.from} WHERE ${exists} (SELECT 1 FROM ${right.from}${where})`
  }

  // --- SET OPERATIONS ---

  private setOp(q: SetOpQuery): string {
    return `${this.setOperand(q.x)} ${this.setKeyword(q.type)} ${this.setOperand(q.y)}`
  }

  private setOperand(node: QueryNode): string {
    const sql = this.render(node, true)
    return node.kind === 'setOp' ? `(${sql})` : sql
  }

  private setKeyword(type: SetOpType): string {
    const keyword = SET_OP_KEYWORDS[type]
    return this.dialect.distinctSetOps && type !== 'unionAll' ? `${keyword} DISTINCT` : keyword
  }

  // --- Helpers ---

  private alias(scope: AliasScope, node: QueryNode, sql: string, preferred?: string): AliasedFrom {
    const aliased = subquery(scope, node, sql, this.dialect, preferred)
    if (this.log !== undefined && aliased.wrapped) {
      this.log.push(debugEntry('aliasing', `Aliased ${node.kind} as ${aliased.name}`, undefined, { alias: aliased.name }))
    }
    return aliased
  }

  private keyPredicates(by: readonly JoinKey[], leftName: string, rightName: string): string {
    return by.map((k) => `${this.qualified(leftName, k.x)} = ${this.qualified(rightName, k.y)}`).join(' AND ')
  }

  private qualified(table: string, column: string): string {
    return `${this.dialect.quoteIdent(table)}.${this.dialect.quoteIdent(column)}`
  }
}
