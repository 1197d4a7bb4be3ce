import type { Expr, ExprContext, OrderKey } from '@relsql/validation'
import { MalformedNodeError } from '@relsql/validation'
import type { Dialect } from '../dialects/dialect.js'
import { isOperatorRule, translate } from '../translation/translator.js'

// --- Expressions ---

export function renderExpr(expr: Expr, dialect: Dialect): string {
  switch (expr.kind) {
    case 'column':
      return expr.table !== undefined
        ? `${dialect.quoteIdent(expr.table)}.${dialect.quoteIdent(expr.name)}`
        : dialect.quoteIdent(expr.name)
    case 'literal':
      return dialect.literal(expr.value)
    case 'sql':
      return expr.text
    case 'call':
      return renderCall('scalar', expr.fn, expr.args, dialect)
    case 'aggregate':
      return renderCall('aggregate', expr.fn, expr.args, dialect)
    case 'window':
      return translate(
        dialect,
        'window',
        expr.fn,
        expr.args.map((a) => renderExpr(a, dialect)),
        {
          partitionBy: expr.partitionBy.map((p) => renderExpr(p, dialect)),
          orderBy: expr.orderBy.map((o) => renderOrderKey(o, dialect)),
        },
      )
    default: {
      const unknown: never = expr
      throw new MalformedNodeError([
        {
          code: 'UNKNOWN_EXPRESSION',
          message: 'Unknown expression',
          details: { actual: JSON.stringify(unknown) },
        },
      ])
    }
  }
}

export function renderOrderKey(key: OrderKey, dialect: Dialect): string {
  return `${renderExpr(key.expr, dialect)} ${key.direction === 'desc' ? 'DESC' : 'ASC'}`
}

/**
 * Parenthesize an expression that may bind looser than its surroundings, e.g.
 * before joining predicates with AND. Raw SQL is opaque, so it always counts.
 */
export function renderOperand(expr: Expr, dialect: Dialect): string {
  const sql = renderExpr(expr, dialect)
  return isOperatorExpr(expr, dialect) ? `(${sql})` : sql
}

export function isOperatorExpr(expr: Expr, dialect: Dialect): boolean {
  if (expr.kind === 'sql') return true
  return expr.kind === 'call' && isOperatorRule(dialect.lookup('scalar', expr.fn))
}

// --- Helpers ---

function renderCall(context: ExprContext, fn: string, args: readonly Expr[], dialect: Dialect): string {
  const nested = isOperatorRule(dialect.lookup(context, fn))
  const rendered = args.map((a) => (nested ? renderOperand(a, dialect) : renderExpr(a, dialect)))
  return translate(dialect, context, fn, rendered)
}
