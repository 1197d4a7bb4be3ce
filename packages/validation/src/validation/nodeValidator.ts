import type { MalformedNodeEntry } from '../errors.js'
import { MalformedNodeError } from '../errors.js'
import type { Expr, JoinKey, OrderKey, QueryNode, SelectQuery, SideAliases } from '../types/ir.js'
import {
  describeValue,
  FUNCTION_NAME_REGEX,
  VALID_DIRECTIONS,
  VALID_JOIN_TYPES,
  VALID_SET_OPS,
} from './rules.js'

// --- Main Validation ---

/**
 * Structural check of a whole IR tree. Column existence is the caller's
 * concern; this only rejects trees that cannot be rendered.
 */
export function validateNode(node: QueryNode): MalformedNodeError | null {
  const errors: MalformedNodeEntry[] = []
  visitNode(node, '$', errors)
  if (errors.length === 0) {
    return null
  }
  return new MalformedNodeError(errors)
}

// --- Nodes ---

function visitNode(node: QueryNode, path: string, errors: MalformedNodeEntry[]): void {
  switch (node.kind) {
    case 'identifier':
      if (typeof node.name !== 'string' || node.name.split('.').some((part) => part.length === 0)) {
        errors.push({
          code: 'EMPTY_IDENTIFIER',
          message: `Identifier at ${path} has an empty name segment`,
          details: { path, actual: describeValue(node.name) },
        })
      }
      return
    case 'sql':
      if (typeof node.text !== 'string' || node.text.trim().length === 0) {
        errors.push({
          code: 'EMPTY_SQL',
          message: `Raw SQL at ${path} is empty`,
          details: { path },
        })
      }
      return
    case 'select':
      visitSelect(node, path, errors)
      return
    case 'join':
      if (!VALID_JOIN_TYPES.has(node.type)) {
        errors.push({
          code: 'INVALID_JOIN_TYPE',
          message: `Join at ${path} has unknown type ${describeValue(node.type)}`,
          details: { path, expected: 'inner | left | right | full', actual: describeValue(node.type) },
        })
      }
      node.vars.forEach((v, i) => {
        const varPath = `${path}.vars[${i}]`
        if (typeof v.alias !== 'string' || v.alias.length === 0) {
          errors.push({
            code: 'INVALID_ALIAS',
            message: `Join var at ${varPath} has an empty alias`,
            details: { path: varPath },
          })
        }
        if (isBlank(v.x) && isBlank(v.y)) {
          errors.push({
            code: 'INVALID_JOIN_VAR',
            message: `Join var at ${varPath} names no column on either side`,
            details: { path: varPath },
          })
        }
      })
      visitKeys(node.by, `${path}.by`, errors)
      visitSideAliases(node.as, path, errors)
      visitNode(node.x, `${path}.x`, errors)
      visitNode(node.y, `${path}.y`, errors)
      return
    case 'semiJoin':
      visitKeys(node.by, `${path}.by`, errors)
      visitSideAliases(node.as, path, errors)
      visitNode(node.x, `${path}.x`, errors)
      visitNode(node.y, `${path}.y`, errors)
      return
    case 'setOp':
      if (!VALID_SET_OPS.has(node.type)) {
        errors.push({
          code: 'INVALID_SET_OP',
          message: `Set operation at ${path} has unknown type ${describeValue(node.type)}`,
          details: { path, expected: 'union | unionAll | intersect | except', actual: describeValue(node.type) },
        })
      }
      visitSetOperand(node.x, `${path}.x`, errors)
      visitSetOperand(node.y, `${path}.y`, errors)
      return
    default: {
      const unknown: never = node
      errors.push({
        code: 'UNKNOWN_NODE',
        message: `Unknown node at ${path}`,
        details: { path, actual: describeValue(unknown) },
      })
    }
  }
}

function visitSelect(node: SelectQuery, path: string, errors: MalformedNodeEntry[]): void {
  if (node.limit !== undefined && !(Number.isInteger(node.limit) && node.limit >= 0)) {
    errors.push({
      code: 'INVALID_LIMIT',
      message: `Limit at ${path} must be a non-negative integer, got ${describeValue(node.limit)}`,
      details: { path, expected: 'non-negative integer', actual: describeValue(node.limit) },
    })
  }

  const seen = new Set<string>()
  node.select.forEach((item, i) => {
    const itemPath = `${path}.select[${i}]`
    if (typeof item.alias !== 'string' || item.alias.length === 0) {
      errors.push({
        code: 'INVALID_ALIAS',
        message: `Select item at ${itemPath} has an empty alias`,
        details: { path: itemPath },
      })
    } else if (seen.has(item.alias)) {
      errors.push({
        code: 'DUPLICATE_ALIAS',
        message: `Select item at ${itemPath} repeats alias '${item.alias}'`,
        details: { path: itemPath, actual: item.alias },
      })
    } else {
      seen.add(item.alias)
    }
    visitExpr(item.expr, `${itemPath}.expr`, errors)
  })

  node.where.forEach((e, i) => visitExpr(e, `${path}.where[${i}]`, errors))
  node.groupBy.forEach((e, i) => visitExpr(e, `${path}.groupBy[${i}]`, errors))
  node.having.forEach((e, i) => visitExpr(e, `${path}.having[${i}]`, errors))
  visitOrder(node.orderBy, `${path}.orderBy`, errors)
  visitNode(node.from, `${path}.from`, errors)
}

function visitSetOperand(node: QueryNode, path: string, errors: MalformedNodeEntry[]): void {
  if (node.kind === 'select' && (node.orderBy.length > 0 || node.limit !== undefined)) {
    errors.push({
      code: 'INVALID_SET_OP_OPERAND',
      message: `Set operand at ${path} uses ORDER BY or LIMIT and cannot stand as a compound member`,
      details: { path },
    })
  }
  visitNode(node, path, errors)
}

function visitKeys(keys: readonly JoinKey[], path: string, errors: MalformedNodeEntry[]): void {
  keys.forEach((key, i) => {
    if (isBlank(key.x) || isBlank(key.y)) {
      errors.push({
        code: 'INVALID_JOIN_KEY',
        message: `Join key at ${path}[${i}] needs a column on both sides`,
        details: { path: `${path}[${i}]`, actual: `${describeValue(key.x)} = ${describeValue(key.y)}` },
      })
    }
  })
}

function visitSideAliases(as: SideAliases | undefined, path: string, errors: MalformedNodeEntry[]): void {
  if (as === undefined) return
  for (const side of ['x', 'y'] as const) {
    const alias = as[side]
    if (alias !== undefined && (typeof alias !== 'string' || alias.length === 0)) {
      errors.push({
        code: 'INVALID_ALIAS',
        message: `Side alias at ${path}.as.${side} is empty`,
        details: { path: `${path}.as.${side}` },
      })
    }
  }
}

// --- Expressions ---

function visitExpr(expr: Expr, path: string, errors: MalformedNodeEntry[]): void {
  switch (expr.kind) {
    case 'column':
      if (isBlank(expr.name) || (expr.table !== undefined && isBlank(expr.table))) {
        errors.push({
          code: 'INVALID_COLUMN',
          message: `Column at ${path} has an empty name`,
          details: { path },
        })
      }
      return
    case 'literal':
      if (typeof expr.value === 'number' && !Number.isFinite(expr.value)) {
        errors.push({
          code: 'INVALID_LITERAL',
          message: `Literal at ${path} must be a finite number, got ${String(expr.value)}`,
          details: { path, actual: String(expr.value) },
        })
      }
      return
    case 'sql':
      if (typeof expr.text !== 'string' || expr.text.trim().length === 0) {
        errors.push({
          code: 'EMPTY_SQL',
          message: `Raw SQL at ${path} is empty`,
          details: { path },
        })
      }
      return
    case 'call':
    case 'aggregate':
      visitFn(expr.fn, path, errors)
      expr.args.forEach((a, i) => visitExpr(a, `${path}.args[${i}]`, errors))
      return
    case 'window':
      visitFn(expr.fn, path, errors)
      expr.args.forEach((a, i) => visitExpr(a, `${path}.args[${i}]`, errors))
      expr.partitionBy.forEach((p, i) => visitExpr(p, `${path}.partitionBy[${i}]`, errors))
      visitOrder(expr.orderBy, `${path}.orderBy`, errors)
      return
    default: {
      const unknown: never = expr
      errors.push({
        code: 'UNKNOWN_EXPRESSION',
        message: `Unknown expression at ${path}`,
        details: { path, actual: describeValue(unknown) },
      })
    }
  }
}

function visitFn(fn: string, path: string, errors: MalformedNodeEntry[]): void {
  if (typeof fn !== 'string' || !FUNCTION_NAME_REGEX.test(fn)) {
    errors.push({
      code: 'INVALID_FUNCTION_NAME',
      message: `Function name at ${path} must match ^[A-Za-z_][A-Za-z0-9_]*$, got ${describeValue(fn)}`,
      details: { path, fn: describeValue(fn) },
    })
  }
}

function visitOrder(keys: readonly OrderKey[], path: string, errors: MalformedNodeEntry[]): void {
  keys.forEach((key, i) => {
    if (!VALID_DIRECTIONS.has(key.direction)) {
      errors.push({
        code: 'INVALID_DIRECTION',
        message: `Order key at ${path}[${i}] has direction ${describeValue(key.direction)}`,
        details: { path: `${path}[${i}]`, expected: 'asc | desc', actual: describeValue(key.direction) },
      })
    }
    visitExpr(key.expr, `${path}[${i}].expr`, errors)
  })
}

function isBlank(value: string | undefined): boolean {
  return typeof value !== 'string' || value.length === 0
}
