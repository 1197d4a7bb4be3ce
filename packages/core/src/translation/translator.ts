import type { ExprContext, RuleContext, TranslationRule, WindowFrame, WindowSpec } from '@relsql/validation'
import { MalformedNodeError, UnsupportedFunctionError } from '@relsql/validation'
import type { Dialect } from '../dialects/dialect.js'

const EMPTY_WINDOW: WindowSpec = { partitionBy: [], orderBy: [] }

// --- translate ---

/**
 * Render a function call whose arguments are already SQL text.
 *
 * Lookup order: the dialect's own table for `context`, then the base table,
 * then a plain `fn(args)` call.
 */
export function translate(
  dialect: Dialect,
  context: ExprContext,
  fn: string,
  args: readonly string[],
  window?: WindowSpec,
): string {
  const ctx: RuleContext = {
    fn,
    context,
    dialect: dialect.name,
    frameRequired: dialect.requiresWindowFrameClause,
    window: context === 'window' ? (window ?? EMPTY_WINDOW) : undefined,
  }
  return applyRule(dialect.lookup(context, fn), args, ctx)
}

export function applyRule(rule: TranslationRule | undefined, args: readonly string[], ctx: RuleContext): string {
  if (rule === undefined) {
    return inWindow(`${ctx.fn}(${args.join(', ')})`, ctx)
  }

  switch (rule.kind) {
    case 'unsupported':
      throw new UnsupportedFunctionError({
        fn: ctx.fn,
        context: ctx.context,
        dialect: ctx.dialect,
        reason: rule.reason,
      })
    case 'custom':
      return rule.render(args, ctx)
    case 'window':
      return over(`${rule.name}(${args.join(', ')})`, ctx, rule.frame)
    case 'prefix':
      if (rule.arity !== undefined) checkArity(args, ctx, rule.arity)
      return inWindow(`${rule.name}(${args.join(', ')})`, ctx)
    case 'infix': {
      const [left, right] = expectArgs(args, ctx, 2)
      return inWindow(`${left} ${rule.op} ${right}`, ctx)
    }
    case 'unary': {
      const [operand] = expectArgs(args, ctx, 1)
      if (/^[A-Za-z]/.test(rule.op)) return inWindow(`${rule.op} ${operand}`, ctx)
      // symbolic operators attach directly (-x), except to a signed operand: -(-5), never --5
      const body = /^[-+]/.test(operand) ? `(${operand})` : operand
      return inWindow(`${rule.op}${body}`, ctx)
    }
    case 'postfix': {
      const [operand] = expectArgs(args, ctx, 1)
      return inWindow(`${operand} ${rule.op}`, ctx)
    }
    case 'cast': {
      const [operand] = expectArgs(args, ctx, 1)
      return inWindow(`CAST(${operand} AS ${rule.type})`, ctx)
    }
    case 'keyword':
      checkArity(args, ctx, 0)
      return inWindow(rule.text, ctx)
    default: {
      const unknown: never = rule
      throw new MalformedNodeError([
        {
          code: 'INVALID_FUNCTION_NAME',
          message: `No usable rule for '${ctx.fn}' in ${ctx.context} context`,
          details: { fn: ctx.fn, actual: JSON.stringify(unknown) },
        },
      ])
    }
  }
}

/** Operator-shaped rules; their output needs parentheses when nested inside another operator. */
export function isOperatorRule(rule: TranslationRule | undefined): boolean {
  if (rule === undefined) return false
  if (rule.kind === 'custom') return rule.operator === true
  return rule.kind === 'infix' || rule.kind === 'unary' || rule.kind === 'postfix'
}

// --- Window helpers ---

/**
 * Append `OVER (...)` to a rendered call. The frame is emitted only when the
 * dialect requires one and the window is ordered.
 */
export function over(call: string, ctx: RuleContext, frame: WindowFrame = 'none'): string {
  const spec = ctx.window ?? EMPTY_WINDOW
  const parts: string[] = []
  if (spec.partitionBy.length > 0) {
    parts.push(`PARTITION BY ${spec.partitionBy.join(', ')}`)
  }
  if (spec.orderBy.length > 0) {
    parts.push(`ORDER BY ${spec.orderBy.join(', ')}`)
    if (ctx.frameRequired) {
      const clause = frameClause(frame)
      if (clause !== null) parts.push(clause)
    }
  }
  return `${call} OVER (${parts.join(' ')})`
}

function frameClause(frame: WindowFrame): string | null {
  switch (frame) {
    case 'none':
      return null
    case 'cumulative':
      return 'ROWS UNBOUNDED PRECEDING'
    case 'whole':
      return 'ROWS BETWEEN UNBOUNDED PRECEDING AND UNBOUNDED FOLLOWING'
  }
}

function inWindow(call: string, ctx: RuleContext): string {
  return ctx.context === 'window' ? over(call, ctx) : call
}

// --- Argument helpers (for custom rules) ---

export function checkArity(args: readonly string[], ctx: RuleContext, min: number, max: number = min): void {
  if (args.length >= min && args.length <= max) return
  const expected = min === max ? String(min) : Number.isFinite(max) ? `${min}-${max}` : `at least ${min}`
  throw new MalformedNodeError([
    {
      code: 'INVALID_ARGUMENTS',
      message: `Function '${ctx.fn}' takes ${expected} argument${expected === '1' ? '' : 's'}, got ${args.length}`,
      details: { fn: ctx.fn, expected, actual: String(args.length) },
    },
  ])
}

export function expectArgs(args: readonly string[], ctx: RuleContext, n: 1): [string]
export function expectArgs(args: readonly string[], ctx: RuleContext, n: 2): [string, string]
export function expectArgs(args: readonly string[], ctx: RuleContext, n: 3): [string, string, string]
export function expectArgs(args: readonly string[], ctx: RuleContext, n: number): string[] {
  checkArity(args, ctx, n)
  return [...args]
}
