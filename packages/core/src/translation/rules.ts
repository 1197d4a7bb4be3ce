import type {
  CastRule,
  CustomRule,
  InfixRule,
  KeywordRule,
  PostfixRule,
  PrefixRule,
  RuleContext,
  UnaryRule,
  UnsupportedRule,
  WindowFrame,
  WindowRule,
} from '@relsql/validation'

// --- Rule builders ---

export function sqlPrefix(name: string, arity?: number): PrefixRule {
  return { kind: 'prefix', name, arity }
}

export function sqlInfix(op: string): InfixRule {
  return { kind: 'infix', op }
}

export function sqlUnary(op: string): UnaryRule {
  return { kind: 'unary', op }
}

export function sqlPostfix(op: string): PostfixRule {
  return { kind: 'postfix', op }
}

export function sqlCast(type: string): CastRule {
  return { kind: 'cast', type }
}

export function sqlKeyword(text: string): KeywordRule {
  return { kind: 'keyword', text }
}

export function sqlCustom(
  render: (args: readonly string[], ctx: RuleContext) => string,
  options: { operator?: boolean } = {},
): CustomRule {
  return { kind: 'custom', render, operator: options.operator ?? false }
}

export function sqlUnsupported(reason?: string): UnsupportedRule {
  return { kind: 'unsupported', reason }
}

// --- Window rule builders ---

export function win(name: string, frame: WindowFrame = 'none'): WindowRule {
  return { kind: 'window', name, frame }
}

/** Aggregate evaluated over the whole partition. */
export function winAggregate(name: string): WindowRule {
  return win(name, 'whole')
}

/** Running aggregate: from the partition start up to the current row. */
export function winCumulative(name: string): WindowRule {
  return win(name, 'cumulative')
}
