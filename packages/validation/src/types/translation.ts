// --- Expression contexts ---

export type ExprContext = 'scalar' | 'aggregate' | 'window'

/** Rendered window specification handed to window-context rules. */
export interface WindowSpec {
  readonly partitionBy: readonly string[]
  /** Each key already carries its direction, e.g. `"year" DESC` */
  readonly orderBy: readonly string[]
}

export interface RuleContext {
  readonly fn: string
  readonly context: ExprContext
  readonly dialect: string
  readonly frameRequired: boolean
  readonly window?: WindowSpec | undefined
}

// --- Rules ---

export type WindowFrame = 'none' | 'cumulative' | 'whole'

export type TranslationRule =
  | PrefixRule
  | InfixRule
  | UnaryRule
  | PostfixRule
  | CastRule
  | KeywordRule
  | WindowRule
  | CustomRule
  | UnsupportedRule

export type TranslationRuleKind = TranslationRule['kind']

/** `name(a, b, ...)` */
export interface PrefixRule {
  readonly kind: 'prefix'
  readonly name: string
  readonly arity?: number | undefined
}

/** `a op b` */
export interface InfixRule {
  readonly kind: 'infix'
  readonly op: string
}

/** `op a` */
export interface UnaryRule {
  readonly kind: 'unary'
  readonly op: string
}

/** `a op` */
export interface PostfixRule {
  readonly kind: 'postfix'
  readonly op: string
}

/** `CAST(a AS type)` */
export interface CastRule {
  readonly kind: 'cast'
  readonly type: string
}

/** Bare keyword such as `CURRENT_DATE`. */
export interface KeywordRule {
  readonly kind: 'keyword'
  readonly text: string
}

/** `name(args) OVER (...)`, with the frame applied when the dialect asks for one. */
export interface WindowRule {
  readonly kind: 'window'
  readonly name: string
  readonly frame: WindowFrame
}

export interface CustomRule {
  readonly kind: 'custom'
  readonly render: (args: readonly string[], ctx: RuleContext) => string
  /** The output is operator-shaped (`a IN (...)`) and is parenthesized when nested. */
  readonly operator?: boolean | undefined
}

export interface UnsupportedRule {
  readonly kind: 'unsupported'
  readonly reason?: string | undefined
}

export type TranslationTable = Readonly<Record<string, TranslationRule>>
