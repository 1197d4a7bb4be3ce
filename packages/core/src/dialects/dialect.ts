import type {
  DialectOptions,
  ExprContext,
  IdentifierQuote,
  IdentifierQuoting,
  LiteralValue,
  StringEscape,
  TranslationRule,
  TranslationTable,
} from '@relsql/validation'
import { MalformedNodeError, validateDialectOptions } from '@relsql/validation'
import {
  COMMON_RESERVED_WORDS,
  escapeIdentBT,
  escapeIdentDQ,
  escapeStringBackslash,
  escapeStringDouble,
  isBareIdentifier,
} from '../generator/fragments.js'
import { baseAggregate, baseScalar, baseWindow } from '../translation/base.js'

type RuleLayers = readonly ReadonlyMap<string, TranslationRule>[]

const BASE_LAYERS: Readonly<Record<ExprContext, ReadonlyMap<string, TranslationRule>>> = {
  scalar: toRuleMap(baseScalar),
  aggregate: toRuleMap(baseAggregate),
  window: toRuleMap(baseWindow),
}

// --- Dialect ---

/**
 * Quoting rules, translation tables and capability flags for one SQL engine.
 * Built once and shared read-only by every render call.
 */
export class Dialect {
  readonly name: string
  readonly identifierQuote: IdentifierQuote
  readonly quoteIdentifiers: IdentifierQuoting
  readonly stringEscape: StringEscape
  readonly requiresWindowFrameClause: boolean
  readonly distinctSetOps: boolean
  private readonly reserved: ReadonlySet<string>
  private readonly layers: Readonly<Record<ExprContext, RuleLayers>>

  constructor(options: DialectOptions) {
    const err = validateDialectOptions(options)
    if (err !== null) throw err

    this.name = options.name
    this.identifierQuote = options.identifierQuote
    this.quoteIdentifiers = options.quoteIdentifiers ?? 'as-needed'
    this.stringEscape = options.stringEscape ?? 'double'
    this.requiresWindowFrameClause = options.requiresWindowFrameClause
    this.distinctSetOps = options.distinctSetOps ?? false
    this.reserved = new Set([...COMMON_RESERVED_WORDS, ...(options.reservedWords ?? [])])
    this.layers = Object.freeze({
      scalar: layersFor(options.scalar, BASE_LAYERS.scalar),
      aggregate: layersFor(options.aggregate, BASE_LAYERS.aggregate),
      window: layersFor(options.window, BASE_LAYERS.window),
    })
  }

  /** Dialect override, then base rule; `undefined` means a plain `fn(args)` call. */
  lookup(context: ExprContext, fn: string): TranslationRule | undefined {
    for (const layer of this.layers[context]) {
      const rule = layer.get(fn)
      if (rule !== undefined) return rule
    }
    return undefined
  }

  quoteIdent(name: string): string {
    if (this.quoteIdentifiers === 'as-needed' && isBareIdentifier(name, this.reserved)) {
      return name
    }
    if (this.identifierQuote === '`') {
      return `\`${escapeIdentBT(name)}\``
    }
    return `"${escapeIdentDQ(name)}"`
  }

  /** `catalog.schema.table`, each segment quoted on its own. */
  quoteTable(name: string): string {
    return name
      .split('.')
      .map((part) => this.quoteIdent(part))
      .join('.')
  }

  quoteString(value: string): string {
    const body = this.stringEscape === 'backslash' ? escapeStringBackslash(value) : escapeStringDouble(value)
    return `'${body}'`
  }

  literal(value: LiteralValue): string {
    if (value === null) return 'NULL'
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new MalformedNodeError([
          {
            code: 'INVALID_LITERAL',
            message: `Literal must be a finite number, got ${String(value)}`,
            details: { actual: String(value) },
          },
        ])
      }
      return String(value)
    }
    return this.quoteString(value)
  }
}

// --- Helpers ---

function toRuleMap(table: TranslationTable): ReadonlyMap<string, TranslationRule> {
  return new Map(Object.entries(table))
}

function layersFor(overrides: TranslationTable | undefined, base: ReadonlyMap<string, TranslationRule>): RuleLayers {
  if (overrides === undefined) return Object.freeze([base])
  return Object.freeze([toRuleMap(overrides), base])
}
