import type { QueryNode } from '@relsql/validation'
import { AliasCollisionError } from '@relsql/validation'
import type { Dialect } from '../dialects/dialect.js'
import { isPlainTableName, lastSegment } from './fragments.js'

// --- Counter ---

/** Anonymous alias source for one top-level render call: q01, q02, ... */
export class AliasCounter {
  private n = 0

  next(): string {
    this.n += 1
    return `q${String(this.n).padStart(2, '0')}`
  }
}

// --- Scope ---

/** Aliases claimed by the derived tables of one FROM clause. */
export class AliasScope {
  private readonly claimed = new Set<string>()
  private readonly counter: AliasCounter

  constructor(counter: AliasCounter) {
    this.counter = counter
  }

  claim(name: string): string {
    if (this.claimed.has(name)) {
      throw new AliasCollisionError(name)
    }
    this.claimed.add(name)
    return name
  }

  generate(): string {
    let name = this.counter.next()
    while (this.claimed.has(name)) {
      name = this.counter.next()
    }
    this.claimed.add(name)
    return name
  }
}

// --- Subquery ---

export interface AliasedFrom {
  /** FROM-clause text */
  from: string
  /** Name the enclosing clauses use to reference it */
  name: string
  /** True when the text was wrapped as a parenthesized derived table */
  wrapped: boolean
}

/**
 * Make a rendered node usable as a FROM-clause item. Table names stay bare
 * (aliased only when a preferred name is given); everything else becomes
 * `(<sql>) AS <name>`.
 */
export function subquery(
  scope: AliasScope,
  node: QueryNode,
  sql: string,
  dialect: Dialect,
  preferred?: string,
): AliasedFrom {
  const tableName = node.kind === 'identifier' ? node.name : node.kind === 'sql' && isPlainTableName(sql) ? sql : null

  if (tableName !== null) {
    if (preferred === undefined) {
      return { from: sql, name: scope.claim(lastSegment(tableName)), wrapped: false }
    }
    const name = scope.claim(preferred)
    return { from: `${sql} AS ${dialect.quoteIdent(name)}`, name, wrapped: false }
  }

  const name = preferred === undefined ? scope.generate() : scope.claim(preferred)
  return { from: `(${sql}) AS ${dialect.quoteIdent(name)}`, name, wrapped: true }
}
