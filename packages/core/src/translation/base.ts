import type { TranslationTable } from '@relsql/validation'
import {
  sqlCast,
  sqlCustom,
  sqlInfix,
  sqlKeyword,
  sqlPostfix,
  sqlPrefix,
  sqlUnary,
  sqlUnsupported,
  win,
  winAggregate,
  winCumulative,
} from './rules.js'
import { checkArity, expectArgs, over } from './translator.js'

// ── Scalar ─────────────────────────────────────────────────────

export const baseScalar: TranslationTable = Object.freeze({
  // Comparison
  eq: sqlInfix('='),
  ne: sqlInfix('<>'),
  lt: sqlInfix('<'),
  le: sqlInfix('<='),
  gt: sqlInfix('>'),
  ge: sqlInfix('>='),

  // Arithmetic
  add: sqlInfix('+'),
  sub: sqlInfix('-'),
  mul: sqlInfix('*'),
  div: sqlInfix('/'),
  mod: sqlInfix('%'),
  neg: sqlUnary('-'),

  // Logical
  and: sqlInfix('AND'),
  or: sqlInfix('OR'),
  not: sqlUnary('NOT'),

  // Nulls
  isNull: sqlPostfix('IS NULL'),
  isNotNull: sqlPostfix('IS NOT NULL'),
  coalesce: sqlPrefix('COALESCE'),
  nullIf: sqlPrefix('NULLIF', 2),

  // Membership / conditionals
  between: sqlCustom(
    (args, ctx) => {
      const [x, lo, hi] = expectArgs(args, ctx, 3)
      return `${x} BETWEEN ${lo} AND ${hi}`
    },
    { operator: true },
  ),
  in: sqlCustom(
    (args, ctx) => {
      checkArity(args, ctx, 2, Number.POSITIVE_INFINITY)
      const [x, ...values] = args
      return `${x ?? ''} IN (${values.join(', ')})`
    },
    { operator: true },
  ),
  ifElse: sqlCustom((args, ctx) => {
    const [cond, yes, no] = expectArgs(args, ctx, 3)
    return `CASE WHEN ${cond} THEN ${yes} ELSE ${no} END`
  }),

  // Strings
  like: sqlInfix('LIKE'),
  concat: sqlInfix('||'),
  lower: sqlPrefix('LOWER', 1),
  upper: sqlPrefix('UPPER', 1),
  length: sqlPrefix('LENGTH', 1),
  trim: sqlPrefix('TRIM', 1),
  substr: sqlCustom((args, ctx) => {
    checkArity(args, ctx, 2, 3)
    return `SUBSTR(${args.join(', ')})`
  }),
  regexMatch: sqlUnsupported('no portable regular expression syntax'),
  regexExtract: sqlUnsupported('no portable regular expression syntax'),
  regexReplace: sqlUnsupported('no portable regular expression syntax'),

  // Math
  abs: sqlPrefix('ABS', 1),
  round: sqlCustom((args, ctx) => {
    checkArity(args, ctx, 1, 2)
    return `ROUND(${args.join(', ')})`
  }),
  floor: sqlPrefix('FLOOR', 1),
  ceil: sqlPrefix('CEIL', 1),
  sqrt: sqlPrefix('SQRT', 1),
  exp: sqlPrefix('EXP', 1),
  ln: sqlPrefix('LN', 1),
  power: sqlPrefix('POWER', 2),

  // Casts
  toBoolean: sqlCast('BOOLEAN'),
  toInteger: sqlCast('INTEGER'),
  toFloat: sqlCast('DOUBLE PRECISION'),
  toString: sqlCast('VARCHAR'),
  toDate: sqlCast('DATE'),

  // Date / time
  currentDate: sqlKeyword('CURRENT_DATE'),
  currentTimestamp: sqlKeyword('CURRENT_TIMESTAMP'),
})

// ── Aggregate ──────────────────────────────────────────────────

export const baseAggregate: TranslationTable = Object.freeze({
  count: sqlCustom((args, ctx) => {
    checkArity(args, ctx, 0, 1)
    return `COUNT(${args[0] ?? '*'})`
  }),
  countDistinct: sqlCustom((args, ctx) => {
    const [x] = expectArgs(args, ctx, 1)
    return `COUNT(DISTINCT ${x})`
  }),
  sum: sqlPrefix('SUM', 1),
  mean: sqlPrefix('AVG', 1),
  min: sqlPrefix('MIN', 1),
  max: sqlPrefix('MAX', 1),
  sd: sqlPrefix('STDDEV_SAMP', 1),
  var: sqlPrefix('VAR_SAMP', 1),
  median: sqlCustom((args, ctx) => {
    const [x] = expectArgs(args, ctx, 1)
    return `PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY ${x})`
  }),
})

// ── Window ─────────────────────────────────────────────────────

export const baseWindow: TranslationTable = Object.freeze({
  // Ranking
  rowNumber: win('ROW_NUMBER'),
  rank: win('RANK'),
  denseRank: win('DENSE_RANK'),
  percentRank: win('PERCENT_RANK'),
  cumeDist: win('CUME_DIST'),
  ntile: win('NTILE'),

  // Offsets
  lag: win('LAG'),
  lead: win('LEAD'),
  firstValue: winAggregate('FIRST_VALUE'),
  lastValue: winAggregate('LAST_VALUE'),

  // Aggregates over the partition
  sum: winAggregate('SUM'),
  mean: winAggregate('AVG'),
  min: winAggregate('MIN'),
  max: winAggregate('MAX'),
  count: sqlCustom((args, ctx) => {
    checkArity(args, ctx, 0, 1)
    return over(`COUNT(${args[0] ?? '*'})`, ctx, 'whole')
  }),

  // Running aggregates
  cumsum: winCumulative('SUM'),
  cummean: winCumulative('AVG'),
  cummin: winCumulative('MIN'),
  cummax: winCumulative('MAX'),
  cumcount: sqlCustom((args, ctx) => {
    checkArity(args, ctx, 0, 1)
    return over(`COUNT(${args[0] ?? '*'})`, ctx, 'cumulative')
  }),
})
