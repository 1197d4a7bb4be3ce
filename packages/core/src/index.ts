// Re-export all types from validation package
export type {
  AggregateExpr,
  CallExpr,
  CastRule,
  ColumnExpr,
  ConfigErrorEntry,
  CustomRule,
  DebugLogEntry,
  DialectOptions,
  Expr,
  ExprContext,
  Identifier,
  IdentifierQuote,
  IdentifierQuoting,
  InfixRule,
  JoinKey,
  JoinQuery,
  JoinType,
  JoinVar,
  KeywordRule,
  LiteralExpr,
  LiteralValue,
  MalformedNodeEntry,
  OrderKey,
  PostfixRule,
  PrefixRule,
  QueryNode,
  QueryNodeKind,
  RawSql,
  RenderResult,
  RuleContext,
  SelectItem,
  SelectQuery,
  SemiJoinQuery,
  SetOpQuery,
  SetOpType,
  SideAliases,
  SortDirection,
  SqlExpr,
  StringEscape,
  TranslationRule,
  TranslationRuleKind,
  TranslationTable,
  UnaryRule,
  UnsupportedFunctionDetails,
  UnsupportedRule,
  WindowExpr,
  WindowFrame,
  WindowRule,
  WindowSpec,
} from '@relsql/validation'
// Re-export validation functions and classes
export {
  AliasCollisionError,
  ConfigError,
  MalformedNodeError,
  RelSqlError,
  UnsupportedFunctionError,
  validateDialectOptions,
  validateNode,
} from '@relsql/validation'
// Debug
export { debugEntry, withDebugLog } from './debug/logger.js'
// Dialects
export { AnsiDialect } from './dialects/ansi.js'
export { BigQueryDialect } from './dialects/bigquery.js'
export { ClickHouseDialect } from './dialects/clickhouse.js'
export { Dialect } from './dialects/dialect.js'
export { PostgresDialect } from './dialects/postgres.js'
export type { DialectName } from './dialects/registry.js'
export { dialects, getDialect, isDialectName } from './dialects/registry.js'
export { TrinoDialect } from './dialects/trino.js'
// Aliasing
export type { AliasedFrom } from './generator/aliasing.js'
export { AliasCounter, AliasScope, subquery } from './generator/aliasing.js'
// Expressions
export { renderExpr, renderOrderKey } from './generator/expressions.js'
// Generator
export type { GenerateOptions, RenderOptions } from './generator/generator.js'
export { generateSql, renderSql } from './generator/generator.js'
// Translation
export { baseAggregate, baseScalar, baseWindow } from './translation/base.js'
export {
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
} from './translation/rules.js'
export { checkArity, expectArgs, over, translate } from './translation/translator.js'
