// Config validation
export { validateDialectOptions } from './configValidation.js'

// Errors
export type { ConfigErrorEntry, MalformedNodeEntry, UnsupportedFunctionDetails } from './errors.js'
export {
  AliasCollisionError,
  ConfigError,
  MalformedNodeError,
  RelSqlError,
  UnsupportedFunctionError,
} from './errors.js'

// Types: dialect
export type { DialectOptions, IdentifierQuote, IdentifierQuoting, StringEscape } from './types/dialect.js'
// Types: IR
export type {
  AggregateExpr,
  CallExpr,
  ColumnExpr,
  Expr,
  Identifier,
  JoinKey,
  JoinQuery,
  JoinType,
  JoinVar,
  LiteralExpr,
  LiteralValue,
  OrderKey,
  QueryNode,
  QueryNodeKind,
  RawSql,
  SelectItem,
  SelectQuery,
  SemiJoinQuery,
  SetOpQuery,
  SetOpType,
  SideAliases,
  SortDirection,
  SqlExpr,
  WindowExpr,
} from './types/ir.js'
// Types: result
export type { DebugLogEntry, RenderResult } from './types/result.js'
// Types: translation
export type {
  CastRule,
  CustomRule,
  ExprContext,
  InfixRule,
  KeywordRule,
  PostfixRule,
  PrefixRule,
  RuleContext,
  TranslationRule,
  TranslationRuleKind,
  TranslationTable,
  UnaryRule,
  UnsupportedRule,
  WindowFrame,
  WindowRule,
  WindowSpec,
} from './types/translation.js'

// Node validation
export { validateNode } from './validation/nodeValidator.js'
export { FUNCTION_NAME_REGEX, SQL_FUNCTION_REGEX } from './validation/rules.js'
