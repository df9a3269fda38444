export { tokenize } from './expressions/tokens';
export type { Token, TokenKind, Operator } from './expressions/tokens';
export { parse, parseExpression, Parser } from './expressions/parser';
export type {
  Node,
  NodeType,
  ConstantNode,
  VariableNode,
  UnaryOpNode,
  BinaryOpNode,
  CallNode,
  BinaryOperator,
  UnaryOperator,
} from './expressions/types';
export { validate } from './expressions/validator';
export type { ValidatedAst } from './expressions/validator';
export { evaluate } from './expressions/evaluator';
export type { Bindings } from './expressions/evaluator';
export { Expression, compile } from './expressions/expression';
export { print } from './expressions/printer';
export {
  defaultRegistry,
  createRegistry,
  builtinFunctions,
  builtinVariables,
  independentVariables,
} from './expressions/registry';
export type { SymbolRegistry, FunctionDefinition, VariableDefinition } from './expressions/registry';
export {
  ExpressionError,
  LexError,
  ExpressionSyntaxError,
  UnknownIdentifierError,
  ArityMismatchError,
  DomainError,
  InvalidRangeError,
  InvalidCountError,
  isExpressionError,
} from './expressions/errors';
export type { DomainErrorKind, IdentifierRole } from './expressions/errors';
export { sample, bounds, segments, isDefined } from './sampler';
export type { SamplePoint, DefinedPoint } from './sampler';
export { Interval } from './interval';
export {
  parseSettings,
  parseLimits,
  settingsSchema,
  SettingsError,
  LimitsError,
  DEFAULT_SETTINGS,
  MAX_SAMPLES,
} from './settings';
export type { GrapherSettings, SettingsIssue, LimitField } from './settings';
export { plot, Y_MARGIN } from './plot';
export type { PlotRequest, PlotResult, Plot, PlotFailure } from './plot';
export { formatPoints } from './format';
