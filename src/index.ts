export { ErrorCodes, CalcError, LexError, ParseError, EvalError, exhaustive } from './errors.js'
export type { ErrorCode, ParseErrorCode, EvalErrorCode } from './errors.js'

export { TokenKind, formatToken, formatTokens } from './token.js'
export type { Token } from './token.js'

export { Lexer, tokenize } from './lexer.js'

export {
  BinaryOperator,
  INT32_MIN,
  INT32_MAX,
  DEFAULT_MAX_DEPTH,
  numberLiteral,
  variableReference,
  assignment,
  binaryOp,
  formatExpression
} from './expression.js'
export type { Expression, NumberLiteral, VariableReference, Assignment, BinaryOp } from './expression.js'

export { Parser, parse } from './parser.js'
export type { ParseOptions } from './parser.js'

export { Environment } from './environment.js'

export { evaluate } from './evaluator.js'
export type { EvalOptions } from './evaluator.js'

export { interpret } from './session.js'
export type { InterpretOptions, LineResult } from './session.js'

export { formatResult, formatError, formatTokensLine, formatParsedLine, formatValueLine } from './format.js'

export { repl, DEFAULT_PROMPT } from './repl.js'
export type { ReplOptions, ReplOutput } from './repl.js'
