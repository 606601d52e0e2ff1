import type { Environment } from './environment.js'
import { evaluate } from './evaluator.js'
import type { Expression } from './expression.js'
import { tokenize } from './lexer.js'
import { parse } from './parser.js'
import type { Token } from './token.js'

export interface InterpretOptions {
  maxDepth?: number
  // called as soon as a stage succeeds, before the next one can fail
  onTokens?: (tokens: Token[]) => void
  onParsed?: (expression: Expression) => void
}

export interface LineResult {
  tokens: Token[]
  expression: Expression
  value: number
}

// lex -> parse -> evaluate, the first stage to fail throws
export function interpret (line: string, environment: Environment, options: InterpretOptions = {}): LineResult {
  const tokens = tokenize(line)

  options.onTokens?.(tokens)

  const expression = parse(tokens, options)

  options.onParsed?.(expression)

  const value = evaluate(expression, environment, options)

  return { tokens, expression, value }
}
