import chalk, { type ChalkInstance } from 'chalk'
import type { CalcError } from './errors.js'
import { formatExpression, type Expression } from './expression.js'
import type { LineResult } from './session.js'
import { formatTokens, type Token } from './token.js'

export function formatTokensLine (tokens: readonly Token[], color: ChalkInstance = chalk): string {
  return `${color.dim('tokens:')} ${formatTokens(tokens)}`
}

export function formatParsedLine (expression: Expression, color: ChalkInstance = chalk): string {
  return `${color.dim('parsed:')} ${formatExpression(expression)}`
}

export function formatValueLine (value: number, color: ChalkInstance = chalk): string {
  return color.bold(String(value))
}

export function formatResult (result: LineResult, color: ChalkInstance = chalk): string[] {
  return [
    formatTokensLine(result.tokens, color),
    formatParsedLine(result.expression, color),
    formatValueLine(result.value, color)
  ]
}

// source line, caret under the offending character, then the message
export function formatError (error: CalcError, line: string, color: ChalkInstance = chalk): string[] {
  const lines: string[] = []

  if (error.index !== undefined) {
    lines.push(color.red(line))
    lines.push(color.red(`${' '.repeat(error.index)}^`))
  }

  lines.push(color.red(`${error.name}: ${error.message}`))

  return lines
}
