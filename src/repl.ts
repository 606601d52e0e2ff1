import { createInterface } from 'readline/promises'
import chalk, { type ChalkInstance } from 'chalk'
import { Environment } from './environment.js'
import { CalcError } from './errors.js'
import { formatError, formatParsedLine, formatTokensLine, formatValueLine } from './format.js'
import { isBlank } from './predicate.js'
import { interpret } from './session.js'

export interface ReplOutput {
  write: (chunk: string) => unknown
}

export interface ReplOptions {
  input: NodeJS.ReadableStream
  output: ReplOutput
  environment?: Environment
  prompt?: string
  chalk?: ChalkInstance
  maxDepth?: number
}

export const DEFAULT_PROMPT = 'calc > '

/**
 * Reads lines until an empty one (or end of input) and prints, for each,
 * the tokens, the tree and the value. Each stage prints as soon as it
 * succeeds, so a failure is reported after the stages before it. Errors
 * never end the loop and bindings made before an error are kept.
 *
 * Resolves to the process exit code.
 */
export async function repl (options: ReplOptions): Promise<number> {
  const { input, output } = options

  const environment = options.environment ?? new Environment()
  const prompt = options.prompt ?? DEFAULT_PROMPT
  const color = options.chalk ?? chalk

  const print = (lines: string[]): void => {
    for (const line of lines) output.write(`${line}\n`)
  }

  const rl = createInterface({
    input,
    crlfDelay: Infinity,
    terminal: false
  })

  output.write(prompt)

  // leaving the loop closes the interface
  for await (const line of rl) {
    if (isBlank(line)) break

    try {
      const { value } = interpret(line, environment, {
        maxDepth: options.maxDepth,
        onTokens: tokens => print([formatTokensLine(tokens, color)]),
        onParsed: expression => print([formatParsedLine(expression, color)])
      })

      print([formatValueLine(value, color)])
    } catch (error) {
      if (!(error instanceof CalcError)) throw error

      print(formatError(error, line, color))
    }

    output.write(prompt)
  }

  return 0
}
