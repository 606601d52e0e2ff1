import { ErrorCodes, ParseError } from './errors.js'
import {
  BinaryOperator,
  DEFAULT_MAX_DEPTH,
  INT32_MAX,
  assignment,
  binaryOp,
  formatExpression,
  numberLiteral,
  variableReference,
  type Expression
} from './expression.js'
import { TokenKind, formatToken, type Token } from './token.js'

// term       := Number | Identifier | '(' expression ')'
// expression := term ( '+' term | '-' term | '*' term | '=' expression )?
//
// There is one binary operator per expression, so `1 + 2 + 3` leaves `+ 3`
// unconsumed and is rejected by parse().

export interface ParseOptions {
  maxDepth?: number
}

const BINARY_OPERATORS: ReadonlyArray<[TokenKind, BinaryOperator]> = [
  [TokenKind.Plus, BinaryOperator.Add],
  [TokenKind.Minus, BinaryOperator.Subtract],
  [TokenKind.Times, BinaryOperator.Multiply]
]

export class Parser {
  public readonly tokens: readonly Token[]
  public index: number = 0

  private readonly maxDepth: number
  private depth: number = 0

  constructor (tokens: readonly Token[], options: ParseOptions = {}) {
    this.tokens = tokens
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
  }

  public get atEnd (): boolean {
    return this.index >= this.tokens.length
  }

  // character offset for errors found at the cursor
  private get errorIndex (): number | undefined {
    const token = this.seekToken()

    if (token !== undefined) return token.index

    const last = this.tokens.at(-1)

    if (last === undefined) return undefined

    return last.index + last.text.length
  }

  public seekToken (): Token | undefined {
    return this.tokens[this.index]
  }

  // accept: consume the next token only when it has the given kind
  public readToken (kind: TokenKind): Token | undefined {
    const token = this.seekToken()

    if (token === undefined || token.kind !== kind) return undefined

    this.index++

    return token
  }

  public parseTerm (): Expression {
    const number = this.readToken(TokenKind.Number)

    if (number !== undefined) {
      const value = Number(number.text)

      if (value > INT32_MAX) {
        throw new ParseError(
          ErrorCodes.NumberOutOfRange,
          `Number ${number.text} does not fit in a 32-bit integer`,
          number.index
        )
      }

      return numberLiteral(value)
    }

    const identifier = this.readToken(TokenKind.Identifier)

    if (identifier !== undefined) return variableReference(identifier.text)

    const open = this.readToken(TokenKind.LeftParen)

    if (open !== undefined) {
      const inner = this.parseExpression()

      if (this.readToken(TokenKind.RightParen) === undefined) {
        throw new ParseError(
          ErrorCodes.UnclosedParenthesis,
          `( not closed by a ). Found ( ${formatExpression(inner)}`,
          open.index
        )
      }

      return inner
    }

    const token = this.seekToken()

    throw new ParseError(
      ErrorCodes.UnexpectedToken,
      `Expected a number, identifier or ( but found ${token === undefined ? 'end of input' : formatToken(token)}`,
      this.errorIndex
    )
  }

  public parseExpression (): Expression {
    if (this.depth >= this.maxDepth) {
      throw new ParseError(
        ErrorCodes.NestingTooDeep,
        `Expression is nested deeper than ${this.maxDepth} levels`,
        this.errorIndex
      )
    }

    this.depth++

    try {
      const left = this.parseTerm()

      for (const [kind, operator] of BINARY_OPERATORS) {
        if (this.readToken(kind) !== undefined) {
          return binaryOp(operator, left, this.parseTerm())
        }
      }

      // right-associative: a = b = 3
      if (this.readToken(TokenKind.Assign) !== undefined) {
        return assignment(left, this.parseExpression())
      }

      return left
    } finally {
      this.depth--
    }
  }

  public parse (): Expression {
    const expression = this.parseExpression()

    if (!this.atEnd) {
      const last = this.tokens[this.index - 1]

      throw new ParseError(
        ErrorCodes.TrailingTokens,
        `Unprocessed tokens remain. Last processed: ${formatToken(last)}`,
        this.errorIndex
      )
    }

    return expression
  }
}

/**
 * Parses one line's tokens into a single expression tree.
 */
export function parse (tokens: readonly Token[], options?: ParseOptions): Expression {
  return new Parser(tokens, options).parse()
}
