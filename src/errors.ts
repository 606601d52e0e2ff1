export const ErrorCodes = {
  // lexing
  UnexpectedCharacter: 'UnexpectedCharacter',

  // parsing
  UnexpectedToken: 'UnexpectedToken',
  UnclosedParenthesis: 'UnclosedParenthesis',
  TrailingTokens: 'TrailingTokens',
  NumberOutOfRange: 'NumberOutOfRange',
  NestingTooDeep: 'NestingTooDeep',

  // evaluation
  UnboundVariable: 'UnboundVariable',
  MalformedAssignment: 'MalformedAssignment',
  Overflow: 'Overflow',
  DepthExceeded: 'DepthExceeded'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class CalcError extends Error {
  public readonly code: ErrorCode

  // character offset in the input line, when the failure has one
  public readonly index?: number

  constructor (code: ErrorCode, message: string, index?: number) {
    super(message)

    this.name = 'CalcError'
    this.code = code

    if (index !== undefined) this.index = index
  }
}

export class LexError extends CalcError {
  public readonly character: string

  constructor (character: string, index: number) {
    super(
      ErrorCodes.UnexpectedCharacter,
      `Couldn't parse ${JSON.stringify(character)} to a token`,
      index
    )

    this.name = 'LexError'
    this.character = character
  }
}

export type ParseErrorCode =
  | typeof ErrorCodes.UnexpectedToken
  | typeof ErrorCodes.UnclosedParenthesis
  | typeof ErrorCodes.TrailingTokens
  | typeof ErrorCodes.NumberOutOfRange
  | typeof ErrorCodes.NestingTooDeep

export class ParseError extends CalcError {
  constructor (code: ParseErrorCode, message: string, index?: number) {
    super(code, message, index)

    this.name = 'ParseError'
  }
}

export type EvalErrorCode =
  | typeof ErrorCodes.UnboundVariable
  | typeof ErrorCodes.MalformedAssignment
  | typeof ErrorCodes.Overflow
  | typeof ErrorCodes.DepthExceeded

export class EvalError extends CalcError {
  constructor (code: EvalErrorCode, message: string) {
    super(code, message)

    this.name = 'EvalError'
  }

  public static unboundVariable (name: string): EvalError {
    return new EvalError(
      ErrorCodes.UnboundVariable,
      `Unbound variable ${JSON.stringify(name)}`
    )
  }
}

/**
 * Closes a switch over a union. Fails to compile when a variant is missing.
 */
export function exhaustive (value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`)
}
