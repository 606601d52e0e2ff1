export const TokenKind = {
  Number: 'Number',
  Identifier: 'Identifier',
  Plus: 'Plus',
  Minus: 'Minus',
  Times: 'Times',
  LeftParen: 'LeftParen',
  RightParen: 'RightParen',
  Assign: 'Assign'
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export interface Token {
  readonly kind: TokenKind
  readonly text: string
  // offset of the first character in the source line
  readonly index: number
}

export const SYMBOL_MAP: ReadonlyMap<string, TokenKind> = new Map([
  ['+', TokenKind.Plus],
  ['-', TokenKind.Minus],
  ['*', TokenKind.Times],
  ['(', TokenKind.LeftParen],
  [')', TokenKind.RightParen],
  ['=', TokenKind.Assign]
])

export function formatToken (token: Token): string {
  switch (token.kind) {
    case TokenKind.Number:
    case TokenKind.Identifier:
      return `${token.kind}(${JSON.stringify(token.text)})`
    default:
      return token.kind
  }
}

export function formatTokens (tokens: readonly Token[]): string {
  return `[${tokens.map(formatToken).join(', ')}]`
}
