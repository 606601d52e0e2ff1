import { LexError } from './errors.js'
import { isDigit, isLetter, isWhitespace, type Predicate } from './predicate.js'
import { SYMBOL_MAP, TokenKind, type Token } from './token.js'

// consume = "eat" buffer
// seek    = return
// read    = seek & consume

// character = unicode scalar value
// token     = classified run of characters

export class Lexer {
  public readonly buffer: readonly string[]
  public index: number = 0

  constructor (source: string, index: number = 0) {
    // split by code point, not by UTF-16 unit
    this.buffer = Array.from(source)
    this.index = index
  }

  // consume (delete)

  public consume (length: number): void {
    this.index += length
  }

  public consumeCharacter (): void {
    this.consume(1)
  }

  public consumeWhitespace (): void {
    this.readWhile(isWhitespace)
  }

  // seek (immutably read)

  public seekCharacter (): string | undefined {
    return this.buffer[this.index]
  }

  // read (seek & consume)

  public readWhile (matches: Predicate<string>): string {
    const start = this.index

    while (true) {
      const character = this.seekCharacter()

      if (character === undefined || !matches(character)) break

      this.consumeCharacter()
    }

    return this.buffer.slice(start, this.index).join('')
  }

  public readToken (): Token | undefined {
    this.consumeWhitespace()

    const index = this.index

    const character = this.seekCharacter()

    if (character === undefined) return undefined

    if (isDigit(character)) {
      return { kind: TokenKind.Number, text: this.readWhile(isDigit), index }
    }

    // a digit ends an identifier, it is lexed as a separate number
    if (isLetter(character)) {
      return { kind: TokenKind.Identifier, text: this.readWhile(isLetter), index }
    }

    const kind = SYMBOL_MAP.get(character)

    if (kind === undefined) {
      throw new LexError(character, index)
    }

    this.consumeCharacter()

    return { kind, text: character, index }
  }

  public readTokens (): Token[] {
    const tokens: Token[] = []

    while (true) {
      const token = this.readToken()

      if (token === undefined) break

      tokens.push(token)
    }

    return tokens
  }
}

/**
 * Splits one line into tokens. The whole line is lexed or none of it is:
 * the first unknown character throws a {@link LexError}.
 */
export function tokenize (source: string): Token[] {
  return new Lexer(source).readTokens()
}
