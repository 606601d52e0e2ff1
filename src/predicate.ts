export type Predicate<T> = (value: T) => boolean

// character classes (ASCII only, non-ASCII letters and digits are not accepted)

export const isDigit: Predicate<string> = character =>
  character >= '0' && character <= '9'

export const isLetter: Predicate<string> = character =>
  (character >= 'a' && character <= 'z') ||
  (character >= 'A' && character <= 'Z')

// Unicode White_Space, which includes U+0085 but not U+FEFF
export const isWhitespace: Predicate<string> = character => /^\p{White_Space}$/u.test(character)

export function isBlank (line: string): boolean {
  return Array.from(line).every(isWhitespace)
}
