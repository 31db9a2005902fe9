import { tokenKeywords, tokenSymbols, type Cursor, type Token } from './types'

export class TokenizerError extends Error {
  context: unknown
  constructor(message: string, context: unknown) {
    super(message)
    this.name = 'TokenizerError'
    this.context = context
  }
}

const isWhitespace = (char: string) => [' ', '\n', '\r', '\t'].includes(char)
const isDigit = (char: string) => char >= '0' && char <= '9'
const isSymbolChar = (char: string) =>
  !isWhitespace(char) && char !== '(' && char !== ')' && char !== ';'

function makeScanner(input: string) {
  const cursor: Cursor = { line: 0, col: 0, offset: 0 }

  const peek = (ahead: number = 0): string | null =>
    cursor.offset + ahead < input.length ? input[cursor.offset + ahead] : null

  const advance = () => {
    if (input[cursor.offset] === '\n') {
      cursor.line++
      cursor.col = 0
    } else {
      cursor.col++
    }
    cursor.offset++
  }

  return {
    peek,
    advance,
    position: (): Cursor => ({ ...cursor }),
    consumeWhile(predicate: (char: string) => boolean): string {
      const start = cursor.offset
      let ch = peek()
      while (ch !== null && predicate(ch)) {
        advance()
        ch = peek()
      }
      return input.slice(start, cursor.offset)
    },
  }
}

type Scanner = ReturnType<typeof makeScanner>

const readInteger = (scanner: Scanner, start: Cursor): Token => {
  const sign = scanner.peek() === '-' ? '-' : ''
  if (sign) scanner.advance()
  const digits = scanner.consumeWhile(isDigit)
  const next = scanner.peek()
  if (next !== null && isSymbolChar(next)) {
    throw new TokenizerError(
      `Invalid integer format at line ${start.line} column ${start.col}: "${sign}${digits}${scanner.consumeWhile(isSymbolChar)}"`,
      { start, end: scanner.position() }
    )
  }
  return {
    kind: tokenKeywords.Integer,
    value: BigInt(sign + digits),
    start,
    end: scanner.position(),
  }
}

// whitespace is skipped, comments are kept so tooling can see them
export function tokenize(input: string): Token[] {
  const scanner = makeScanner(input)
  const tokens: Token[] = []

  for (let char = scanner.peek(); char !== null; char = scanner.peek()) {
    const start = scanner.position()
    if (isWhitespace(char)) {
      scanner.consumeWhile(isWhitespace)
      continue
    }
    switch (char) {
      case '(':
        scanner.advance()
        tokens.push({ kind: tokenKeywords.LParen, value: tokenSymbols.LParen, start, end: scanner.position() })
        continue
      case ')':
        scanner.advance()
        tokens.push({ kind: tokenKeywords.RParen, value: tokenSymbols.RParen, start, end: scanner.position() })
        continue
      case "'":
        scanner.advance()
        tokens.push({ kind: tokenKeywords.Quote, value: tokenSymbols.Quote, start, end: scanner.position() })
        continue
      case ';': {
        scanner.advance()
        const value = scanner.consumeWhile((ch) => ch !== '\n')
        tokens.push({ kind: tokenKeywords.Comment, value, start, end: scanner.position() })
        continue
      }
    }
    const next = scanner.peek(1)
    if (isDigit(char) || (char === '-' && next !== null && isDigit(next))) {
      tokens.push(readInteger(scanner, start))
      continue
    }
    const value = scanner.consumeWhile(isSymbolChar)
    tokens.push({ kind: tokenKeywords.Symbol, value, start, end: scanner.position() })
  }

  return tokens
}

export function getTokenValue(token: Token): string {
  return String(token.value)
}
