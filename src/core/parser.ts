import { lispBoolean, lispInteger, lispList, lispSymbol } from './factories'
import { getTokenValue, tokenize } from './tokenizer'
import { tokenKeywords, tokenSymbols, type Token } from './types'
import type { LispValue } from './types'

export function makeScanner(input: Token[]) {
  let offset = 0

  const api = {
    peek: (ahead: number = 0): Token | null => {
      const idx = offset + ahead
      if (idx >= input.length) return null
      return input[idx]
    },
    advance: (): Token | null => {
      if (offset >= input.length) return null
      const token = input[offset]
      offset++
      return token
    },
    isAtEnd: () => {
      return offset >= input.length
    },
    position: () => {
      return {
        offset,
      }
    },
  }

  return api
}

export type Scanner = ReturnType<typeof makeScanner>

export class ParseError extends Error {
  context: unknown
  constructor(message: string, context: unknown) {
    super(message)
    this.name = 'ParseError'
    this.context = context
  }
}

const booleanLiterals: Record<string, boolean> = {
  true: true,
  '#t': true,
  false: false,
  '#f': false,
}

const parseSymbol = (token: Token & { kind: 'Symbol' }): LispValue => {
  if (Object.prototype.hasOwnProperty.call(booleanLiterals, token.value)) {
    return lispBoolean(booleanLiterals[token.value])
  }
  return lispSymbol(token.value)
}

const parseQuote = (scanner: Scanner): LispValue => {
  const token = scanner.advance() // consume the quote token
  if (scanner.isAtEnd()) {
    throw new ParseError('Unexpected end of input while parsing quote', token)
  }
  // 'x reads as (quote x)
  return lispList([lispSymbol(tokenSymbols.Quote), parseForm(scanner)])
}

const parseList = (scanner: Scanner): LispValue => {
  const startToken = scanner.advance() // consume the opening paren
  if (!startToken) {
    throw new ParseError(
      'Unexpected end of input while parsing list',
      scanner.position()
    )
  }
  const values: LispValue[] = []
  let token = scanner.peek()
  while (token) {
    if (token.kind === tokenKeywords.RParen) {
      scanner.advance() // consume the closing paren
      return lispList(values)
    }
    values.push(parseForm(scanner))
    token = scanner.peek()
  }
  throw new ParseError(
    `Unmatched list started at line ${startToken.start.line} column ${startToken.start.col}`,
    startToken
  )
}

function parseForm(scanner: Scanner): LispValue {
  const token = scanner.peek()
  if (!token) {
    throw new ParseError('Unexpected end of input', scanner.position())
  }
  switch (token.kind) {
    case tokenKeywords.Integer:
      scanner.advance()
      return lispInteger(token.value)
    case tokenKeywords.Symbol:
      scanner.advance()
      return parseSymbol(token)
    case tokenKeywords.LParen:
      return parseList(scanner)
    case tokenKeywords.Quote:
      return parseQuote(scanner)
    default:
      throw new ParseError(
        `Unexpected token: ${getTokenValue(token)} at line ${token.start.line} column ${token.start.col}`,
        token
      )
  }
}

// initializes the scanner and parses the forms, returning a tree of values.
// comments are dropped here, they never reach the evaluator
export function parseForms(input: Token[]): LispValue[] {
  const scanner = makeScanner(input.filter((t) => t.kind !== tokenKeywords.Comment))
  const values: LispValue[] = []
  while (!scanner.isAtEnd()) {
    values.push(parseForm(scanner))
  }
  return values
}

export function parse(source: string): LispValue {
  const forms = parseForms(tokenize(source))
  if (forms.length !== 1) {
    throw new ParseError(
      `Expected exactly one expression, found ${forms.length}`,
      { source, count: forms.length }
    )
  }
  return forms[0]
}
