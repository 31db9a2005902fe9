export const valueKeywords = {
  integer: 'integer',
  boolean: 'boolean',
  symbol: 'symbol',
  list: 'list',
  closure: 'closure',
  nil: 'nil',
} as const
export type ValueKeywords = (typeof valueKeywords)[keyof typeof valueKeywords]

export type LispInteger = { kind: 'integer'; value: bigint }
export type LispBoolean = { kind: 'boolean'; value: boolean }
export type LispSymbol = { kind: 'symbol'; name: string }
export type LispList = { kind: 'list'; value: readonly LispValue[] }
export type LispNil = { kind: 'nil'; value: null }

export type OutputSink = (text: string) => void

export type Env = {
  bindings: Map<string, LispValue>
  outer: Env | null
  // only read from the root env, see getRootEnv
  output?: OutputSink
}

export type LispClosure = {
  kind: 'closure'
  params: readonly LispSymbol[]
  body: LispValue
  env: Env // captured environment at the time of lambda creation
}

export type LispValue =
  | LispInteger
  | LispBoolean
  | LispSymbol
  | LispList
  | LispClosure
  | LispNil // returned by define, never produced by the parser

/** Tokens */
export const tokenKeywords = {
  LParen: 'LParen',
  RParen: 'RParen',
  Integer: 'Integer',
  Quote: 'Quote',
  Comment: 'Comment',
  Symbol: 'Symbol',
} as const
export const tokenSymbols = {
  Quote: 'quote',
  LParen: '(',
  RParen: ')',
} as const
export type TokenSymbols = (typeof tokenSymbols)[keyof typeof tokenSymbols]
export type TokenKinds = keyof typeof tokenKeywords

export type Cursor = {
  line: number
  col: number
  offset: number
}

export type TokenLParen = {
  kind: 'LParen'
  value: '('
}
export type TokenRParen = {
  kind: 'RParen'
  value: ')'
}
export type TokenInteger = {
  kind: 'Integer'
  value: bigint
}
export type TokenQuote = {
  kind: 'Quote'
  value: 'quote'
}
export type TokenComment = {
  kind: 'Comment'
  value: string
}
export type TokenSymbol = {
  kind: 'Symbol'
  value: string
}
export type Token = (
  | TokenLParen
  | TokenRParen
  | TokenInteger
  | TokenQuote
  | TokenComment
  | TokenSymbol
) & { start: Cursor; end: Cursor }
