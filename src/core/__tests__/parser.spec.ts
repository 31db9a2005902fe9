import { describe, it, expect } from 'vitest'
import { parse, parseForms, ParseError } from '../parser'
import { lispBoolean, lispInteger, lispList, lispSymbol } from '../factories'
import { tokenize, TokenizerError } from '../tokenizer'

describe('parser', () => {
  it('should parse an empty list', () => {
    expect(parseForms(tokenize('()'))).toEqual([lispList([])])
  })

  it('should parse a list with multiple elements', () => {
    expect(parseForms(tokenize('(1 2 3)'))).toEqual([
      lispList([lispInteger(1n), lispInteger(2n), lispInteger(3n)]),
    ])
  })

  it('should parse nested lists', () => {
    expect(parse('(a (b (c)))')).toEqual(
      lispList([
        lispSymbol('a'),
        lispList([lispSymbol('b'), lispList([lispSymbol('c')])]),
      ])
    )
  })

  it.each([
    ['#t', true],
    ['#f', false],
    ['true', true],
    ['false', false],
  ])('should parse %s as a boolean', (input, expected) => {
    expect(parse(input)).toEqual(lispBoolean(expected))
  })

  it('should parse other symbols as symbols', () => {
    expect(parse('nil')).toEqual(lispSymbol('nil'))
    expect(parse('toString')).toEqual(lispSymbol('toString'))
  })

  it('should expand quote shorthand', () => {
    expect(parse("'(1 x)")).toEqual(
      lispList([
        lispSymbol('quote'),
        lispList([lispInteger(1n), lispSymbol('x')]),
      ])
    )
    expect(parse("''a")).toEqual(
      lispList([
        lispSymbol('quote'),
        lispList([lispSymbol('quote'), lispSymbol('a')]),
      ])
    )
  })

  it('should drop comments', () => {
    expect(parseForms(tokenize('; header\n(1 ; inline\n 2) ; trailing'))).toEqual(
      [lispList([lispInteger(1n), lispInteger(2n)])]
    )
  })

  it('should parse several top-level forms', () => {
    expect(parseForms(tokenize('1 (a) #f'))).toEqual([
      lispInteger(1n),
      lispList([lispSymbol('a')]),
      lispBoolean(false),
    ])
  })

  it('should report unmatched lists with their position', () => {
    expect(() => parse('(1 (2 3)')).toThrow(ParseError)
    expect(() => parse('(1 (2 3)')).toThrow(
      'Unmatched list started at line 0 column 0'
    )
  })

  it('should reject a stray closing paren', () => {
    expect(() => parse(')')).toThrow('Unexpected token: ) at line 0 column 0')
  })

  it('should reject a dangling quote', () => {
    expect(() => parse("'")).toThrow(
      'Unexpected end of input while parsing quote'
    )
  })

  it('should require exactly one expression in parse', () => {
    expect(() => parse('')).toThrow('Expected exactly one expression, found 0')
    expect(() => parse('1 2')).toThrow(
      'Expected exactly one expression, found 2'
    )
  })

  it('should surface tokenizer errors', () => {
    expect(() => parse('(1x)')).toThrow(TokenizerError)
  })
})
