import { describe, expect, it, vi } from 'vitest'
import { createSession } from '../session'
import { lookup } from '../env'
import { UnboundSymbolError } from '../errors'
import { lispInteger, lispNil, lispSymbol } from '../factories'
import { ParseError } from '../parser'

describe('session', () => {
  it('should evaluate every top-level form and return the last value', () => {
    const session = createSession()
    expect(session.evaluate('(define x 3) (define y 4) (* x y)')).toEqual(
      lispInteger(12n)
    )
  })

  it('should return nil for empty source', () => {
    expect(createSession().evaluate('   ; nothing here')).toEqual(lispNil())
  })

  it('should keep definitions between evaluations', () => {
    const session = createSession()
    session.evaluate('(define counter 1)')
    expect(lookup('counter', session.env)).toEqual(lispInteger(1n))
    expect(session.evaluate('(+ counter 1)')).toEqual(lispInteger(2n))
  })

  it('should route print to the configured output', () => {
    const output = vi.fn()
    const session = createSession({ output })
    session.evaluate("(print 'hello)")
    expect(output).toHaveBeenCalledWith('hello')
    expect(session.env.output).toBe(output)
  })

  it('should evaluate pre-parsed forms', () => {
    const session = createSession()
    session.evaluate('(define a 7)')
    expect(session.evaluateForms([lispSymbol('a')])).toEqual(lispInteger(7n))
  })

  it('should propagate parse and evaluation errors', () => {
    const session = createSession()
    expect(() => session.evaluate('(+ 1')).toThrow(ParseError)
    expect(() => session.evaluate('missing')).toThrow(UnboundSymbolError)
  })
})
