import { describe, it, expect } from 'vitest'
import { define, extend, getRootEnv, lookup, makeEnv } from '../env'
import { UnboundSymbolError } from '../errors'
import { lispInteger } from '../factories'

describe('env', () => {
  it('should make a new environment', () => {
    const env = makeEnv()
    expect(env.bindings).toBeInstanceOf(Map)
    expect(env.bindings.size).toBe(0)
    expect(env.outer).toBeNull()
    expect(env.output).toBeUndefined()
  })

  it('should keep the output sink it was given', () => {
    const output = (_text: string) => {}
    const env = makeEnv(undefined, { output })
    expect(env.output).toBe(output)
  })

  it('should define a new binding', () => {
    const env = makeEnv()
    define('x', lispInteger(1n), env)
    expect(env.bindings.get('x')).toEqual(lispInteger(1n))
  })

  it('should overwrite an existing local binding', () => {
    const env = makeEnv()
    define('x', lispInteger(1n), env)
    define('x', lispInteger(2n), env)
    expect(lookup('x', env)).toEqual(lispInteger(2n))
  })

  it('should lookup a binding in the environment', () => {
    const env = makeEnv()
    define('x', lispInteger(1n), env)
    expect(lookup('x', env)).toEqual(lispInteger(1n))
  })

  it('should extend an environment with new bindings', () => {
    const env = makeEnv()
    define('x', lispInteger(1n), env)
    const extended = extend(new Map([['y', lispInteger(2n)]]), env)
    expect(extended.outer).toBe(env)
    expect(lookup('x', extended)).toEqual(lispInteger(1n))
    expect(lookup('y', extended)).toEqual(lispInteger(2n))
    // the parent is read through, never copied
    expect(extended.bindings.has('x')).toBe(false)
    expect(env.bindings.has('y')).toBe(false)
  })

  it('should see parent bindings defined after the child was created', () => {
    const outer = makeEnv()
    const inner = extend(new Map(), outer)
    define('late', lispInteger(7n), outer)
    expect(lookup('late', inner)).toEqual(lispInteger(7n))
  })

  it('should only define into the local env', () => {
    const outer = makeEnv()
    const inner = extend(new Map(), outer)
    define('x', lispInteger(3n), inner)
    expect(() => lookup('x', outer)).toThrow(UnboundSymbolError)
  })

  it('should throw when looking up a symbol that is not defined', () => {
    const env = makeEnv()
    expect(() => lookup('x', env)).toThrow('Symbol x not found')
    expect(() => lookup('x', env)).toThrow(UnboundSymbolError)
  })

  it('should shadow parent bindings in the child env', () => {
    const outer = makeEnv()
    define('x', lispInteger(1n), outer)
    const inner = extend(new Map([['x', lispInteger(99n)]]), outer)
    expect(lookup('x', inner)).toEqual(lispInteger(99n))
    expect(lookup('x', outer)).toEqual(lispInteger(1n))
  })

  it('should find the root env from any depth', () => {
    const root = makeEnv()
    const leaf = extend(new Map(), extend(new Map(), root))
    expect(getRootEnv(leaf)).toBe(root)
    expect(getRootEnv(root)).toBe(root)
  })
})
