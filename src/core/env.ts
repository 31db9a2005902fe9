import { UnboundSymbolError } from './errors'
import type { Env, LispValue, OutputSink } from './types'

type EnvOptions = {
  output?: OutputSink
}

export function makeEnv(outer?: Env, options?: EnvOptions): Env {
  const env: Env = {
    bindings: new Map(),
    outer: outer ?? null,
  }
  if (options?.output) {
    env.output = options.output
  }
  return env
}

export function lookup(name: string, env: Env): LispValue {
  let current: Env | null = env
  while (current) {
    const value = current.bindings.get(name)
    if (value !== undefined) {
      return value
    }
    current = current.outer
  }
  throw new UnboundSymbolError(name)
}

// writes into the given env only, parents are never touched
export function define(name: string, value: LispValue, env: Env) {
  env.bindings.set(name, value)
}

export function extend(bindings: Map<string, LispValue>, outer: Env): Env {
  const env = makeEnv(outer)
  for (const [name, value] of bindings) {
    define(name, value, env)
  }
  return env
}

export function getRootEnv(env: Env): Env {
  let current = env
  while (current.outer) {
    current = current.outer
  }
  return current
}
