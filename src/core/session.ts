import { makeEnv } from './env'
import { evaluateForms } from './evaluator'
import { parseForms } from './parser'
import { tokenize } from './tokenizer'
import type { Env, LispValue, OutputSink } from './types'

export type SessionOptions = {
  output?: OutputSink
}

export type Session = {
  readonly env: Env
  evaluate: (source: string) => LispValue
  evaluateForms: (forms: LispValue[]) => LispValue
}

// a root env that persists definitions across calls
export function createSession(options?: SessionOptions): Session {
  const env = makeEnv(undefined, { output: options?.output })

  return {
    env,
    evaluate(source: string) {
      return evaluateForms(parseForms(tokenize(source)), env)
    },
    evaluateForms(forms: LispValue[]) {
      return evaluateForms(forms, env)
    },
  }
}
