// Session API
export { createSession } from './session'
export type { Session, SessionOptions } from './session'

// Environment
export { makeEnv, lookup, define, extend, getRootEnv } from './env'

// Evaluator
export { evaluate, evaluateForms, applyClosure } from './evaluator'

// Errors
export {
  EvaluationError,
  ArityError,
  WrongTypeError,
  EmptyListError,
  UnboundSymbolError,
  NotCallableError,
  InvalidASTError,
  DivisionByZeroError,
} from './errors'

// Commands
export {
  specialFormKeywords,
  arithmeticOperators,
  listOperators,
  commandFamily,
} from './commands'
export type { Command, CommandFamily } from './commands'

// Reader
export { tokenize, TokenizerError } from './tokenizer'
export { parse, parseForms, ParseError } from './parser'

// Factories
export {
  lispInteger,
  lispBoolean,
  lispSymbol,
  lispList,
  lispNil,
  lispClosure,
} from './factories'

// Assertions
export {
  isFalsy,
  isTruthy,
  isSymbol,
  isBoolean,
  isInteger,
  isList,
  isClosure,
  isNil,
  isAtom,
  isCommand,
  isEqual,
} from './assertions'

// Printer
export { printString } from './printer'

// Types
export type {
  LispValue,
  LispInteger,
  LispBoolean,
  LispSymbol,
  LispList,
  LispClosure,
  LispNil,
  Env,
  OutputSink,
} from './types'
