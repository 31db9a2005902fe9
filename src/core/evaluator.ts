import { define, extend, getRootEnv, lookup } from './env'
import {
  ArityError,
  DivisionByZeroError,
  EmptyListError,
  InvalidASTError,
  NotCallableError,
  WrongTypeError,
} from './errors'
import {
  isArithmeticOperator,
  isListOperator,
  type ArithmeticOperator,
  type Command,
  type ListOperator,
} from './commands'
import { lispBoolean, lispClosure, lispInteger, lispList, lispNil } from './factories'
import { printString } from './printer'
import {
  isAtom,
  isClosure,
  isCommand,
  isEqual,
  isInteger,
  isList,
  isSymbol,
  isTruthy,
} from './assertions'
import {
  valueKeywords,
  type Env,
  type LispClosure,
  type LispList,
  type LispSymbol,
  type LispValue,
} from './types'

type Args = readonly LispValue[]

const writeStdout = (text: string) => {
  process.stdout.write(`${text}\n`)
}

function assertArity(command: string, args: Args, expected: number) {
  if (args.length !== expected) {
    throw new ArityError(
      `${command} expects exactly ${expected} argument${expected === 1 ? '' : 's'}, but ${args.length} were provided`,
      expected,
      args.length,
      { command, args }
    )
  }
}

function evaluateListArg(command: string, arg: LispValue, env: Env): LispList {
  const value = evaluate(arg, env)
  if (!isList(value)) {
    throw new WrongTypeError(`${command} expects a list, got ${printString(value)}`, {
      command,
      value,
    })
  }
  return value
}

export function applyClosure(
  closure: LispClosure,
  argExprs: Args,
  callerEnv: Env
): LispValue {
  if (closure.params.length !== argExprs.length) {
    throw new ArityError(
      `${closure.params.length} parameters expected by function, ${argExprs.length} were provided`,
      closure.params.length,
      argExprs.length,
      { closure, argExprs }
    )
  }
  const args = argExprs.map((expr) => evaluate(expr, callerEnv))
  const bindings = new Map<string, LispValue>()
  closure.params.forEach((param, i) => {
    bindings.set(param.name, args[i])
  })
  return evaluate(closure.body, extend(bindings, closure.env))
}

export function evaluateLambda(args: Args, env: Env): LispValue {
  assertArity('lambda', args, 2)
  const [params, body] = args
  if (!isList(params)) {
    throw new WrongTypeError('lambda expects a list of parameters as its first argument', {
      params,
      env,
    })
  }
  // (lambda () body) is an eager thunk: the body runs now and its value is returned
  if (params.value.length === 0) {
    return evaluate(body, env)
  }
  const symbols = params.value.map((param): LispSymbol => {
    if (!isSymbol(param)) {
      throw new WrongTypeError(`lambda parameters must be symbols, got ${printString(param)}`, {
        params,
      })
    }
    return param
  })
  return lispClosure(symbols, body, env)
}

export function evaluateArithmetic(
  operator: ArithmeticOperator,
  args: Args,
  env: Env
): LispValue {
  assertArity(operator, args, 2)
  const toInteger = (arg: LispValue): bigint => {
    const value = evaluate(arg, env)
    if (!isInteger(value)) {
      throw new WrongTypeError(
        `${operator} expects integer operands, got ${printString(value)}`,
        { operator, value }
      )
    }
    return value.value
  }
  const x = toInteger(args[0])
  const y = toInteger(args[1])

  switch (operator) {
    case '+':
      return lispInteger(x + y)
    case '-':
      return lispInteger(x - y)
    case '*':
      return lispInteger(x * y)
    case '/':
    case 'mod':
      if (y === 0n) {
        throw new DivisionByZeroError(`${operator} by zero`, { operator, x, y })
      }
      // bigint division truncates toward zero, the remainder takes the dividend's sign
      return lispInteger(operator === '/' ? x / y : x % y)
    case '>':
      return lispBoolean(x > y)
    case '<':
      return lispBoolean(x < y)
  }
}

export function evaluateListOperation(
  operator: ListOperator,
  args: Args,
  env: Env
): LispValue {
  switch (operator) {
    case 'cons': {
      assertArity(operator, args, 2)
      const head = evaluate(args[0], env)
      const rest = evaluateListArg(operator, args[1], env)
      return lispList([head, ...rest.value])
    }
    case 'head':
    case 'tail': {
      assertArity(operator, args, 1)
      const list = evaluateListArg(operator, args[0], env)
      if (list.value.length === 0) {
        throw new EmptyListError(`${operator} expects a non-empty list`, { list })
      }
      return operator === 'head' ? list.value[0] : lispList(list.value.slice(1))
    }
    case 'empty': {
      assertArity(operator, args, 1)
      const list = evaluateListArg(operator, args[0], env)
      return lispBoolean(list.value.length === 0)
    }
  }
}

export function evaluateCommand(
  command: Command,
  args: Args,
  env: Env
): LispValue {
  if (isArithmeticOperator(command)) {
    return evaluateArithmetic(command, args, env)
  }
  if (isListOperator(command)) {
    return evaluateListOperation(command, args, env)
  }
  switch (command) {
    case 'quote':
      // (quote expr) -> expr (unevaluated)
      assertArity(command, args, 1)
      return args[0]
    case 'atom':
      assertArity(command, args, 1)
      return lispBoolean(isAtom(evaluate(args[0], env)))
    case 'eq': {
      assertArity(command, args, 2)
      const a = evaluate(args[0], env)
      const b = evaluate(args[1], env)
      return lispBoolean(isEqual(a, b))
    }
    case 'if': {
      // (if predicate then else), only the chosen branch is evaluated
      assertArity(command, args, 3)
      const predicate = evaluate(args[0], env)
      return isTruthy(predicate)
        ? evaluate(args[1], env)
        : evaluate(args[2], env)
    }
    case 'define': {
      // (define name expr) -> nil, binds name in the current env
      assertArity(command, args, 2)
      const name = args[0]
      if (!isSymbol(name)) {
        throw new WrongTypeError(
          `define expects a symbol as its first argument, got ${printString(name)}`,
          { name, env }
        )
      }
      define(name.name, evaluate(args[1], env), env)
      return lispNil()
    }
    case 'lambda':
      return evaluateLambda(args, env)
    case 'print': {
      assertArity(command, args, 1)
      const value = evaluate(args[0], env)
      const output = getRootEnv(env).output ?? writeStdout
      output(printString(value))
      return value
    }
  }
}

export function evaluateList(list: LispList, env: Env): LispValue {
  if (list.value.length === 0) {
    return list
  }
  const [first, ...rest] = list.value

  if (isCommand(first)) {
    return evaluateCommand(first.name, rest, env)
  }

  if (isSymbol(first)) {
    const fn = lookup(first.name, env)
    if (!isClosure(fn)) {
      throw new NotCallableError(
        `Symbol ${first.name} must evaluate to a function, got ${printString(fn)}`,
        { symbol: first.name, value: fn }
      )
    }
    return applyClosure(fn, rest, env)
  }

  if (isClosure(first)) {
    return applyClosure(first, rest, env)
  }

  const evaledFirst = evaluate(first, env)
  if (isClosure(evaledFirst)) {
    return applyClosure(evaledFirst, rest, env)
  }
  // a non-callable head is evaluated for effect and the tail is evaluated as
  // an expression of its own. Kept for compatibility, do not build on it.
  if (rest.length === 0) {
    return evaledFirst
  }
  return evaluate(lispList(rest), env)
}

export function evaluate(expr: LispValue, env: Env): LispValue {
  switch (expr.kind) {
    // self-evaluating forms
    case valueKeywords.integer:
    case valueKeywords.boolean:
    case valueKeywords.nil:
    case valueKeywords.closure:
      return expr
    case valueKeywords.symbol:
      return lookup(expr.name, env)
    case valueKeywords.list:
      return evaluateList(expr, env)
    default:
      throw new InvalidASTError('Unexpected value', { expr, env })
  }
}

export function evaluateForms(forms: readonly LispValue[], env: Env): LispValue {
  let result: LispValue = lispNil()
  for (const form of forms) {
    result = evaluate(form, env)
  }
  return result
}
