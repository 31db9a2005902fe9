import { commandFamily, type Command } from './commands'
import {
  valueKeywords,
  type LispBoolean,
  type LispClosure,
  type LispInteger,
  type LispList,
  type LispNil,
  type LispSymbol,
  type LispValue,
} from './types'

export const isFalsy = (value: LispValue): boolean => {
  switch (value.kind) {
    case valueKeywords.nil:
      return true
    case valueKeywords.boolean:
      return !value.value
    case valueKeywords.integer:
      return value.value === 0n
    case valueKeywords.list:
      return value.value.length === 0
    default:
      return false
  }
}
export const isTruthy = (value: LispValue): boolean => {
  return !isFalsy(value)
}
export const isSymbol = (value: LispValue): value is LispSymbol =>
  value.kind === 'symbol'
export const isBoolean = (value: LispValue): value is LispBoolean =>
  value.kind === 'boolean'
export const isInteger = (value: LispValue): value is LispInteger =>
  value.kind === 'integer'
export const isList = (value: LispValue): value is LispList =>
  value.kind === 'list'
export const isClosure = (value: LispValue): value is LispClosure =>
  value.kind === 'closure'
export const isNil = (value: LispValue): value is LispNil =>
  value.kind === 'nil'
export const isAtom = (
  value: LispValue
): value is LispInteger | LispBoolean | LispSymbol | LispNil =>
  !isList(value) && !isClosure(value)
export const isCommand = (
  value: LispValue
): value is LispSymbol & { name: Command } =>
  isSymbol(value) && commandFamily(value.name) !== null

export const isEqual = (a: LispValue, b: LispValue): boolean => {
  switch (a.kind) {
    case valueKeywords.integer:
      return isInteger(b) && a.value === b.value
    case valueKeywords.boolean:
      return isBoolean(b) && a.value === b.value
    case valueKeywords.symbol:
      return isSymbol(b) && a.name === b.name
    case valueKeywords.nil:
      return isNil(b)
    case valueKeywords.list:
      if (!isList(b) || a.value.length !== b.value.length) return false
      return a.value.every((value, index) => isEqual(value, b.value[index]))
    case valueKeywords.closure:
      return a === b
  }
}
