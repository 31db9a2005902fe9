export const specialFormKeywords = {
  quote: 'quote',
  atom: 'atom',
  eq: 'eq',
  if: 'if',
  define: 'define',
  lambda: 'lambda',
  print: 'print',
} as const

export const arithmeticOperators = {
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  mod: 'mod',
  '>': '>',
  '<': '<',
} as const

export const listOperators = {
  cons: 'cons',
  head: 'head',
  tail: 'tail',
  empty: 'empty',
} as const

export type SpecialForm = keyof typeof specialFormKeywords
export type ArithmeticOperator = keyof typeof arithmeticOperators
export type ListOperator = keyof typeof listOperators
export type Command = SpecialForm | ArithmeticOperator | ListOperator

export type CommandFamily = 'special-form' | 'arithmetic' | 'list'

const hasKey = <T extends object>(table: T, name: string): name is Extract<keyof T, string> =>
  Object.prototype.hasOwnProperty.call(table, name)

export const isSpecialFormName = (name: string): name is SpecialForm =>
  hasKey(specialFormKeywords, name)
export const isArithmeticOperator = (name: string): name is ArithmeticOperator =>
  hasKey(arithmeticOperators, name)
export const isListOperator = (name: string): name is ListOperator =>
  hasKey(listOperators, name)

export function commandFamily(name: string): CommandFamily | null {
  if (isSpecialFormName(name)) return 'special-form'
  if (isArithmeticOperator(name)) return 'arithmetic'
  if (isListOperator(name)) return 'list'
  return null
}
