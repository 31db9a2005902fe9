import type {
  Env,
  LispBoolean,
  LispClosure,
  LispInteger,
  LispList,
  LispNil,
  LispSymbol,
  LispValue,
} from './types'

export const lispInteger = <T extends bigint>(value: T) =>
  ({ kind: 'integer', value }) as const satisfies LispInteger
export const lispBoolean = <T extends boolean>(value: T) =>
  ({ kind: 'boolean', value }) as const satisfies LispBoolean
export const lispSymbol = <T extends string>(name: T) =>
  ({ kind: 'symbol', name }) as const satisfies LispSymbol
export const lispList = <T extends readonly LispValue[]>(value: T) =>
  ({ kind: 'list', value }) as const satisfies LispList
export const lispNil = () =>
  ({ kind: 'nil', value: null }) as const satisfies LispNil
export const lispClosure = (
  params: readonly LispSymbol[],
  body: LispValue,
  env: Env
): LispClosure => ({
  kind: 'closure',
  params,
  body,
  env,
})
