import { valueKeywords, type LispValue } from './types'

export function printString(value: LispValue): string {
  switch (value.kind) {
    case valueKeywords.integer:
      return value.value.toString()
    case valueKeywords.boolean:
      return value.value ? 'true' : 'false'
    case valueKeywords.nil:
      return 'nil'
    case valueKeywords.symbol:
      return `${value.name}`
    case valueKeywords.list:
      return `(${value.value.map(printString).join(' ')})`
    case valueKeywords.closure:
      return `<closure/${value.params.length}>`
  }
}
