export type ErrorContext = Record<string, unknown>

export class EvaluationError extends Error {
  context: ErrorContext
  constructor(message: string, context: ErrorContext = {}) {
    super(message)
    this.name = 'EvaluationError'
    this.context = context
  }
}

export class ArityError extends EvaluationError {
  expected: number
  received: number
  constructor(
    message: string,
    expected: number,
    received: number,
    context: ErrorContext = {}
  ) {
    super(message, { ...context, expected, received })
    this.name = 'ArityError'
    this.expected = expected
    this.received = received
  }
}

// an operand had the wrong shape, e.g. a non-list passed to cons
export class WrongTypeError extends EvaluationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context)
    this.name = 'WrongTypeError'
  }
}

export class EmptyListError extends EvaluationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context)
    this.name = 'EmptyListError'
  }
}

export class UnboundSymbolError extends EvaluationError {
  symbol: string
  constructor(symbol: string, context: ErrorContext = {}) {
    super(`Symbol ${symbol} not found`, { ...context, symbol })
    this.name = 'UnboundSymbolError'
    this.symbol = symbol
  }
}

export class NotCallableError extends EvaluationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context)
    this.name = 'NotCallableError'
  }
}

export class InvalidASTError extends EvaluationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context)
    this.name = 'InvalidASTError'
  }
}

export class DivisionByZeroError extends EvaluationError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context)
    this.name = 'DivisionByZeroError'
  }
}
