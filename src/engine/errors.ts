// Error types raised by the dice chain

export class DiceChainError extends Error {
  constructor(message: string, public code: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Caller supplied a value the engine cannot work with (non-positive roll
 * count, value outside the field, unparsable text). Retrying with the same
 * input cannot succeed.
 */
export class InvalidArgumentError extends DiceChainError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT')
  }
}

/**
 * The outcome reduction produced something outside [1, 6].
 * Only reachable through a defect in the reduction step.
 */
export class ConversionOverflowError extends DiceChainError {
  constructor(message: string) {
    super(message, 'CONVERSION_OVERFLOW')
  }
}
