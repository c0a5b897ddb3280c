// Contract violations raised by the buffers
// These indicate misuse or undersized buffers and are never returned as values

export type BufferContractErrorKind = 'CapacityExceeded' | 'RetentionOverflow' | 'OutOfRange'

/**
 * Base class for every fatal buffer error
 */
export abstract class BufferContractError extends Error {
  abstract readonly kind: BufferContractErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * More elements were marked valid than storage can hold
 */
export class CapacityExceededError extends BufferContractError {
  readonly kind = 'CapacityExceeded'

  constructor(
    readonly requested: number,
    readonly capacity: number
  ) {
    super(`Capacity exceeded: requested length ${requested} but capacity is ${capacity}`)
  }
}

/**
 * A retained tail does not fit the region reserved for it
 */
export class RetentionOverflowError extends BufferContractError {
  readonly kind = 'RetentionOverflow'

  constructor(
    readonly retained: number,
    readonly limit: number
  ) {
    super(`Retention overflow: cannot retain ${retained} elements, limit is ${limit}`)
  }
}

/**
 * An index, count or size argument outside its valid range
 */
export class OutOfRangeError extends BufferContractError {
  readonly kind = 'OutOfRange'

  constructor(
    readonly argument: string,
    readonly value: number,
    readonly min: number,
    readonly max: number
  ) {
    super(`${argument} must be an integer between ${min} and ${max}, got ${value}`)
  }
}

/**
 * Throws OutOfRangeError unless value is an integer in [min, max]
 */
export function assertInRange(argument: string, value: number, max: number, min = 0): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new OutOfRangeError(argument, value, min, max)
  }
}
