/**
 * Thrown when dividing by an interval whose closed range includes zero. There is no finite enclosure to return, so
 * the caller has to decide what to do with the point.
 */
export class DivisionByZeroError extends Error {
  constructor (message: string = 'Division by an interval containing zero') {
    super(message)

    this.name = 'DivisionByZeroError'
  }
}

/**
 * Thrown when raising an interval to an exponent that isn't (or isn't known to be) an integer
 */
export class PowerIsNotIntegerError extends Error {
  constructor (message: string) {
    super(message)

    this.name = 'PowerIsNotIntegerError'
  }
}
