/**
 * Powers, roots and modulo of intervals. These branch on the signs of the bounds and on the parity of the exponent;
 * the bounds themselves come from the directed scalar routines, rounded outward.
 */
import { powRounded, rootRounded, sqrtRounded } from '../fp/directed.js'
import { ROUNDING_MODE } from '../other/rounding_modes.js'
import { localWarn } from '../shared.js'
import { DivisionByZeroError, PowerIsNotIntegerError } from './errors.js'
import { EMPTY, Interval, ONE } from './interval.js'

const DOWN = ROUNDING_MODE.DOWN
const UP = ROUNDING_MODE.UP

/**
 * Round a singleton exponent or root index to the integer it stands for, warning when that changes it
 */
function singletonToInteger (n: Interval, what: string): number {
  const value = n.low
  const rounded = Math.round(value)

  if (rounded !== value) {
    localWarn(`${what} ${value} was rounded to ${rounded}`, `${what}-rounded`)
  }

  return rounded
}

// The part of x where even roots are real
function nonNegativePart (x: Interval): Interval {
  return x.intersect(new Interval(0, Infinity))
}

/**
 * x^n for an integer n. Negative n goes through the reciprocal.
 * @param x Base
 * @param n Integer exponent
 * @throws PowerIsNotIntegerError if n isn't an integer
 */
export function pow (x: Interval, n: number): Interval {
  if (!Number.isInteger(n)) throw new PowerIsNotIntegerError(`Power ${n} is not an integer`)
  if (x.isEmpty()) return EMPTY
  if (n === 0) return ONE
  if (n < 0) return pow(x.multiplicativeInverse(), -n)

  const { low, high } = x
  const odd = n % 2 === 1

  if (low >= 0) {
    // [positive, positive]: monotone
    return new Interval(powRounded(low, n, DOWN), powRounded(high, n, UP))
  }

  if (high <= 0) {
    // [negative, negative]: work with magnitudes, which reverse order
    const lo = powRounded(-high, n, DOWN)
    const hi = powRounded(-low, n, UP)

    return odd ? new Interval(-hi, -lo) : new Interval(lo, hi)
  }

  // [negative, positive]
  if (odd) return new Interval(-powRounded(-low, n, UP), powRounded(high, n, UP))

  return new Interval(0, powRounded(Math.max(-low, high), n, UP))
}

/**
 * x^n where n is an interval, which must be a singleton
 * @throws PowerIsNotIntegerError if n isn't a singleton
 */
export function powInterval (x: Interval, n: Interval): Interval {
  if (!n.isSingleton()) throw new PowerIsNotIntegerError(`Power ${n} is not an integer`)

  return pow(x, singletonToInteger(n, 'Power'))
}

/**
 * Square root. The negative part of x, where the root isn't real, is discarded; a negative x gives the empty interval.
 */
export function sqrt (x: Interval): Interval {
  const domain = nonNegativePart(x)
  if (domain.isEmpty()) return EMPTY

  return new Interval(sqrtRounded(domain.low, DOWN), sqrtRounded(domain.high, UP))
}

/**
 * x^(1/n) for a positive integer n. Odd roots keep the sign; even roots discard the negative part of x, as sqrt does.
 * Any other n gives the empty interval.
 */
export function nthRoot (x: Interval, n: number): Interval {
  if (x.isEmpty() || !Number.isInteger(n) || n < 1) return EMPTY
  if (n === 1) return x
  if (n === 2) return sqrt(x)

  if (n % 2 === 1) {
    return new Interval(rootRounded(x.low, n, DOWN), rootRounded(x.high, n, UP))
  }

  const domain = nonNegativePart(x)
  if (domain.isEmpty()) return EMPTY

  return new Interval(rootRounded(domain.low, n, DOWN), rootRounded(domain.high, n, UP))
}

/**
 * x^(1/n) where n is an interval. Empty unless n is a singleton.
 */
export function nthRootInterval (x: Interval, n: Interval): Interval {
  if (!n.isSingleton()) return EMPTY

  return nthRoot(x, singletonToInteger(n, 'Root'))
}

/**
 * Computes x mod y = x - k * y with k = trunc(x / y), so the result has the sign of x and magnitude below |y| and at
 * most |x|. Since that only depends on |y|, we work with |y| = [m, M]. The quotient x / |y| bounds k; if only one k is
 * possible we subtract k * |y| directly, otherwise the sign and magnitude bounds are all we have.
 * @throws DivisionByZeroError if y contains zero
 */
export function fmod (x: Interval, y: Interval): Interval {
  if (y.hasZero()) throw new DivisionByZeroError()
  if (x.isEmpty() || y.isEmpty()) return EMPTY

  const divisor = (y.high < 0) ? y.negate() : y
  const M = divisor.high

  const range = new Interval(
    (x.low >= 0) ? 0 : Math.max(-M, x.low),
    (x.high <= 0) ? 0 : Math.min(M, x.high)
  )

  const quotient = x.divide(divisor)
  const kLow = Math.trunc(quotient.low)
  const kHigh = Math.trunc(quotient.high)

  if (kLow === kHigh) {
    return x.subtract(new Interval(kLow).multiply(divisor)).intersect(range)
  }

  return range
}
