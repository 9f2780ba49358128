import { floatStore, intView, next, prev } from '../fp/manip.js'
import { addRounded, divHigh, divLow, divRounded, mulRounded, subRounded } from '../fp/directed.js'
import { ROUNDING_MODE } from '../other/rounding_modes.js'
import { localWarn } from '../shared.js'
import { DivisionByZeroError } from './errors.js'
import { fmod, nthRoot, nthRootInterval, pow, powInterval, sqrt } from './interval_algebra.js'

// Absolute tolerance used by isSingleton and almostEqual
let INTERVAL_TOLERANCE: number = 1e-7

/**
 * Set the tolerance used when comparing bounds approximately. Invalid values (negative, NaN, infinite) are ignored
 * with a warning.
 * @param eps Non-negative, finite tolerance
 */
export function setIntervalTolerance (eps: number) {
  if (eps >= 0 && Number.isFinite(eps)) {
    INTERVAL_TOLERANCE = eps
  } else {
    localWarn(`Invalid interval tolerance ${eps}; keeping ${INTERVAL_TOLERANCE}`, 'interval-tolerance')
  }
}

/**
 * Get the tolerance used when comparing bounds approximately
 */
export function getIntervalTolerance (): number {
  return INTERVAL_TOLERANCE
}

function isEqualWithin (x: number, y: number, eps: number): boolean {
  return x === y || Math.abs(x - y) <= eps
}

export type IntervalKind = 'empty' | 'whole' | 'bounded'

// Minimum and maximum of the candidates, skipping NaNs (∞ / ∞ and the like). NaN if every candidate is NaN.
function minOf (values: number[]): number {
  let m = NaN
  for (const v of values) {
    if (v < m || m !== m) m = v
  }

  return m
}

function maxOf (values: number[]): number {
  let m = NaN
  for (const v of values) {
    if (v > m || m !== m) m = v
  }

  return m
}

/**
 * A closed interval [low, high] of real numbers, the empty interval, or the whole real line. Every operation encloses
 * the exact result: for any choice of reals in the operands, the real-valued result lies in the returned interval,
 * bounds being rounded outward. Intervals are immutable; operations return new intervals (or the shared constants).
 *
 * The empty interval reads as low = +inf, high = -inf, but is told apart by its kind, not by its bounds.
 */
export class Interval {
  readonly kind: IntervalKind
  readonly low: number
  readonly high: number

  /**
   * new Interval() is empty, new Interval(v) is the singleton [v, v], and new Interval(low, high) is [low, high], or
   * empty if high < low or a bound is NaN.
   */
  constructor ()
  constructor (value: number)
  constructor (low: number, high: number)
  constructor (low?: number, high?: number) {
    if (high === undefined) high = low

    if (low === undefined || high === undefined || !(low <= high)) {
      this.kind = 'empty'
      this.low = Infinity
      this.high = -Infinity
      return
    }

    // avoid -0, so that sign tests downstream are deterministic
    this.low = low + 0
    this.high = high + 0
    this.kind = (low === -Infinity && high === Infinity) ? 'whole' : 'bounded'
  }

  /**
   * Build an interval from computed bounds. A NaN bound comes from something like ∞ - ∞ and could be anything, so it
   * is widened to the corresponding infinity.
   */
  static fromBounds (low: number, high: number): Interval {
    if (low !== low) low = -Infinity
    if (high !== high) high = Infinity

    return new Interval(low, high)
  }

  add (other: Interval): Interval {
    if (this.isEmpty() || other.isEmpty()) return EMPTY

    return Interval.fromBounds(
      addRounded(this.low, other.low, ROUNDING_MODE.DOWN),
      addRounded(this.high, other.high, ROUNDING_MODE.UP)
    )
  }

  subtract (other: Interval): Interval {
    if (this.isEmpty() || other.isEmpty()) return EMPTY

    // Bounds cross: the smallest difference uses the largest subtrahend
    return Interval.fromBounds(
      subRounded(this.low, other.high, ROUNDING_MODE.DOWN),
      subRounded(this.high, other.low, ROUNDING_MODE.UP)
    )
  }

  multiply (other: Interval): Interval {
    if (this.isEmpty() || other.isEmpty()) return EMPTY

    const { low: a, high: b } = this
    const { low: c, high: d } = other
    const down = ROUNDING_MODE.DOWN, up = ROUNDING_MODE.UP

    return Interval.fromBounds(
      minOf([ mulRounded(a, c, down), mulRounded(a, d, down), mulRounded(b, c, down), mulRounded(b, d, down) ]),
      maxOf([ mulRounded(a, c, up), mulRounded(a, d, up), mulRounded(b, c, up), mulRounded(b, d, up) ])
    )
  }

  /**
   * Interval division
   * @param other Divisor
   * @throws DivisionByZeroError if the divisor contains zero
   */
  divide (other: Interval): Interval {
    if (other.hasZero()) throw new DivisionByZeroError()
    if (this.isEmpty() || other.isEmpty()) return EMPTY

    const { low: a, high: b } = this
    const { low: c, high: d } = other
    const down = ROUNDING_MODE.DOWN, up = ROUNDING_MODE.UP

    return Interval.fromBounds(
      minOf([ divRounded(a, c, down), divRounded(a, d, down), divRounded(b, c, down), divRounded(b, d, down) ]),
      maxOf([ divRounded(a, c, up), divRounded(a, d, up), divRounded(b, c, up), divRounded(b, d, up) ])
    )
  }

  /**
   * Computes 1 / x. A range with zero strictly inside has a reciprocal unbounded on both sides, so we give the whole
   * line; zero at one edge gives a half-infinite range; [0, 0] has no reciprocal at all.
   */
  multiplicativeInverse (): Interval {
    if (this.isEmpty()) return EMPTY

    const { low, high } = this

    if (this.hasZero()) {
      if (low !== 0) {
        // [negative, positive] or [negative, zero]
        return (high !== 0) ? WHOLE : new Interval(-Infinity, divHigh(1, low))
      }

      // [zero, positive] or [zero, zero]
      return (high !== 0) ? new Interval(divLow(1, high), Infinity) : EMPTY
    }

    // same sign; the reciprocal reverses the order
    return new Interval(divLow(1, high), divHigh(1, low))
  }

  negate (): Interval {
    if (this.isEmpty()) return EMPTY

    return new Interval(-this.high, -this.low)
  }

  /**
   * The common part of two intervals; empty if they're disjoint
   */
  intersect (other: Interval): Interval {
    if (this.isEmpty() || other.isEmpty()) return EMPTY

    return new Interval(Math.max(this.low, other.low), Math.min(this.high, other.high))
  }

  contains (x: number): boolean {
    return !this.isEmpty() && this.low <= x && x <= this.high
  }

  hasZero (): boolean {
    return this.contains(0)
  }

  /**
   * Whether the interval is the real line (-inf, inf)
   */
  isWhole (): boolean {
    return this.kind === 'whole'
  }

  /**
   * Whether the interval is [n, n] for finite n, up to the interval tolerance
   */
  isSingleton (): boolean {
    return this.kind === 'bounded' && Number.isFinite(this.low) &&
      isEqualWithin(this.high, this.low, INTERVAL_TOLERANCE)
  }

  isEmpty (): boolean {
    return this.kind === 'empty'
  }

  /**
   * Whether the intervals share at least one point. Always false if either is empty.
   */
  isOverlap (other: Interval): boolean {
    if (this.isEmpty() || other.isEmpty()) return false

    return (this.low <= other.low && other.low <= this.high) ||
      (other.low <= this.low && this.low <= other.high)
  }

  /**
   * Whether both bounds agree with the other's up to the interval tolerance. The empty interval is only almost equal
   * to itself.
   */
  almostEqual (other: Interval): boolean {
    if (this.isEmpty() || other.isEmpty()) return this.isEmpty() && other.isEmpty()

    return isEqualWithin(this.low, other.low, INTERVAL_TOLERANCE) &&
      isEqualWithin(this.high, other.high, INTERVAL_TOLERANCE)
  }

  /**
   * Exact equality; bounds are compared with Object.is
   */
  equals (other: Interval): boolean {
    return this.kind === other.kind && Object.is(this.low, other.low) && Object.is(this.high, other.high)
  }

  /**
   * A 32-bit hash of the bound bit patterns, consistent with equals
   */
  hashCode (): number {
    let h = 17

    floatStore[0] = this.low
    h = (Math.imul(h, 31) + intView[0]) | 0
    h = (Math.imul(h, 31) + intView[1]) | 0

    floatStore[0] = this.high
    h = (Math.imul(h, 31) + intView[0]) | 0
    h = (Math.imul(h, 31) + intView[1]) | 0

    return h
  }

  /**
   * [a, b] -> (a, b], by moving the lower bound to the next float up. A singleton becomes empty.
   */
  halfOpenLeft (): Interval {
    if (this.isEmpty()) return EMPTY

    return new Interval(next(this.low), this.high)
  }

  /**
   * [a, b] -> [a, b), by moving the upper bound to the next float down. A singleton becomes empty.
   */
  halfOpenRight (): Interval {
    if (this.isEmpty()) return EMPTY

    return new Interval(this.low, prev(this.high))
  }

  /**
   * Integer power. An interval exponent must be a singleton.
   * @throws PowerIsNotIntegerError
   */
  pow (power: number | Interval): Interval {
    return (power instanceof Interval) ? powInterval(this, power) : pow(this, power)
  }

  sqrt (): Interval {
    return sqrt(this)
  }

  /**
   * Computes x^(1/n) for a positive integer n; an interval n must be a singleton
   */
  nthRoot (n: number | Interval): Interval {
    return (n instanceof Interval) ? nthRootInterval(this, n) : nthRoot(this, n)
  }

  /**
   * Computes x mod y (x - k * y, k = trunc(x / y))
   * @throws DivisionByZeroError if other contains zero
   */
  fmod (other: Interval): Interval {
    return fmod(this, other)
  }

  toString (): string {
    let result = 'Interval ['

    if (!this.isEmpty()) {
      result += this.low

      if (!this.isSingleton()) {
        result += ', ' + this.high
      }
    }

    return result + ']'
  }
}

export const EMPTY = Object.freeze(new Interval())
export const WHOLE = Object.freeze(new Interval(-Infinity, Infinity))
export const ONE = Object.freeze(new Interval(1))
