import { afterEach, describe, expect, it, vi } from 'vitest'
import { EMPTY, getIntervalTolerance, Interval, ONE, setIntervalTolerance, WHOLE } from './interval.js'
import { DivisionByZeroError, PowerIsNotIntegerError } from './errors.js'
import { next, prev } from '../fp/manip.js'
import { resetWarnings } from '../shared.js'

function I (low: number, high: number): Interval {
  return new Interval(low, high)
}

// Points spread across an interval, endpoints included
function samples (x: Interval, count = 13): number[] {
  const points: number[] = []
  for (let i = 0; i <= count; ++i) {
    const p = x.low + (x.high - x.low) * i / count
    points.push(Math.min(x.high, Math.max(x.low, p)))
  }

  return points
}

const operands = [ I(-2, 3), I(-4, 5), I(0.1, 0.7), I(-3.3, -1.1), I(0, 2.5), I(-1e-3, 0), I(7, 7) ]

describe('construction', () => {
  it('creates singletons', () => {
    const x = new Interval(5)

    expect(x.isSingleton()).toBe(true)
    expect(x.low).toBe(5)
    expect(x.high).toBe(5)
  })

  it('creates empty intervals', () => {
    expect(new Interval(3, 1).isEmpty()).toBe(true)
    expect(new Interval().isEmpty()).toBe(true)
    expect(new Interval(NaN, 1).isEmpty()).toBe(true)
    expect(new Interval(NaN).isEmpty()).toBe(true)
  })

  it('exposes the sentinel bounds of the empty interval', () => {
    expect(EMPTY.low).toBe(Infinity)
    expect(EMPTY.high).toBe(-Infinity)
    expect(EMPTY.kind).toBe('empty')
  })

  it('recognizes the whole line', () => {
    expect(I(-Infinity, Infinity).isWhole()).toBe(true)
    expect(I(-Infinity, Infinity).kind).toBe('whole')
    expect(I(-Infinity, 0).isWhole()).toBe(false)
    expect(WHOLE.isSingleton()).toBe(false)
  })

  it('normalizes negative zero', () => {
    const x = I(-0, -0)

    expect(Object.is(x.low, 0)).toBe(true)
    expect(Object.is(x.high, 0)).toBe(true)
  })

  it('freezes the constants', () => {
    expect(Object.isFrozen(EMPTY)).toBe(true)
    expect(Object.isFrozen(WHOLE)).toBe(true)
    expect(Object.isFrozen(ONE)).toBe(true)
  })
})

describe('addition and subtraction', () => {
  it('adds bounds', () => {
    expect(I(1, 2).add(I(3, 5)).equals(I(4, 7))).toBe(true)
  })

  it('subtracts crosswise', () => {
    expect(I(1, 2).subtract(I(3, 5)).equals(I(-4, -1))).toBe(true)
  })

  it('leaves its operands alone', () => {
    const a = I(1, 2)
    a.add(I(3, 5))

    expect(a.equals(I(1, 2))).toBe(true)
  })

  it('rounds outward', () => {
    const sum = I(0.1, 0.1).add(I(0.2, 0.2))

    expect(sum.low).toBe(0.3)
    expect(sum.high).toBe(0.30000000000000004)
  })

  it('encloses every sampled sum and difference', () => {
    for (const a of operands) {
      for (const b of operands) {
        const sum = a.add(b), difference = a.subtract(b)

        for (const x of samples(a)) {
          for (const y of samples(b)) {
            expect(sum.contains(x + y)).toBe(true)
            expect(difference.contains(x - y)).toBe(true)
          }
        }
      }
    }
  })

  it('propagates emptiness', () => {
    expect(I(1, 2).add(EMPTY).isEmpty()).toBe(true)
    expect(EMPTY.subtract(I(1, 2)).isEmpty()).toBe(true)
  })

  it('widens ∞ - ∞ to the whole line', () => {
    expect(I(Infinity, Infinity).add(I(-Infinity, -Infinity)).isWhole()).toBe(true)
  })
})

describe('multiplication', () => {
  it('takes the extremes of the four cross products', () => {
    expect(I(-2, 3).multiply(I(-4, 5)).equals(I(-12, 15))).toBe(true)
    expect(I(2, 3).multiply(I(4, 5)).equals(I(8, 15))).toBe(true)
    expect(I(-3, -2).multiply(I(4, 5)).equals(I(-15, -8))).toBe(true)
  })

  it('does not produce negative zero', () => {
    const x = I(-1, 0).multiply(I(0, 0))

    expect(Object.is(x.low, 0)).toBe(true)
    expect(Object.is(x.high, 0)).toBe(true)
  })

  it('treats zero times infinity as zero', () => {
    expect(I(0, 1).multiply(I(1, Infinity)).equals(I(0, Infinity))).toBe(true)
    expect(WHOLE.multiply(WHOLE).isWhole()).toBe(true)
  })

  it('encloses every sampled product', () => {
    for (const a of operands) {
      for (const b of operands) {
        const product = a.multiply(b)

        for (const x of samples(a)) {
          for (const y of samples(b)) {
            expect(product.contains(x * y)).toBe(true)
          }
        }
      }
    }
  })
})

describe('division', () => {
  it('divides a zero numerator', () => {
    expect(I(0, 0).divide(I(1, 2)).equals(I(0, 0))).toBe(true)
  })

  it('rejects divisors containing zero', () => {
    expect(() => I(1, 2).divide(I(-1, 1))).toThrow(DivisionByZeroError)
    expect(() => I(1, 2).divide(I(0, 1))).toThrow(DivisionByZeroError)
    expect(() => EMPTY.divide(I(0, 0))).toThrow(DivisionByZeroError)
  })

  it('takes the extremes of the four cross quotients', () => {
    expect(I(1, 2).divide(I(4, 8)).equals(I(0.125, 0.5))).toBe(true)
    expect(I(-2, 1).divide(I(-4, -2)).equals(I(-0.5, 1))).toBe(true)
  })

  it('rounds outward', () => {
    const x = I(1, 1).divide(I(3, 3))

    expect(x.low).toBe(1 / 3)
    expect(x.high).toBe(next(1 / 3))
  })

  it('skips the undefined ∞ / ∞ quotient', () => {
    expect(I(1, Infinity).divide(I(1, Infinity)).equals(I(0, Infinity))).toBe(true)
  })

  it('encloses every sampled quotient', () => {
    const divisors = operands.filter(b => !b.hasZero())

    for (const a of operands) {
      for (const b of divisors) {
        const quotient = a.divide(b)

        for (const x of samples(a)) {
          for (const y of samples(b)) {
            expect(quotient.contains(x / y)).toBe(true)
          }
        }
      }
    }
  })

  it('returns empty for an empty operand', () => {
    expect(EMPTY.divide(I(1, 2)).isEmpty()).toBe(true)
    expect(I(1, 2).divide(EMPTY).isEmpty()).toBe(true)
  })
})

describe('multiplicative inverse', () => {
  it('gives the whole line when zero is strictly inside', () => {
    expect(I(-3, 5).multiplicativeInverse().isWhole()).toBe(true)
    expect(WHOLE.multiplicativeInverse().isWhole()).toBe(true)
  })

  it('is half-infinite when zero is at an edge', () => {
    expect(I(0, 4).multiplicativeInverse().equals(I(0.25, Infinity))).toBe(true)
    expect(I(-4, 0).multiplicativeInverse().equals(I(-Infinity, -0.25))).toBe(true)
  })

  it('is empty for [0, 0] and for the empty interval', () => {
    expect(I(0, 0).multiplicativeInverse().isEmpty()).toBe(true)
    expect(EMPTY.multiplicativeInverse().isEmpty()).toBe(true)
  })

  it('swaps the bounds of same-sign ranges', () => {
    expect(I(2, 4).multiplicativeInverse().equals(I(0.25, 0.5))).toBe(true)
    expect(I(-4, -2).multiplicativeInverse().equals(I(-0.5, -0.25))).toBe(true)
  })

  it('rounds outward', () => {
    const x = I(3, 10).multiplicativeInverse()

    expect(x.low).toBe(prev(0.1))
    expect(x.high).toBe(next(1 / 3))
  })
})

describe('predicates', () => {
  it('checks for zero', () => {
    expect(I(-1, 1).hasZero()).toBe(true)
    expect(I(0, 1).hasZero()).toBe(true)
    expect(I(-1, 0).hasZero()).toBe(true)
    expect(I(0.5, 1).hasZero()).toBe(false)
    expect(EMPTY.hasZero()).toBe(false)
  })

  it('checks overlap symmetrically', () => {
    const intervals = [ I(0, 1), I(1, 2), I(0.5, 0.6), I(2.5, 3), I(-Infinity, 0), WHOLE, EMPTY, new Interval(2) ]

    for (const a of intervals) {
      for (const b of intervals) {
        expect(a.isOverlap(b)).toBe(b.isOverlap(a))
      }
    }

    expect(I(0, 1).isOverlap(I(1, 2))).toBe(true)
    expect(I(0, 1).isOverlap(I(0.5, 0.6))).toBe(true)
    expect(I(0, 1).isOverlap(I(2.5, 3))).toBe(false)
    expect(WHOLE.isOverlap(EMPTY)).toBe(false)
    expect(EMPTY.isOverlap(EMPTY)).toBe(false)
  })

  it('compares almost equal intervals', () => {
    expect(I(1.00000001, 2).almostEqual(I(1.0, 2))).toBe(true)
    expect(I(1.1, 2).almostEqual(I(1.0, 2))).toBe(false)
    expect(I(1, 2).almostEqual(I(1, 2))).toBe(true)
    expect(WHOLE.almostEqual(WHOLE)).toBe(true)
    expect(EMPTY.almostEqual(EMPTY)).toBe(true)
    expect(EMPTY.almostEqual(I(1, 2))).toBe(false)
  })

  it('treats nearly zero-width intervals as singletons', () => {
    expect(I(1, 1.00000001).isSingleton()).toBe(true)
    expect(I(1, 1.001).isSingleton()).toBe(false)
    expect(I(Infinity, Infinity).isSingleton()).toBe(false)
    expect(EMPTY.isSingleton()).toBe(false)
  })

  it('checks membership', () => {
    expect(I(1, 2).contains(1)).toBe(true)
    expect(I(1, 2).contains(2)).toBe(true)
    expect(I(1, 2).contains(2.5)).toBe(false)
    expect(EMPTY.contains(0)).toBe(false)
  })
})

describe('equality and hashing', () => {
  it('compares bounds exactly', () => {
    expect(I(1, 2).equals(I(1, 2))).toBe(true)
    expect(I(1, 2).equals(I(1, 2.0000000001))).toBe(false)
    expect(new Interval().equals(EMPTY)).toBe(true)
    expect(I(-Infinity, Infinity).equals(WHOLE)).toBe(true)
  })

  it('hashes equal intervals equally', () => {
    expect(I(1, 2).hashCode()).toBe(I(1, 2).hashCode())
    expect(new Interval().hashCode()).toBe(EMPTY.hashCode())
    expect(I(1, 2).hashCode()).not.toBe(I(1, 3).hashCode())
    expect(Number.isInteger(I(0.1, 0.7).hashCode())).toBe(true)
  })
})

describe('half-open narrowing', () => {
  it('moves the lower bound up one float', () => {
    const x = I(1, 2).halfOpenLeft()

    expect(x.low).toBe(next(1))
    expect(x.high).toBe(2)
  })

  it('narrows monotonically when repeated', () => {
    const once = I(1, 2).halfOpenLeft()
    const twice = once.halfOpenLeft()

    expect(twice.low).toBeGreaterThan(once.low)
    expect(twice.low).toBe(next(next(1)))
  })

  it('moves the upper bound down one float', () => {
    const x = I(1, 2).halfOpenRight()

    expect(x.low).toBe(1)
    expect(x.high).toBe(prev(2))
  })

  it('empties singletons', () => {
    expect(new Interval(3).halfOpenLeft().isEmpty()).toBe(true)
    expect(new Interval(3).halfOpenRight().isEmpty()).toBe(true)
    expect(EMPTY.halfOpenLeft().isEmpty()).toBe(true)
  })

  it('makes the whole line finite on one side', () => {
    expect(WHOLE.halfOpenLeft().equals(I(-Number.MAX_VALUE, Infinity))).toBe(true)
  })
})

describe('other operations', () => {
  it('negates', () => {
    expect(I(1, 2).negate().equals(I(-2, -1))).toBe(true)
    expect(EMPTY.negate().isEmpty()).toBe(true)
  })

  it('intersects', () => {
    expect(I(0, 2).intersect(I(1, 3)).equals(I(1, 2))).toBe(true)
    expect(I(0, 1).intersect(I(2, 3)).isEmpty()).toBe(true)
    expect(I(0, 1).intersect(EMPTY).isEmpty()).toBe(true)
  })

  it('delegates powers, roots and modulo', () => {
    expect(new Interval(2, 2).pow(new Interval(3, 3)).equals(I(8, 8))).toBe(true)
    expect(() => new Interval(2, 2).pow(new Interval(2, 3))).toThrow(PowerIsNotIntegerError)
    expect(I(-2, 3).pow(2).equals(I(0, 9))).toBe(true)
    expect(I(4, 9).sqrt().equals(I(2, 3))).toBe(true)
    expect(I(4, 9).nthRoot(2).equals(I(2, 3))).toBe(true)
    expect(I(4, 9).nthRoot(new Interval(2)).equals(I(2, 3))).toBe(true)
    expect(I(5, 5.5).fmod(I(2, 2)).equals(I(1, 1.5))).toBe(true)
  })
})

describe('formatting', () => {
  it('prints both bounds', () => {
    expect(I(1, 2.5).toString()).toBe('Interval [1, 2.5]')
    expect(WHOLE.toString()).toBe('Interval [-Infinity, Infinity]')
  })

  it('prints one bound for singletons', () => {
    expect(new Interval(5).toString()).toBe('Interval [5]')
  })

  it('prints nothing for the empty interval', () => {
    expect(EMPTY.toString()).toBe('Interval []')
  })
})

describe('tolerance', () => {
  afterEach(() => {
    setIntervalTolerance(1e-7)
    resetWarnings()
    vi.restoreAllMocks()
  })

  it('defaults to 1e-7', () => {
    expect(getIntervalTolerance()).toBe(1e-7)
  })

  it('changes singleton and almost-equal comparisons', () => {
    setIntervalTolerance(0.01)

    expect(I(1, 1.001).isSingleton()).toBe(true)
    expect(I(1.005, 2).almostEqual(I(1, 2))).toBe(true)
  })

  it('ignores invalid values with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    setIntervalTolerance(-1)
    setIntervalTolerance(NaN)

    expect(getIntervalTolerance()).toBe(1e-7)
    expect(warn).toHaveBeenCalledWith('Warning interval-tolerance: Invalid interval tolerance -1; keeping 1e-7')
  })
})
