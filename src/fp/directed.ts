/**
 * Arithmetic on doubles with a chosen rounding direction. JS only gives us round-to-nearest, so each function computes
 * the native result, finds the sign of its rounding error with an error-free transformation (TwoSum, or Dekker's
 * product for *, / and sqrt), and steps one ulp with next/prev when the native result landed on the wrong side. When
 * the error can't be computed exactly (huge or tiny magnitudes), the result is widened by one ulp, which is still
 * valid since native arithmetic is off by at most half an ulp.
 */
import { flrLog2, mulPow2, next, prev, pow2 } from './manip.js'
import { flipRoundingMode, ROUNDING_MODE, type RoundingMode } from '../other/rounding_modes.js'

const SPLITTER = 134217729 // 2^27 + 1

// Magnitudes within which Dekker's product is error-free (no overflow when splitting, no underflow in the low parts)
const EFT_MAX = pow2(996)
const EFT_MIN = pow2(-967)

const MAX_ROOT_STEPS = 64

/**
 * Exact error of the floating-point product p = fl(a * b), so that a * b = p + err. Requires operands and product in
 * [EFT_MIN, EFT_MAX] in magnitude.
 */
function twoProductError (a: number, b: number, p: number): number {
  let t = SPLITTER * a
  const aHi = t - (t - a)
  const aLo = a - aHi

  t = SPLITTER * b
  const bHi = t - (t - b)
  const bLo = b - bHi

  return ((aHi * bHi - p) + aHi * bLo + aLo * bHi) + aLo * bLo
}

function inEftRange (x: number): boolean {
  const a = Math.abs(x)

  return a < EFT_MAX && a > EFT_MIN
}

/**
 * Correct a native result given the sign of (exact - result). errorSign is NaN when unknown, in which case the result
 * is moved one ulp outward.
 */
function directed (result: number, errorSign: number, rm: RoundingMode): number {
  if (errorSign === 0) return result

  if (rm === ROUNDING_MODE.UP) {
    return errorSign < 0 ? result : next(result)
  }

  return errorSign > 0 ? result : prev(result)
}

// Sign of the error when a finite computation overflowed to ±inf: the exact value is finite, so it lies inward
function overflowSign (result: number): number {
  return -Math.sign(result)
}

/**
 * Compute a + b rounded in the given direction
 * @param a Any floating-point number
 * @param b Any floating-point number
 * @param rm Rounding mode
 */
export function addRounded (a: number, b: number, rm: RoundingMode): number {
  const s = a + b
  if (rm === ROUNDING_MODE.NEAREST || s !== s) return s

  let errorSign: number
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    errorSign = 0
  } else if (!Number.isFinite(s)) {
    errorSign = overflowSign(s)
  } else {
    // TwoSum; exact for all finite inputs, including denormals
    const bv = s - a
    errorSign = Math.sign((a - (s - bv)) + (b - bv))
  }

  return directed(s, errorSign, rm)
}

/**
 * Compute a - b rounded in the given direction
 * @param a Any floating-point number
 * @param b Any floating-point number
 * @param rm Rounding mode
 */
export function subRounded (a: number, b: number, rm: RoundingMode): number {
  return addRounded(a, -b, rm)
}

/**
 * Compute a * b rounded in the given direction. Zero times anything, including an infinity, is zero; products with ±1
 * are exact.
 * @param a Any floating-point number
 * @param b Any floating-point number
 * @param rm Rounding mode
 */
export function mulRounded (a: number, b: number, rm: RoundingMode): number {
  if (a === 0 || b === 0) return 0
  if (Math.abs(a) === 1 || Math.abs(b) === 1) return a * b

  const p = a * b
  if (rm === ROUNDING_MODE.NEAREST || p !== p) return p

  let errorSign: number
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    errorSign = 0
  } else if (!Number.isFinite(p)) {
    errorSign = overflowSign(p)
  } else if (inEftRange(a) && inEftRange(b) && inEftRange(p)) {
    errorSign = Math.sign(twoProductError(a, b, p))
  } else {
    errorSign = NaN
  }

  return directed(p, errorSign, rm)
}

/**
 * Compute a / b rounded in the given direction. The residual a - q * b of a correctly rounded quotient is exactly
 * representable, and its sign (times the sign of b) tells which side of the true quotient q is on.
 * @param a Any floating-point number
 * @param b Any floating-point number
 * @param rm Rounding mode
 */
export function divRounded (a: number, b: number, rm: RoundingMode): number {
  const q = a / b
  if (rm === ROUNDING_MODE.NEAREST || q !== q) return q

  let errorSign: number
  if (a === 0 || b === 0 || !Number.isFinite(a) || !Number.isFinite(b)) {
    errorSign = 0
  } else if (!Number.isFinite(q)) {
    errorSign = overflowSign(q)
  } else if (q === 0) {
    // Underflow: the exact quotient is nonzero with the sign of a / b
    errorSign = Math.sign(a) * Math.sign(b)
  } else if (inEftRange(a) && inEftRange(b) && inEftRange(q)) {
    const p = q * b
    const residual = (a - p) - twoProductError(q, b, p)

    errorSign = Math.sign(residual) * Math.sign(b)
  } else {
    errorSign = NaN
  }

  return directed(q, errorSign, rm)
}

/**
 * Divide a by b, rounding toward -inf
 */
export function divLow (a: number, b: number): number {
  return divRounded(a, b, ROUNDING_MODE.DOWN)
}

/**
 * Divide a by b, rounding toward +inf
 */
export function divHigh (a: number, b: number): number {
  return divRounded(a, b, ROUNDING_MODE.UP)
}

/**
 * Compute sqrt(x) rounded in the given direction. NaN for negative x.
 * @param x Any floating-point number
 * @param rm Rounding mode
 */
export function sqrtRounded (x: number, rm: RoundingMode): number {
  const r = Math.sqrt(x)
  if (rm === ROUNDING_MODE.NEAREST || r !== r || r === 0 || r === Infinity) return r

  let errorSign = NaN
  if (inEftRange(x)) {
    const p = r * r
    errorSign = Math.sign((x - p) - twoProductError(r, r, p))
  }

  return directed(r, errorSign, rm)
}

/**
 * Compute x ^ n for a non-negative integer n, rounded in the given direction. Uses binary exponentiation; for a
 * non-negative base every partial product is monotone in its factors, so rounding each one the same way bounds the
 * exact power.
 * @param x Any floating-point number
 * @param n Non-negative integer
 * @param rm Rounding mode
 */
export function powRounded (x: number, n: number, rm: RoundingMode): number {
  if (n === 0) return 1
  if (x < 0) {
    return (n % 2 === 1) ? -powRounded(-x, n, flipRoundingMode(rm)) : powRounded(-x, n, rm)
  }

  if (rm === ROUNDING_MODE.NEAREST) return Math.pow(x, n)
  if (x === 0 || x === 1 || x !== x) return x

  let result = 1
  let base = x
  let k = n

  while (true) {
    // Partial products are non-negative; an underflowed lower bound may step to -MIN_VALUE, so clamp it
    if (k % 2 === 1) result = Math.max(0, mulRounded(result, base, rm))

    k = Math.floor(k / 2)
    if (k === 0) break

    base = Math.max(0, mulRounded(base, base, rm))
  }

  return result
}

/**
 * Compute x ^ (1 / n) for a positive integer n, rounded in the given direction. Negative x is allowed for odd n; for
 * even n it gives NaN. The estimate from Math.pow is certified against powRounded and nudged one ulp at a time.
 * @param x Any floating-point number
 * @param n Positive integer
 * @param rm Rounding mode
 */
export function rootRounded (x: number, n: number, rm: RoundingMode): number {
  if (n === 1) return x
  if (x < 0) {
    return (n % 2 === 1) ? -rootRounded(-x, n, flipRoundingMode(rm)) : NaN
  }

  if (n === 2) return sqrtRounded(x, rm)
  if (x === 0 || x === Infinity || x !== x) return x

  // Bring x near 1 by an exact power of two 2^(k n), so the certification below never runs into denormal products
  const e = flrLog2(x)
  const k = (e > -512 && e < 512) ? 0 : Math.trunc(e / n)
  const scaled = mulPow2(x, -k * n)

  let r = (n === 3) ? Math.cbrt(scaled) : Math.pow(scaled, 1 / n)
  if (rm !== ROUNDING_MODE.NEAREST) r = certifyRoot(scaled, n, r, rm)

  return mulPow2(r, k)
}

function certifyRoot (x: number, n: number, r: number, rm: RoundingMode): number {
  if (rm === ROUNDING_MODE.UP) {
    for (let i = 0; i < MAX_ROOT_STEPS; ++i) {
      if (powRounded(r, n, ROUNDING_MODE.DOWN) >= x) return r
      r = next(r)
    }

    return Math.max(1, x)
  }

  for (let i = 0; i < MAX_ROOT_STEPS; ++i) {
    if (powRounded(r, n, ROUNDING_MODE.UP) <= x) return r
    r = prev(r)
  }

  return 0
}
