// Used for bit-level manipulation of floats. Word 1 is the high word (sign, exponent and top of the mantissa).
export const floatStore = new Float64Array(1)
export const intView = new Uint32Array(floatStore.buffer)

const POSITIVE_DENORMAL_MIN = Number.MIN_VALUE

/**
 * Get the non-biased exponent of a floating-point number x. Equivalent *mathematically* to floor(log2(abs(x))) for
 * finite normal values.
 * @param x Any floating-point number
 * @returns The non-biased exponent of that number's floating-point representation
 */
export function getExponent (x: number): number {
  floatStore[0] = x

  // Mask the biased exponent, retrieve it and convert it to non-biased
  return ((intView[1] & 0x7ff00000) >> 20) - 1023
}

function _getMantissaHighWord (): number {
  return intView[1] & 0x000fffff
}

function _mantissaClz (): number {
  const bits = Math.clz32(_getMantissaHighWord()) - 12 // subtract the exponent zeroed part

  return bits !== 20 ? bits : bits + Math.clz32(intView[0])
}

// Add one to the 64-bit pattern in floatStore
function _incrementStore () {
  if (intView[0] === 0xffffffff) {
    intView[0] = 0
    intView[1] += 1
  } else {
    intView[0] += 1
  }
}

function _decrementStore () {
  if (intView[0] === 0) {
    intView[0] = 0xffffffff
    intView[1] -= 1
  } else {
    intView[0] -= 1
  }
}

/**
 * Returns the least floating-point number strictly greater than x. inf -> inf, -inf -> -MAX_VALUE, ±0 -> MIN_VALUE,
 * nan -> nan. The result is never -0. Works on the bit pattern, so every representable number is visited.
 * @param x Any floating-point number
 */
export function next (x: number): number {
  if (x !== x || x === Infinity) return x
  if (x === 0) return POSITIVE_DENORMAL_MIN

  floatStore[0] = x

  // Positive numbers grow with their bit pattern, negative numbers shrink in magnitude
  if (x > 0) _incrementStore()
  else _decrementStore()

  return floatStore[0] + 0 // -0 -> 0
}

/**
 * Returns the greatest floating-point number strictly less than x. Equivalent to -next(-x), except that the result is
 * never -0.
 * @param x Any floating-point number
 */
export function prev (x: number): number {
  if (x !== x || x === -Infinity) return x
  if (x === 0) return -POSITIVE_DENORMAL_MIN

  floatStore[0] = x

  if (x > 0) _decrementStore()
  else _incrementStore()

  return floatStore[0] + 0
}

const pow2Lookup = new Float64Array(2098)
let e = Number.MIN_VALUE
for (let i = -1074; i <= 1023; ++i) {
  pow2Lookup[i + 1074] = e
  e *= 2
}

/**
 * Calculates 2 ^ exp, using a lookup table for integer exponents.
 * @param exp Exponent; intended for use with integers, but permits any floating-point number.
 * @returns Returns 2 ^ exp, and is guaranteed to be exact for integer exponents.
 */
export function pow2 (exp: number): number {
  if (!Number.isInteger(exp)) return Math.pow(2, exp)
  if (exp > 1023) return Infinity
  if (exp < -1074) return 0

  exp |= 0

  return pow2Lookup[exp + 1074]
}

/**
 * Compute an accurate floor log 2 function. Note that Math.log2 is not good enough here;
 * floor(log2(268435455.99999994)), for example, returns 28 when the mathematical value is 27. Handles denormals.
 * @param x Any finite, nonzero floating-point number
 */
export function flrLog2 (x: number): number {
  let exp = getExponent(x) + 1

  if (exp === -1022) exp -= _mantissaClz() // denormal

  return exp - 1
}

/**
 * Multiply x by 2 ^ exp in two steps, so that exponents beyond the range of a single double power of two still work.
 * Exact unless the result (or the intermediate) overflows or lands among the denormals.
 * @param x Any floating-point number
 * @param exp Integer exponent
 */
export function mulPow2 (x: number, exp: number): number {
  const half = exp >> 1

  return x * pow2(exp - half) * pow2(half)
}
