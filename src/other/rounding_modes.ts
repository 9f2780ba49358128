export const ROUNDING_MODE = {
  NEAREST: 0b10, // nearest neighbor, ties to even; what native arithmetic does
  UP: 0b10000, // toward +inf
  DOWN: 0b10001 // toward -inf
} as const

Object.freeze(ROUNDING_MODE)

export type RoundingMode = typeof ROUNDING_MODE[keyof typeof ROUNDING_MODE]

// Bitfield:
// bit 0: 0 -> going up in some way, 1 -> going down in some way
// bit 1: 1 -> ties (nearest)
// bit 4: has different behavior when flipped in sign

/**
 * Flip a rounding mode (up to down and back). Used when a result is computed on the negated operand and then negated
 * back, e.g. x^3 for negative x.
 * @param n Rounding mode
 * @returns Flipped rounding mode
 */
export function flipRoundingMode (n: RoundingMode): RoundingMode {
  if (n === ROUNDING_MODE.UP) return ROUNDING_MODE.DOWN
  if (n === ROUNDING_MODE.DOWN) return ROUNDING_MODE.UP

  return n
}
