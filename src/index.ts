export { next, prev, pow2, flrLog2, mulPow2 } from './fp/manip.js'
export * from './fp/directed.js'

export { ROUNDING_MODE, flipRoundingMode } from './other/rounding_modes.js'
export type { RoundingMode } from './other/rounding_modes.js'

export * from './real/errors.js'
export * from './real/interval.js'
export * from './real/interval_algebra.js'

export { localWarn, resetWarnings } from './shared.js'
