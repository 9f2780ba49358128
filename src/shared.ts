// Utilities shared between the modules of the library

const warnings = new Map<unknown, number>()

/**
 * Print a warning to the console, but at most maxCount times for a given id. The last time, a notice is printed saying
 * that the warning will no longer be reported.
 * @param s Warning text
 * @param id Anything identifying the kind of warning
 * @param maxCount Number of times it is reported
 */
export function localWarn (s: string, id: unknown, maxCount: number = 2) {
  const count = warnings.get(id) ?? 0

  if (count >= maxCount) return

  console.warn(`Warning ${String(id)}: ${s}`)

  warnings.set(id, count + 1)
  if (count >= maxCount - 1) {
    console.warn(`Warning ${String(id)} raised ${maxCount} times; no longer being reported`)
  }
}

/**
 * Forget how many times each warning was raised
 */
export function resetWarnings () {
  warnings.clear()
}
