/**
 * Yield the occupied slots of a circular ring from the oldest retained
 * entry to the one at `current`.
 * @internal
 */
export function* walkOldestToCurrent<T>(
  slots: readonly (T | null)[],
  current: number,
): Generator<T> {
  if (current < 0 || slots.length === 0) {
    return
  }
  for (let step = 1; step <= slots.length; step++) {
    const entry = slots[(current + step) % slots.length]
    if (entry !== undefined && entry !== null) {
      yield entry
    }
  }
}
