import type { RandomSource } from '@nipvm/types'
import seedrandom from 'seedrandom'

/**
 * Integer source over [0, bound); a seed makes the sequence reproducible.
 * Bounds below 1 yield 0.
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed)
  return (bound: number): number => {
    if (!(bound >= 1)) return 0
    return Math.floor(prng() * Math.floor(bound))
  }
}
