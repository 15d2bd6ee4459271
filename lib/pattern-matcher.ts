/**
 * Pattern Matcher
 *
 * Best-fit search over the palette by squared Euclidean distance between a
 * quadrant sample and each glyph's pattern.
 *
 * @module lib/pattern-matcher
 */

import { PALETTE } from './palette.js'
import type {
  MatchResult,
  PaletteEntry,
  QuadrantSample,
} from '../types/domain.js'

/** Sum of squared differences over the four quadrants */
export function squaredDistance(a: QuadrantSample, b: QuadrantSample): number {
  const [[aTl, aTr], [aBl, aBr]] = a
  const [[bTl, bTr], [bBl, bBr]] = b
  return (
    (aTl - bTl) ** 2 + (aTr - bTr) ** 2 + (aBl - bBl) ** 2 + (aBr - bBr) ** 2
  )
}

/**
 * Finds the palette entry closest to the sample.
 *
 * Ties go to the earliest entry in palette order.
 */
export function bestFitEntry(
  sample: QuadrantSample,
  palette: readonly PaletteEntry[] = PALETTE,
): MatchResult {
  const [first, ...rest] = palette
  if (!first) {
    throw new RangeError('Palette must contain at least one entry')
  }

  let best: MatchResult = {
    entry: first,
    distance: squaredDistance(sample, first.pattern),
  }

  for (const candidate of rest) {
    const distance = squaredDistance(sample, candidate.pattern)
    if (distance < best.distance) {
      best = { entry: candidate, distance }
    }
  }

  return best
}

/** Glyph of the closest palette entry */
export function bestFit(sample: QuadrantSample): string {
  return bestFitEntry(sample).entry.glyph
}
