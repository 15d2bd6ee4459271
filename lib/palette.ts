/**
 * Glyph Palette
 *
 * The fixed set of candidate glyphs and the 2×2 quadrant pattern each one
 * draws. Enumeration order is part of the output contract: the matcher keeps
 * the first entry at the minimum distance, so reordering changes tie-breaks.
 *
 * @module lib/palette
 */

import type { PaletteEntry, QuadrantSample } from '../types/domain.js'

/** Builds a palette entry frozen down to its pattern rows */
function entry(glyph: string, [top, bottom]: QuadrantSample): PaletteEntry {
  const pattern: QuadrantSample = [Object.freeze(top), Object.freeze(bottom)]
  return Object.freeze({ glyph, pattern: Object.freeze(pattern) })
}

/** Same value in all four quadrants */
function uniform(value: number): QuadrantSample {
  return [
    [value, value],
    [value, value],
  ]
}

/**
 * The 16 binary quadrant glyphs, ordered by the bit pattern
 * tl·8 + tr·4 + bl·2 + br
 */
export const QUADRANT_PATTERNS: readonly PaletteEntry[] = Object.freeze([
  entry(' ', [[0, 0], [0, 0]]),
  entry('▗', [[0, 0], [0, 1]]),
  entry('▖', [[0, 0], [1, 0]]),
  entry('▄', [[0, 0], [1, 1]]),
  entry('▝', [[0, 1], [0, 0]]),
  entry('▐', [[0, 1], [0, 1]]),
  entry('▞', [[0, 1], [1, 0]]),
  entry('▟', [[0, 1], [1, 1]]),
  entry('▘', [[1, 0], [0, 0]]),
  entry('▚', [[1, 0], [0, 1]]),
  entry('▌', [[1, 0], [1, 0]]),
  entry('▙', [[1, 0], [1, 1]]),
  entry('▀', [[1, 1], [0, 0]]),
  entry('▜', [[1, 1], [0, 1]]),
  entry('▛', [[1, 1], [1, 0]]),
  entry('█', [[1, 1], [1, 1]]),
])

/** Uniform shade glyphs: light, medium, dark */
export const SHADE_PATTERNS: readonly PaletteEntry[] = Object.freeze([
  entry('░', uniform(0.25)),
  entry('▒', uniform(0.5)),
  entry('▓', uniform(0.75)),
])

/** Every candidate, binary patterns first */
export const PALETTE: readonly PaletteEntry[] = Object.freeze([
  ...QUADRANT_PATTERNS,
  ...SHADE_PATTERNS,
])

export const EMPTY_CELL = ' '
export const FULL_BLOCK = '█'
