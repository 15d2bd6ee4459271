/**
 * Unit tests for best-fit pattern matching
 *
 * @module tests/unit/pattern-matcher
 */

import { describe, it, expect } from 'vitest'
import {
  bestFit,
  bestFitEntry,
  squaredDistance,
} from '../../lib/pattern-matcher.js'
import { PALETTE } from '../../lib/palette.js'
import type { QuadrantSample } from '../../types/domain.js'

describe('squaredDistance', () => {
  it('sums squared differences over the four quadrants', () => {
    expect(squaredDistance([[0, 0], [0, 0]], [[1, 1], [1, 1]])).toBe(4)
    expect(squaredDistance([[0.5, 0], [0, 0]], [[0, 0], [0, 0]])).toBe(0.25)
    expect(squaredDistance([[1, 0], [0, 1]], [[1, 0], [0, 1]])).toBe(0)
  })

  it('is symmetric', () => {
    const a: QuadrantSample = [[0.25, 1], [0, 0.5]]
    const b: QuadrantSample = [[0.75, 0], [0.5, 0.5]]
    expect(squaredDistance(a, b)).toBe(squaredDistance(b, a))
  })
})

describe('bestFitEntry', () => {
  it('returns each palette pattern itself at distance 0', () => {
    for (const entry of PALETTE) {
      const match = bestFitEntry(entry.pattern)
      expect(match.entry.glyph).toBe(entry.glyph)
      expect(match.distance).toBe(0)
    }
  })

  it('breaks ties in favour of the earliest palette entry', () => {
    // ' ', '▘' and '░' are all at distance 0.25
    const sample: QuadrantSample = [[0.5, 0], [0, 0]]
    const match = bestFitEntry(sample)
    expect(match.entry.glyph).toBe(' ')
    expect(match.distance).toBe(0.25)

    const reversed = bestFitEntry(sample, [...PALETTE].reverse())
    expect(reversed.entry.glyph).toBe('░')
    expect(reversed.distance).toBe(0.25)
  })

  it('throws on an empty palette', () => {
    expect(() => bestFitEntry([[0, 0], [0, 0]], [])).toThrow(RangeError)
  })
})

describe('bestFit', () => {
  it('picks the full block for near-white cells', () => {
    expect(bestFit([[0.9, 0.9], [0.9, 0.9]])).toBe('█')
  })

  it('picks shades for uniform mid-tones', () => {
    expect(bestFit([[0.2, 0.2], [0.2, 0.2]])).toBe('░')
    expect(bestFit([[0.6, 0.6], [0.6, 0.6]])).toBe('▒')
    expect(bestFit([[0.7, 0.7], [0.7, 0.7]])).toBe('▓')
  })

  it('picks quadrant glyphs for split cells', () => {
    expect(bestFit([[1, 0.9], [0.1, 0]])).toBe('▀')
    expect(bestFit([[0, 0.1], [0.95, 1]])).toBe('▄')
    expect(bestFit([[0.8, 0.1], [0.1, 0.9]])).toBe('▚')
    expect(bestFit([[0, 0], [0, 0.8]])).toBe('▗')
  })

  it('is deterministic', () => {
    const sample: QuadrantSample = [[0.37, 0.62], [0.11, 0.94]]
    expect(bestFit(sample)).toBe(bestFit(sample))
  })
})
