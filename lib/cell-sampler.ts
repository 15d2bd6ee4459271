/**
 * Cell Sampler
 *
 * Splits one output character cell into four quadrants and measures the
 * mean brightness of each.
 *
 * Boundaries are truncated (floor) independently per axis, so neighbouring
 * cells can differ by a pixel in size. The renderer always asks for exactly
 * two pixels per cell per axis, where the truncation has no effect.
 *
 * @module lib/cell-sampler
 */

import type { PixelField, QuadrantSample } from '../types/domain.js'

/** Start, middle and end pixel offsets of a cell along one axis */
interface AxisBounds {
  start: number
  mid: number
  end: number
}

function axisBounds(index: number, cellSizePx: number): AxisBounds {
  return {
    start: Math.floor(index * cellSizePx),
    mid: Math.floor((index + 0.5) * cellSizePx),
    end: Math.floor((index + 1) * cellSizePx),
  }
}

/**
 * Mean of the half-open rectangle [x0, x1) × [y0, y1).
 *
 * The rectangle is clipped to the field. An empty rectangle has mean 0.
 */
export function regionMean(
  field: PixelField,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
): number {
  const left = Math.max(0, x0)
  const top = Math.max(0, y0)
  const right = Math.min(field.width, x1)
  const bottom = Math.min(field.height, y1)

  if (right <= left || bottom <= top) return 0

  let sum = 0
  for (let y = top; y < bottom; y++) {
    const rowOffset = y * field.width
    for (let x = left; x < right; x++) {
      sum += field.data[rowOffset + x] ?? 0
    }
  }

  return sum / ((right - left) * (bottom - top))
}

/**
 * Samples the 2×2 quadrant means of cell (cellX, cellY).
 *
 * @param cellWidthPx - Cell width in field pixels (may be fractional)
 * @param cellHeightPx - Cell height in field pixels (may be fractional)
 */
export function sampleCell(
  field: PixelField,
  cellX: number,
  cellY: number,
  cellWidthPx: number,
  cellHeightPx: number,
): QuadrantSample {
  const x = axisBounds(cellX, cellWidthPx)
  const y = axisBounds(cellY, cellHeightPx)

  return [
    [
      regionMean(field, x.start, y.start, x.mid, y.mid),
      regionMean(field, x.mid, y.start, x.end, y.mid),
    ],
    [
      regionMean(field, x.start, y.mid, x.mid, y.end),
      regionMean(field, x.mid, y.mid, x.end, y.end),
    ],
  ]
}
