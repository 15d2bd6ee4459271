/**
 * Block Renderer - Quadrant Best-Fit Pipeline
 *
 * Turns an image source into rows of block and shade glyphs:
 *
 *   source → resample to 2× grid → brightness shift → alpha composite
 *          → contrast boost → per-cell quadrant sample → best-fit glyph
 *
 * Every numeric step is total over clamped values; the only failures are
 * rejected parameters and images that cannot be decoded.
 *
 * @module lib/renderer
 */

import {
  CELL_ASPECT_COMPENSATION,
  DEFAULT_BRIGHTNESS,
  DEFAULT_CONTRAST,
  SUPERSAMPLING,
} from '../const.js'
import { InvalidParameterError } from '../error.js'
import { sampleCell } from './cell-sampler.js'
import { bestFit } from './pattern-matcher.js'
import { toneField } from './tone.js'
import { renderLogger } from './logger.js'
import type {
  BrightnessField,
  ImageDimensions,
  RenderGrid,
  RenderOptions,
  ToneOptions,
} from '../types/domain.js'
import type { ImageSource } from '../types/image-source.js'

const log = renderLogger()

// =============================================================================
// VALIDATION
// =============================================================================

/** Validated render options with defaults applied */
export interface ValidatedRenderOptions extends ToneOptions {
  lines: number
}

/**
 * Applies defaults and rejects values that would make a degenerate grid.
 *
 * @throws InvalidParameterError for a non-positive or fractional line count,
 *   or a non-finite contrast or brightness
 */
export function validateRenderOptions(
  options: RenderOptions,
): ValidatedRenderOptions {
  const {
    lines,
    contrast = DEFAULT_CONTRAST,
    brightness = DEFAULT_BRIGHTNESS,
  } = options

  if (!Number.isInteger(lines) || lines <= 0) {
    throw new InvalidParameterError(
      'lines',
      `Output line count must be a positive integer, got ${lines}`,
    )
  }
  if (!Number.isFinite(contrast)) {
    throw new InvalidParameterError(
      'contrast',
      `Contrast must be a finite number, got ${contrast}`,
    )
  }
  if (!Number.isFinite(brightness)) {
    throw new InvalidParameterError(
      'brightness',
      `Brightness must be a finite number, got ${brightness}`,
    )
  }

  return { lines, contrast, brightness }
}

// =============================================================================
// GRID GEOMETRY
// =============================================================================

/**
 * Number of output columns for a given line count, preserving the original
 * image's aspect ratio on a font whose cells are about twice as tall as wide.
 *
 * @throws InvalidParameterError for a zero-area image
 */
export function computeColumns(
  lines: number,
  { width, height }: ImageDimensions,
): number {
  if (!(width > 0) || !(height > 0)) {
    throw new InvalidParameterError(
      'image',
      `Image must have a non-zero width and height, got ${width}x${height}`,
    )
  }

  const columns = Math.round(
    lines * (width / height) * CELL_ASPECT_COMPENSATION,
  )
  return Math.max(1, columns)
}

// =============================================================================
// RASTERIZATION
// =============================================================================

/**
 * Maps a brightness field onto a lines × columns grid of glyphs.
 */
export function rasterize(
  field: BrightnessField,
  lines: number,
  columns: number,
): RenderGrid {
  const cellWidthPx = field.width / columns
  const cellHeightPx = field.height / lines
  const rows: string[] = []

  for (let y = 0; y < lines; y++) {
    let row = ''
    for (let x = 0; x < columns; x++) {
      row += bestFit(sampleCell(field, x, y, cellWidthPx, cellHeightPx))
    }
    rows.push(row)
  }

  return { lines, columns, rows }
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Runs the full pipeline and returns the glyph grid.
 *
 * @throws InvalidParameterError before any pixel work for bad options or a zero-area image
 * @throws ImageLoadError when the source cannot decode the image
 */
export async function renderGrid(
  source: ImageSource,
  options: RenderOptions,
): Promise<RenderGrid> {
  const { lines, contrast, brightness } = validateRenderOptions(options)

  const dimensions = await source.dimensions()
  const columns = computeColumns(lines, dimensions)
  const targetWidth = columns * SUPERSAMPLING
  const targetHeight = lines * SUPERSAMPLING

  log.debug`Rendering ${source.describe()} (${dimensions.width}x${dimensions.height}) to ${columns}x${lines} cells`

  const channels = await source.channels(targetWidth, targetHeight)
  const field = toneField(channels, { contrast, brightness })

  return rasterize(field, lines, columns)
}

/**
 * Runs the full pipeline and returns the rows joined by newlines.
 */
export async function render(
  source: ImageSource,
  options: RenderOptions,
): Promise<string> {
  const grid = await renderGrid(source, options)
  return grid.rows.join('\n')
}
