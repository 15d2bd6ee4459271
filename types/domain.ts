/**
 * Domain Types for blockfit
 *
 * Core type definitions used throughout the application.
 * All modules should import types from this file.
 *
 * @module types/domain
 */

// =============================================================================
// PIXEL DATA
// =============================================================================

/** Width and height of an image in pixels */
export interface ImageDimensions {
  width: number
  height: number
}

/**
 * Row-major field of intensities in [0, 1].
 *
 * Used for the grayscale channel, the alpha channel and the derived
 * brightness field alike.
 */
export interface PixelField {
  width: number
  height: number
  data: Float32Array
}

/** Brightness after shift, alpha compositing and contrast boost */
export type BrightnessField = PixelField

/** Grayscale and alpha channels at one resolution, as handed over by an image source */
export interface GrayAlphaChannels {
  width: number
  height: number
  gray: PixelField
  alpha: PixelField
}

// =============================================================================
// CELLS & PALETTE
// =============================================================================

/** Quadrant row: [left, right] */
export type QuadrantRow = readonly [number, number]

/** Mean intensity of a cell's quadrants: [[tl, tr], [bl, br]] */
export type QuadrantSample = readonly [QuadrantRow, QuadrantRow]

/** A candidate glyph and the quadrant pattern it draws */
export interface PaletteEntry {
  readonly glyph: string
  readonly pattern: QuadrantSample
}

/** Palette entry chosen for a sample, with its squared distance */
export interface MatchResult {
  entry: PaletteEntry
  distance: number
}

// =============================================================================
// RENDERING
// =============================================================================

/** Tone adjustments applied before sampling */
export interface ToneOptions {
  /** Contrast strength (1.0 = unchanged) */
  contrast: number
  /** Additive shift on the grayscale channel, before alpha compositing */
  brightness: number
}

/** Options accepted by the renderer */
export interface RenderOptions {
  /** Output height in text rows */
  lines: number
  contrast?: number
  brightness?: number
}

/** Rendered text block */
export interface RenderGrid {
  lines: number
  columns: number
  rows: readonly string[]
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Effective settings after merging defaults, options file and environment */
export interface ResolvedOptions {
  lines: number
  contrast: number
  brightness: number
  debugLogging: boolean
}

/** Command-line request parsed from argv */
export interface RenderParams {
  imagePath: string | undefined
  lines: number
  contrast: number
  brightness: number
  debug: boolean
  help: boolean
}
