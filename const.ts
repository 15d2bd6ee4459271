/**
 * Configuration constants for blockfit
 * @module const
 */

// =============================================================================
// RENDERING DEFAULTS
// =============================================================================

/** Output height in text rows when nothing else is configured */
export const DEFAULT_LINES = 40

/** Contrast strength; 1.0 leaves brightness unchanged */
export const DEFAULT_CONTRAST = 1.0

/** Brightness shift applied to the grayscale channel before compositing */
export const DEFAULT_BRIGHTNESS = 0.0

/**
 * Horizontal stretch compensating for monospace cells being roughly
 * twice as tall as they are wide
 */
export const CELL_ASPECT_COMPENSATION = 2

/** Pixels per cell along each axis (one per quadrant) */
export const SUPERSAMPLING = 2

// =============================================================================
// CONFIGURATION SOURCES
// =============================================================================

/** Options file looked up in the working directory when BLOCKFIT_CONFIG is unset */
export const DEFAULT_OPTIONS_FILE = './blockfit.json'

/** Environment variables read by the CLI */
export const ENV = {
  config: 'BLOCKFIT_CONFIG',
  lines: 'BLOCKFIT_LINES',
  contrast: 'BLOCKFIT_CONTRAST',
  brightness: 'BLOCKFIT_BRIGHTNESS',
  debugLogging: 'DEBUG_LOGGING',
} as const

// =============================================================================
// IMAGE DECODING
// =============================================================================

/** Resampling filter handed to ImageMagick */
export const RESAMPLE_FILTER = 'Lanczos'

/** Luma weights used for the grayscale conversion (matches ITU-R BT.601) */
export const GRAYSCALE_INTENSITY = 'Rec601Luma'

/** Raw output format: 4 bytes per pixel */
export const RAW_FORMAT = 'RGBA'
export const RAW_CHANNELS = 4
