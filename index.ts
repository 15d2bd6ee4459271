/**
 * Public API
 *
 * @module index
 */

export { render, renderGrid, rasterize, computeColumns } from './lib/renderer.js'
export { sampleCell, regionMean } from './lib/cell-sampler.js'
export {
  bestFit,
  bestFitEntry,
  squaredDistance,
} from './lib/pattern-matcher.js'
export {
  PALETTE,
  QUADRANT_PATTERNS,
  SHADE_PATTERNS,
  EMPTY_CELL,
  FULL_BLOCK,
} from './lib/palette.js'
export {
  adjustContrast,
  applyBrightnessShift,
  clamp01,
  composite,
  toneField,
} from './lib/tone.js'
export { GmImageSource } from './lib/image-source/gm-image-source.js'
export {
  RawImageSource,
  createField,
  resampleField,
} from './lib/image-source/raw-image-source.js'
export {
  BlockfitError,
  ImageLoadError,
  InvalidParameterError,
} from './error.js'
export type * from './types/domain.js'
export type { ImageSource } from './types/image-source.js'
