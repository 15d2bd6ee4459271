/**
 * Tone Adjustment
 *
 * Pure per-pixel functions for brightness shift, alpha compositing and
 * contrast boost, plus the field-level pass that chains them.
 *
 * Order matters: the brightness shift runs on the raw grayscale channel
 * before compositing, so transparent pixels stay dark however much the
 * image is brightened.
 *
 * @module lib/tone
 */

import type {
  BrightnessField,
  GrayAlphaChannels,
  ToneOptions,
} from '../types/domain.js'

/** Clamps a value to [0, 1] */
export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value))
}

/**
 * Linear contrast around mid-gray.
 *
 * strength 1 leaves values unchanged, > 1 pushes them toward 0 or 1
 * (where the binary quadrant glyphs sit), < 1 flattens, 0 collapses to 0.5.
 */
export function adjustContrast(value: number, strength: number): number {
  return clamp01((value - 0.5) * strength + 0.5)
}

/** Additive brightness shift; negative darkens */
export function applyBrightnessShift(value: number, delta: number): number {
  return clamp01(value + delta)
}

/** Fully transparent pixels composite to 0 (darkest glyph) */
export function composite(gray: number, alpha: number): number {
  return gray * alpha
}

/**
 * Builds the brightness field the sampler reads from.
 */
export function toneField(
  channels: GrayAlphaChannels,
  { contrast, brightness }: ToneOptions,
): BrightnessField {
  const { width, height, gray, alpha } = channels
  const size = width * height
  const data = new Float32Array(size)

  for (let i = 0; i < size; i++) {
    const shifted = applyBrightnessShift(gray.data[i] ?? 0, brightness)
    const composited = composite(shifted, alpha.data[i] ?? 0)
    data[i] = adjustContrast(composited, contrast)
  }

  return { width, height, data }
}
