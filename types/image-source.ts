/**
 * Image Source Interface
 *
 * Common interface for everything that can hand the renderer decoded pixels.
 * Decoding and resampling live behind this seam; the renderer only sees
 * normalized channels.
 *
 * @module types/image-source
 */

import type { GrayAlphaChannels, ImageDimensions } from './domain.js'

/**
 * Interface for image source implementations
 */
export interface ImageSource {
  /** Human-readable origin (file path, "buffer", "memory") for logs and errors */
  describe(): string

  /**
   * Original image size, before any resampling.
   *
   * @throws ImageLoadError if the image cannot be decoded
   */
  dimensions(): Promise<ImageDimensions>

  /**
   * Grayscale and alpha channels resampled to exactly width × height with an
   * anti-aliasing filter, normalized to [0, 1].
   *
   * @throws ImageLoadError if the image cannot be decoded
   */
  channels(width: number, height: number): Promise<GrayAlphaChannels>
}
