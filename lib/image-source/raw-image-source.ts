/**
 * In-memory image source
 *
 * Wraps grayscale and alpha fields that are already decoded. Resampling uses
 * an area-averaging (box) filter: every output pixel is the coverage-weighted
 * mean of the source pixels under it, which anti-aliases when shrinking and
 * reproduces uniform regions exactly.
 *
 * @module lib/image-source/raw-image-source
 */

import { InvalidParameterError } from '../../error.js'
import type {
  GrayAlphaChannels,
  ImageDimensions,
  PixelField,
} from '../../types/domain.js'
import type { ImageSource } from '../../types/image-source.js'

/** Creates a field filled with one value */
export function createField(
  width: number,
  height: number,
  fill = 0,
): PixelField {
  return { width, height, data: new Float32Array(width * height).fill(fill) }
}

// =============================================================================
// AREA-AVERAGE RESAMPLING
// =============================================================================

/** Source pixel contributing to one output pixel */
interface Tap {
  index: number
  weight: number
}

/**
 * Coverage of each output pixel over the source axis.
 * Output pixel i spans [i·scale, (i+1)·scale) in source coordinates.
 */
function axisTaps(srcSize: number, dstSize: number): Tap[][] {
  const scale = srcSize / dstSize
  const taps: Tap[][] = []

  for (let i = 0; i < dstSize; i++) {
    const start = i * scale
    const end = (i + 1) * scale
    const last = Math.min(srcSize, Math.ceil(end))
    const row: Tap[] = []

    for (let j = Math.floor(start); j < last; j++) {
      const weight = Math.min(end, j + 1) - Math.max(start, j)
      if (weight > 0) row.push({ index: j, weight })
    }
    taps.push(row)
  }

  return taps
}

function weightedMean(
  taps: readonly Tap[],
  read: (index: number) => number,
): number {
  let sum = 0
  let total = 0
  for (const { index, weight } of taps) {
    sum += read(index) * weight
    total += weight
  }
  return total > 0 ? sum / total : 0
}

/**
 * Resamples a field to width × height, horizontal pass first.
 */
export function resampleField(
  field: PixelField,
  width: number,
  height: number,
): PixelField {
  if (field.width === width && field.height === height) {
    return { width, height, data: field.data.slice() }
  }

  const columnTaps = axisTaps(field.width, width)
  const rowTaps = axisTaps(field.height, height)

  // Horizontal: field.height rows × width columns
  const horizontal = new Float32Array(field.height * width)
  for (let y = 0; y < field.height; y++) {
    const srcOffset = y * field.width
    for (let x = 0; x < width; x++) {
      horizontal[y * width + x] = weightedMean(
        columnTaps[x] ?? [],
        (i) => field.data[srcOffset + i] ?? 0,
      )
    }
  }

  const data = new Float32Array(width * height)
  for (let y = 0; y < height; y++) {
    const taps = rowTaps[y] ?? []
    for (let x = 0; x < width; x++) {
      data[y * width + x] = weightedMean(
        taps,
        (i) => horizontal[i * width + x] ?? 0,
      )
    }
  }

  return { width, height, data }
}

// =============================================================================
// SOURCE
// =============================================================================

/**
 * Image source backed by decoded, normalized channels.
 */
export class RawImageSource implements ImageSource {
  #gray: PixelField
  #alpha: PixelField
  #label: string

  /**
   * @param gray - Grayscale channel in [0, 1]
   * @param alpha - Alpha channel in [0, 1]; defaults to fully opaque
   * @param label - Name used in logs and errors
   * @throws InvalidParameterError when a field's data does not match its
   *   size or the two fields differ in size
   */
  constructor(gray: PixelField, alpha?: PixelField, label = 'memory') {
    const opaque = alpha ?? createField(gray.width, gray.height, 1)
    RawImageSource.#assertShape('gray', gray)
    RawImageSource.#assertShape('alpha', opaque)

    if (gray.width !== opaque.width || gray.height !== opaque.height) {
      throw new InvalidParameterError(
        'alpha',
        `Alpha channel is ${opaque.width}x${opaque.height} but grayscale is ${gray.width}x${gray.height}`,
      )
    }

    this.#gray = gray
    this.#alpha = opaque
    this.#label = label
  }

  static #assertShape(name: string, field: PixelField): void {
    if (field.data.length !== field.width * field.height) {
      throw new InvalidParameterError(
        name,
        `${name} field holds ${field.data.length} values, expected ${field.width}x${field.height}`,
      )
    }
  }

  describe(): string {
    return this.#label
  }

  async dimensions(): Promise<ImageDimensions> {
    return { width: this.#gray.width, height: this.#gray.height }
  }

  async channels(width: number, height: number): Promise<GrayAlphaChannels> {
    return {
      width,
      height,
      gray: resampleField(this.#gray, width, height),
      alpha: resampleField(this.#alpha, width, height),
    }
  }
}
