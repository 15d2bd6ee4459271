/**
 * ImageMagick image source
 *
 * Decodes any format ImageMagick reads and hands back grayscale and alpha
 * channels resampled with a Lanczos filter. Animated and multi-page inputs
 * contribute their first frame only. One ImageMagick invocation per call;
 * nothing touches disk besides reading the input.
 *
 * @module lib/image-source/gm-image-source
 */

import gmLib from 'gm'
import type { State } from 'gm'

import {
  GRAYSCALE_INTENSITY,
  RAW_CHANNELS,
  RAW_FORMAT,
  RESAMPLE_FILTER,
} from '../../const.js'
import { ImageLoadError, toError } from '../../error.js'
import { imageLogger } from '../logger.js'
import type { GrayAlphaChannels, ImageDimensions } from '../../types/domain.js'
import type { ImageSource } from '../../types/image-source.js'

const gm = gmLib.subClass({ imageMagick: true })

const log = imageLogger()

/** Largest 8-bit channel value */
const MAX_CHANNEL = 255

// =============================================================================
// STREAM UTILITIES
// =============================================================================

/**
 * Streams a gm image to a Buffer.
 * Rejects when ImageMagick fails to start, errors mid-stream, or writes nothing.
 */
function streamToBuffer(image: State, format: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []

    image.stream(format, (err, stdout, stderr) => {
      if (err) {
        reject(err)
        return
      }

      stdout.on('data', (chunk: Buffer) => chunks.push(chunk))

      stdout.on('end', () => {
        const buffer = Buffer.concat(chunks)
        if (buffer.length === 0) {
          reject(new Error(`ImageMagick produced empty ${format} output`))
        } else {
          resolve(buffer)
        }
      })

      stdout.on('error', (streamErr: Error) => reject(streamErr))

      stderr.on('data', (data: Buffer) => {
        log.warning`ImageMagick stderr: ${data.toString()}`
      })
    })
  })
}

/**
 * Runs `identify` and returns the image size.
 */
function identifySize(image: State): Promise<ImageDimensions> {
  return new Promise((resolve, reject) => {
    image.identify((err, data) => {
      if (err) {
        reject(err)
        return
      }
      resolve({ width: data.size.width, height: data.size.height })
    })
  })
}

// =============================================================================
// RAW DECODING
// =============================================================================

/**
 * Splits 8-bit RGBA bytes into normalized grayscale and alpha channels.
 * The image is already grayscale, so the red byte carries the luma.
 *
 * @throws Error when the byte count does not match width × height
 */
export function decodeRawChannels(
  bytes: Uint8Array,
  width: number,
  height: number,
): GrayAlphaChannels {
  const size = width * height
  const expected = size * RAW_CHANNELS
  if (bytes.length !== expected) {
    throw new Error(
      `Expected ${expected} bytes of ${RAW_FORMAT} for ${width}x${height}, got ${bytes.length}`,
    )
  }

  const gray = new Float32Array(size)
  const alpha = new Float32Array(size)
  for (let i = 0; i < size; i++) {
    const offset = i * RAW_CHANNELS
    gray[i] = (bytes[offset] ?? 0) / MAX_CHANNEL
    alpha[i] = (bytes[offset + 3] ?? 0) / MAX_CHANNEL
  }

  return {
    width,
    height,
    gray: { width, height, data: gray },
    alpha: { width, height, data: alpha },
  }
}

// =============================================================================
// SOURCE
// =============================================================================

/**
 * Image source reading a file path or an encoded image buffer through ImageMagick.
 */
export class GmImageSource implements ImageSource {
  #input: string | Buffer
  #dimensions: Promise<ImageDimensions> | undefined

  constructor(input: string | Buffer) {
    this.#input = input
  }

  /** Fresh gm pipeline over the first frame of the input */
  #open(): State {
    const input = this.#input
    // gm has separate overloads for paths and buffers, so each branch
    // picks one.
    const image = typeof input === 'string' ? gm(input) : gm(input)
    return image.selectFrame(0)
  }

  describe(): string {
    const input = this.#input
    return typeof input === 'string' ? input : `buffer (${input.length} bytes)`
  }

  /** Identified once; later calls reuse the result */
  dimensions(): Promise<ImageDimensions> {
    if (!this.#dimensions) {
      this.#dimensions = identifySize(this.#open()).catch((err: unknown) => {
        this.#dimensions = undefined
        throw new ImageLoadError(this.describe(), toError(err))
      })
    }
    return this.#dimensions
  }

  async channels(width: number, height: number): Promise<GrayAlphaChannels> {
    // NOTE: ImageMagick applies settings in argument order, so the filter
    // and intensity must precede the operators that use them.
    const image = this.#open()
      .out('-alpha', 'set')
      .out('-intensity', GRAYSCALE_INTENSITY)
      .colorspace('Gray')
      .filter(RESAMPLE_FILTER)
      .resize(width, height, '!')
      .out('-depth', '8')

    log.debug`Decoding ${this.describe()} at ${width}x${height}`

    try {
      const bytes = await streamToBuffer(image, RAW_FORMAT)
      return decodeRawChannels(bytes, width, height)
    } catch (err) {
      throw new ImageLoadError(this.describe(), toError(err))
    }
  }
}
