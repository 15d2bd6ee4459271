/**
 * Error types for blockfit
 *
 * Both failures are fatal for a conversion: nothing is retried.
 *
 * @module error
 */

/**
 * Base class so callers can tell blockfit failures from everything else
 */
export class BlockfitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Thrown when the image cannot be read or decoded
 */
export class ImageLoadError extends BlockfitError {
  constructor(
    public readonly source: string,
    cause: Error,
  ) {
    super(`Failed to load image ${source}: ${cause.message}`, { cause })
  }
}

/**
 * Thrown for a rejected argument: non-positive line count, zero-area image,
 * malformed command-line value
 */
export class InvalidParameterError extends BlockfitError {
  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(message)
  }
}

/**
 * Normalizes an unknown thrown value to an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
