/**
 * Render Parameters Parser Module
 *
 * Converts command-line arguments into a structured render request.
 *
 * @module lib/render-params-parser
 */

import { InvalidParameterError } from '../error.js'
import type { RenderParams, ResolvedOptions } from '../types/domain.js'

/** Flags that take a numeric value */
type ValueFlag = 'lines' | 'contrast' | 'brightness'

const VALUE_FLAGS: readonly ValueFlag[] = ['lines', 'contrast', 'brightness']

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name)
}

export const USAGE = `Usage: blockfit <image> [options]

Convert an image to Unicode block characters with quadrant best-fit matching.

Options:
  --lines <n>         Output height in lines (default: 40)
  --contrast <x>      Contrast boost strength, 1.0 = unchanged (default: 1.0)
  --brightness <d>    Brightness shift applied before alpha compositing,
                      negative to darken, positive to lighten (default: 0.0)
  --debug             Verbose logging to stderr
  -h, --help          Show this help

Environment:
  BLOCKFIT_LINES, BLOCKFIT_CONTRAST, BLOCKFIT_BRIGHTNESS, DEBUG_LOGGING
  BLOCKFIT_CONFIG     Path to a JSON options file (default: ./blockfit.json)
`

/**
 * Parses and validates command-line arguments into render parameters.
 */
export class RenderParamsParser {
  /**
   * Parses arguments (without the node and script entries).
   *
   * @param args - Command-line arguments, e.g. process.argv.slice(2)
   * @param defaults - Values used for flags that are not given
   * @throws InvalidParameterError for unknown flags, missing or malformed
   *   values, extra positional arguments, or a missing image path
   */
  call(args: readonly string[], defaults: ResolvedOptions): RenderParams {
    const params: RenderParams = {
      imagePath: undefined,
      lines: defaults.lines,
      contrast: defaults.contrast,
      brightness: defaults.brightness,
      debug: defaults.debugLogging,
      help: false,
    }

    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? ''

      if (arg === '-h' || arg === '--help') {
        params.help = true
        continue
      }

      if (arg === '--debug') {
        params.debug = true
        continue
      }

      if (arg.startsWith('--')) {
        const [name = '', inline] = this.#splitFlag(arg.slice(2))
        if (!isValueFlag(name)) {
          throw new InvalidParameterError(name, `Unknown option: ${arg}`)
        }

        let raw = inline
        if (raw === undefined) {
          raw = args[i + 1]
          i++
        }
        if (raw === undefined || raw === '') {
          throw new InvalidParameterError(name, `Option --${name} needs a value`)
        }

        this.#assign(params, name, raw)
        continue
      }

      if (params.imagePath !== undefined) {
        throw new InvalidParameterError(
          'image',
          `Unexpected argument: ${arg} (only one image path is accepted)`,
        )
      }
      params.imagePath = arg
    }

    if (!params.help && params.imagePath === undefined) {
      throw new InvalidParameterError('image', 'Missing image path')
    }

    return params
  }

  /**
   * Splits "name=value" into its parts; value is undefined without "=".
   */
  #splitFlag(flag: string): [string, string | undefined] {
    const eq = flag.indexOf('=')
    if (eq === -1) return [flag, undefined]
    return [flag.slice(0, eq), flag.slice(eq + 1)]
  }

  /**
   * Parses a numeric flag value into params.
   */
  #assign(params: RenderParams, name: ValueFlag, raw: string): void {
    const value = Number(raw)

    if (name === 'lines') {
      if (!Number.isInteger(value)) {
        throw new InvalidParameterError(
          'lines',
          `Option --lines expects an integer, got "${raw}"`,
        )
      }
      params.lines = value
      return
    }

    if (!Number.isFinite(value)) {
      throw new InvalidParameterError(
        name,
        `Option --${name} expects a number, got "${raw}"`,
      )
    }
    params[name] = value
  }
}
