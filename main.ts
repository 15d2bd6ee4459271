#!/usr/bin/env node
/**
 * Main Application Entry Point
 *
 * Command-line front end:
 * - Resolves defaults (built-ins → options file → environment)
 * - Parses flags, which take precedence over everything else
 * - Renders the image and writes the text block to stdout
 *
 * @module main
 */

import { ENV } from './const.js'
import { BlockfitError, InvalidParameterError } from './error.js'
import {
  findOptionsFile,
  mergeOptions,
  parseOptionsFile,
  OptionsParseError,
  type Options,
} from './lib/config-helpers.js'
import { GmImageSource } from './lib/image-source/gm-image-source.js'
import { initializeLogging, appLogger, configLogger } from './lib/logger.js'
import { RenderParamsParser, USAGE } from './lib/render-params-parser.js'
import { render } from './lib/renderer.js'

const log = appLogger()
const configLog = configLogger()

const HELP_HINT = "Run 'blockfit --help' for usage."

/**
 * Runs the CLI and returns the process exit code.
 */
async function main(args: readonly string[]): Promise<number> {
  const env = process.env

  let fileOptions: Options = {}
  const optionsFile = findOptionsFile(env)
  try {
    if (optionsFile) fileOptions = parseOptionsFile(optionsFile)

    const defaults = mergeOptions(fileOptions, env)
    const params = new RenderParamsParser().call(args, defaults)

    await initializeLogging({ debug: params.debug })

    if (optionsFile) {
      configLog.debug`Using ${optionsFile}`
    } else if (env[ENV.lines] ?? env[ENV.contrast] ?? env[ENV.brightness]) {
      configLog.debug`Using environment variables`
    }

    if (params.help || params.imagePath === undefined) {
      process.stdout.write(USAGE)
      return 0
    }

    const started = Date.now()
    const output = await render(new GmImageSource(params.imagePath), {
      lines: params.lines,
      contrast: params.contrast,
      brightness: params.brightness,
    })
    process.stdout.write(`${output}\n`)

    log.debug`Rendered ${params.imagePath} in ${Date.now() - started}ms`
    return 0
  } catch (err) {
    if (err instanceof OptionsParseError) {
      process.stderr.write(`blockfit: ${err.message}: ${err.cause.message}\n`)
      return 1
    }
    if (err instanceof InvalidParameterError) {
      process.stderr.write(`blockfit: ${err.message}\n${HELP_HINT}\n`)
      return 1
    }
    if (err instanceof BlockfitError) {
      process.stderr.write(`blockfit: ${err.message}\n`)
      return 1
    }
    throw err
  }
}

process.exitCode = await main(process.argv.slice(2))
