/**
 * Unit tests for the rendering pipeline
 *
 * Uses in-memory image sources, so no ImageMagick is needed.
 *
 * @module tests/unit/renderer
 */

import { describe, it, expect, vi } from 'vitest'
import {
  computeColumns,
  rasterize,
  render,
  renderGrid,
  validateRenderOptions,
} from '../../lib/renderer.js'
import { RawImageSource, createField } from '../../lib/image-source/raw-image-source.js'
import { ImageLoadError, InvalidParameterError } from '../../error.js'
import { fieldFromRows, solidSource } from '../helpers/image-helper.js'
import type { ImageSource } from '../../types/image-source.js'

// =============================================================================
// Validation & geometry
// =============================================================================

describe('validateRenderOptions', () => {
  it('applies defaults', () => {
    expect(validateRenderOptions({ lines: 40 })).toEqual({
      lines: 40,
      contrast: 1,
      brightness: 0,
    })
  })

  it.each([0, -3, 2.5, NaN])('rejects %s lines', (lines) => {
    expect(() => validateRenderOptions({ lines })).toThrow(InvalidParameterError)
  })

  it('rejects non-finite contrast and brightness', () => {
    expect(() => validateRenderOptions({ lines: 1, contrast: NaN })).toThrow(
      InvalidParameterError,
    )
    expect(() =>
      validateRenderOptions({ lines: 1, brightness: Infinity }),
    ).toThrow(InvalidParameterError)
  })
})

describe('computeColumns', () => {
  it('doubles the aspect ratio to compensate for tall cells', () => {
    expect(computeColumns(10, { width: 100, height: 100 })).toBe(20)
    expect(computeColumns(10, { width: 30, height: 20 })).toBe(30)
    expect(computeColumns(40, { width: 640, height: 480 })).toBe(107)
  })

  it('rounds to the nearest column', () => {
    // 10 * (25 / 30) * 2 = 16.67
    expect(computeColumns(10, { width: 25, height: 30 })).toBe(17)
  })

  it('never returns fewer than one column', () => {
    expect(computeColumns(10, { width: 1, height: 100 })).toBe(1)
  })

  it('rejects zero-area images', () => {
    expect(() => computeColumns(10, { width: 0, height: 10 })).toThrow(
      InvalidParameterError,
    )
    expect(() => computeColumns(10, { width: 10, height: 0 })).toThrow(
      InvalidParameterError,
    )
  })
})

describe('rasterize', () => {
  it('emits one glyph per cell, row by row', () => {
    const field = fieldFromRows([
      [1, 1, 0, 0],
      [0, 0, 1, 1],
      [1, 0, 0, 1],
      [1, 0, 0, 1],
    ])
    expect(rasterize(field, 2, 2)).toEqual({
      lines: 2,
      columns: 2,
      rows: ['▀▄', '▌▐'],
    })
  })
})

// =============================================================================
// Pipeline
// =============================================================================

describe('renderGrid', () => {
  it('returns exactly the requested number of rows, all the same width', async () => {
    const grid = await renderGrid(solidSource(30, 20, 0.5), { lines: 10 })
    expect(grid.lines).toBe(10)
    expect(grid.columns).toBe(30)
    expect(grid.rows).toHaveLength(10)
    for (const row of grid.rows) {
      expect([...row]).toHaveLength(30)
    }
  })

  it('renders a solid opaque white image as full blocks', async () => {
    const grid = await renderGrid(solidSource(40, 20, 1), { lines: 10 })
    expect(grid.rows).toEqual(Array(10).fill('█'.repeat(40)))
  })

  it('renders a transparent image as spaces regardless of gray content', async () => {
    const grid = await renderGrid(solidSource(40, 20, 1, 0), { lines: 5 })
    expect(grid.rows).toEqual(Array(5).fill(' '.repeat(20)))
  })

  it('keeps transparent pixels dark when brightening', async () => {
    const grid = await renderGrid(solidSource(10, 10, 0, 0), {
      lines: 3,
      brightness: 1,
    })
    expect(grid.rows).toEqual(Array(3).fill(' '.repeat(6)))
  })

  it('maps uniform mid-tones to shade glyphs', async () => {
    const source = solidSource(10, 10, 0.5)
    expect((await renderGrid(source, { lines: 2 })).rows).toEqual([
      '▒▒▒▒',
      '▒▒▒▒',
    ])
  })

  it('applies brightness before contrast', async () => {
    const dark = solidSource(8, 8, 0.25)
    expect((await renderGrid(dark, { lines: 1 })).rows).toEqual(['░░'])
    expect(
      (await renderGrid(dark, { lines: 1, brightness: 0.5 })).rows,
    ).toEqual(['▓▓'])

    const light = solidSource(8, 8, 0.75)
    expect((await renderGrid(light, { lines: 1 })).rows).toEqual(['▓▓'])
    expect((await renderGrid(light, { lines: 1, contrast: 2 })).rows).toEqual([
      '██',
    ])
  })

  it('resolves quadrant detail from the supersampled grid', async () => {
    // 4x4 image, 1 line → 2 columns, resampled to 4x2 (row pairs averaged)
    const gray = fieldFromRows([
      [1, 0, 0, 1],
      [1, 0, 0, 1],
      [0, 1, 1, 1],
      [0, 1, 1, 1],
    ])
    const grid = await renderGrid(new RawImageSource(gray), { lines: 1 })
    expect(grid.rows).toEqual(['▚▟'])
  })

  it('composites alpha per quadrant', async () => {
    // 2x2 image, 1 line → 2 columns, resampled to 4x2 (columns doubled)
    const gray = createField(2, 2, 1)
    const alpha = fieldFromRows([
      [1, 0],
      [1, 1],
    ])
    const grid = await renderGrid(new RawImageSource(gray, alpha), { lines: 1 })
    expect(grid.rows).toEqual(['█▄'])
  })

  it('maps each source column to a cell when height is twice the line count', async () => {
    const gray = fieldFromRows([
      [1, 0, 1],
      [0, 1, 1],
    ])
    const grid = await renderGrid(new RawImageSource(gray), { lines: 1 })
    expect(grid.rows).toEqual(['▀▄█'])
  })

  it('rejects a non-positive line count before touching pixels', async () => {
    const source = solidSource(10, 10, 1)
    const dimensions = vi.spyOn(source, 'dimensions')
    const channels = vi.spyOn(source, 'channels')

    await expect(renderGrid(source, { lines: 0 })).rejects.toBeInstanceOf(
      InvalidParameterError,
    )
    expect(dimensions).not.toHaveBeenCalled()
    expect(channels).not.toHaveBeenCalled()
  })

  it('rejects a zero-area image without requesting channels', async () => {
    const source = new RawImageSource(createField(0, 10))
    const channels = vi.spyOn(source, 'channels')

    await expect(renderGrid(source, { lines: 5 })).rejects.toThrow(
      'Image must have a non-zero width and height, got 0x10',
    )
    expect(channels).not.toHaveBeenCalled()
  })

  it('propagates image load failures', async () => {
    const failing: ImageSource = {
      describe: () => 'missing.png',
      dimensions: () =>
        Promise.reject(
          new ImageLoadError('missing.png', new Error('unable to open image')),
        ),
      channels: () => Promise.reject(new Error('not reached')),
    }

    await expect(renderGrid(failing, { lines: 4 })).rejects.toThrow(
      'Failed to load image missing.png: unable to open image',
    )
  })

  it('requests channels at twice the grid resolution', async () => {
    const source = solidSource(30, 20, 1)
    const channels = vi.spyOn(source, 'channels')

    await renderGrid(source, { lines: 10 })
    expect(channels).toHaveBeenCalledWith(60, 20)
  })
})

describe('render', () => {
  it('joins rows with newlines', async () => {
    const text = await render(solidSource(4, 4, 1), { lines: 2 })
    expect(text).toBe('████\n████')
  })

  it('fails with InvalidParameterError for zero lines', async () => {
    await expect(render(solidSource(4, 4, 1), { lines: 0 })).rejects.toThrow(
      'Output line count must be a positive integer, got 0',
    )
  })

  it('produces identical output on repeated runs', async () => {
    const gray = fieldFromRows([
      [0.1, 0.9, 0.4, 0.6, 0.3],
      [0.8, 0.2, 0.7, 0.05, 0.55],
      [0.35, 0.65, 0.15, 0.95, 0.45],
    ])
    const source = new RawImageSource(gray)
    const options = { lines: 4, contrast: 1.7, brightness: -0.1 }

    const first = await render(source, options)
    const second = await render(source, options)
    expect(second).toBe(first)
    expect(first.split('\n')).toHaveLength(4)
  })
})
