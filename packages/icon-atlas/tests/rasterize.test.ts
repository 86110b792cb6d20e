import { describe, expect, it } from 'vitest'
import { createFallbackImage, createSvgRasterizer } from '../src/image/rasterize'
import { createIcon, pixelAt } from './helpers'

const SQUARE = '<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10"><rect width="10" height="10" fill="black"/></svg>'
const WIDE = '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="10"><rect width="20" height="10" fill="black"/></svg>'

describe('createSvgRasterizer', () => {
  const rasterize = createSvgRasterizer()

  it('should render an SVG to iconSize x iconSize RGBA', async () => {
    const image = await rasterize(createIcon('square', SQUARE), 8, 4)

    expect(image.width).toBe(8)
    expect(image.height).toBe(8)
    expect(image.data.length).toBe(8 * 8 * 4)
    expect(pixelAt(image, 4, 4)[3]).toBeGreaterThan(250)
  })

  it('should accept SVG content as bytes', async () => {
    const icon = {
      name: 'bytes',
      readContent: async () => new TextEncoder().encode(SQUARE),
    }

    const image = await rasterize(icon, 4, 1)

    expect(image.width).toBe(4)
    expect(pixelAt(image, 2, 2)[3]).toBeGreaterThan(250)
  })

  it('should letterbox a non-square SVG with transparent rows', async () => {
    const image = await rasterize(createIcon('wide', WIDE), 8, 4)

    expect(image.width).toBe(8)
    expect(image.height).toBe(8)
    for (let x = 0; x < 8; x++) {
      expect(pixelAt(image, x, 0)[3]).toBe(0)
    }
    expect(pixelAt(image, 4, 4)[3]).toBeGreaterThan(250)
  })

  it('should reject malformed SVG content', async () => {
    await expect(rasterize(createIcon('broken', 'this is not svg'), 8, 4)).rejects.toThrow()
  })
})

describe('createFallbackImage', () => {
  it('should be an opaque white square', () => {
    const image = createFallbackImage(3)

    expect(image.width).toBe(3)
    expect(image.height).toBe(3)
    expect(Array.from(image.data).every((value) => value === 255)).toBe(true)
    expect(image.data.length).toBe(36)
  })
})
