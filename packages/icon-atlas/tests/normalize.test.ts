import { describe, expect, it } from 'vitest'
import { normalizeToWhite } from '../src/image/normalize'
import type { RgbaImage } from '../src/types'

describe('normalizeToWhite', () => {
  it('should turn visible pixels white and keep their alpha', () => {
    const image: RgbaImage = {
      width: 3,
      height: 1,
      data: new Uint8ClampedArray([
        0, 0, 0, 255,
        200, 10, 90, 1,
        12, 34, 56, 128,
      ]),
    }

    const result = normalizeToWhite(image)

    expect(Array.from(result.data)).toEqual([
      255, 255, 255, 255,
      255, 255, 255, 1,
      255, 255, 255, 128,
    ])
  })

  it('should leave fully transparent pixels unchanged', () => {
    const image: RgbaImage = {
      width: 2,
      height: 1,
      data: new Uint8ClampedArray([10, 20, 30, 0, 0, 0, 0, 0]),
    }

    const result = normalizeToWhite(image)

    expect(Array.from(result.data)).toEqual([10, 20, 30, 0, 0, 0, 0, 0])
  })

  it('should keep dimensions and not mutate the input', () => {
    const data = new Uint8ClampedArray([1, 2, 3, 4, 5, 6, 7, 0, 9, 9, 9, 9, 0, 0, 0, 0])
    const image: RgbaImage = { width: 2, height: 2, data }

    const result = normalizeToWhite(image)

    expect(result.width).toBe(2)
    expect(result.height).toBe(2)
    expect(result.data).not.toBe(data)
    expect(Array.from(data)).toEqual([1, 2, 3, 4, 5, 6, 7, 0, 9, 9, 9, 9, 0, 0, 0, 0])
  })
})
