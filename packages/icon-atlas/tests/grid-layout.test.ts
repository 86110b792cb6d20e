import { describe, expect, it } from 'vitest'
import {
  atlasFileName,
  computeGridLayout,
  indexFileName,
  placementAt,
} from '../src/atlas/grid-layout'

describe('computeGridLayout', () => {
  it('should lay out 23 icons in 20 columns as 2 rows', () => {
    const result = computeGridLayout(23, 20, 16)

    expect(result.isOk()).toBe(true)
    const layout = result._unsafeUnwrap()
    expect(layout.rows).toBe(2)
    expect(layout.canvasWidth).toBe(20 * 16)
    expect(layout.canvasHeight).toBe(2 * 16)
    expect(layout.placements).toHaveLength(23)
    expect(layout.placements[20]).toEqual({ index: 20, column: 0, row: 1, x: 0, y: 16 })
    expect(layout.placements[19]).toEqual({ index: 19, column: 19, row: 0, x: 304, y: 0 })
  })

  it('should return an empty 0x0 layout for zero icons', () => {
    const layout = computeGridLayout(0, 20, 32)._unsafeUnwrap()

    expect(layout.rows).toBe(0)
    expect(layout.canvasWidth).toBe(0)
    expect(layout.canvasHeight).toBe(0)
    expect(layout.placements).toEqual([])
  })

  it('should compute rows as ceil(count / columns) with placements inside the canvas', () => {
    for (let columns = 1; columns <= 7; columns++) {
      for (let count = 0; count <= 50; count++) {
        const layout = computeGridLayout(count, columns, 8)._unsafeUnwrap()

        expect(layout.rows).toBe(Math.ceil(count / columns))
        for (const placement of layout.placements) {
          expect(placement.x).toBeLessThan(layout.canvasWidth)
          expect(placement.y).toBeLessThan(layout.canvasHeight)
        }
      }
    }
  })

  it('should never place two icons in the same cell', () => {
    const layout = computeGridLayout(97, 9, 24)._unsafeUnwrap()

    const cells = new Set(layout.placements.map((p) => `${p.column},${p.row}`))
    const origins = new Set(layout.placements.map((p) => `${p.x},${p.y}`))
    expect(cells.size).toBe(97)
    expect(origins.size).toBe(97)
  })

  it('should place icons row-major', () => {
    const layout = computeGridLayout(5, 2, 10)._unsafeUnwrap()

    expect(layout.placements.map((p) => [p.column, p.row])).toEqual([
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
      [0, 2],
    ])
  })

  it('should be deterministic', () => {
    expect(computeGridLayout(41, 6, 32)._unsafeUnwrap()).toEqual(
      computeGridLayout(41, 6, 32)._unsafeUnwrap(),
    )
  })

  it.each([
    [10, 0, 16],
    [10, -1, 16],
    [10, 1.5, 16],
    [10, 20, 0],
    [10, 20, Number.NaN],
    [-1, 20, 16],
  ])('should reject count=%s columns=%s iconSize=%s', (count, columns, iconSize) => {
    const result = computeGridLayout(count, columns, iconSize)

    expect(result.isErr()).toBe(true)
    expect(result._unsafeUnwrapErr().type).toBe('INVALID_CONFIG')
  })
})

describe('placementAt', () => {
  it('should derive pixel origin from column and row', () => {
    expect(placementAt(47, 20, 64)).toEqual({ index: 47, column: 7, row: 2, x: 448, y: 128 })
  })
})

describe('file names', () => {
  it('should encode columns, rows and icon size in the atlas name', () => {
    expect(atlasFileName({ columns: 20, rows: 2, iconSize: 16 })).toBe('texture_atlas_20x2_16px.png')
  })

  it('should encode icon size in the index name', () => {
    expect(indexFileName(24)).toBe('icon_mapping_24.txt')
  })
})
