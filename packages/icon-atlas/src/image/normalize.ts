import type { RgbaImage } from '../types'

/**
 * 不透明度を保ったまま全ピクセルを白にする
 *
 * alpha > 0 のピクセルは (255, 255, 255, alpha) に、
 * alpha == 0 のピクセルはそのままコピーします。
 * 表示時に色を乗算するモノクロアイコン用。
 */
export function normalizeToWhite(image: RgbaImage): RgbaImage {
  const source = image.data
  const data = new Uint8ClampedArray(source.length)

  for (let i = 0; i < source.length; i += 4) {
    const a = source[i + 3]
    if (a > 0) {
      data[i] = 255
      data[i + 1] = 255
      data[i + 2] = 255
    } else {
      data[i] = source[i]
      data[i + 1] = source[i + 1]
      data[i + 2] = source[i + 2]
    }
    data[i + 3] = a
  }

  return { width: image.width, height: image.height, data }
}
