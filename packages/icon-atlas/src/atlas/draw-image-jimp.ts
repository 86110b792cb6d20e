/**
 * アイコンアトラス画像生成
 *
 * GridLayout と各アイコンの RGBA データを受け取って、
 * 統合されたアトラス画像を生成します。
 *
 * 合成は Jimp のビットマップへの直接書き込みで行います。
 * セル同士は重ならないため、ブレンドは行わずソースのアルファで上書きを判定します。
 */

import { Jimp } from 'jimp'
import type { GridLayout, RgbaImage } from '../types'

type JimpImage = InstanceType<typeof Jimp>

/**
 * アトラス画像を作成して各アイコンを配置
 */
function _createAtlasImage(layout: GridLayout, icons: RgbaImage[]): JimpImage {
  if (layout.placements.length === 0) {
    throw new Error('No placements provided')
  }
  if (layout.placements.length !== icons.length) {
    throw new Error('Layout placements and icon images length mismatch')
  }

  // アトラス画像を作成（透明背景）
  const atlasImage = new Jimp({
    width: layout.canvasWidth,
    height: layout.canvasHeight,
    color: 0x00000000, // RGBA(0,0,0,0) - 透明
  })

  for (const placement of layout.placements) {
    const icon = icons[placement.index]
    if (icon.width !== layout.iconSize || icon.height !== layout.iconSize) {
      throw new Error(
        `Icon ${placement.index} is ${icon.width}x${icon.height}, expected ${layout.iconSize}x${layout.iconSize}`,
      )
    }
    _pasteImageData(atlasImage, icon, placement.x, placement.y, layout.canvasWidth)
  }

  return atlasImage
}

/**
 * 画像データをアトラスに直接コピー
 * alpha == 0 のピクセルは書き込まない
 */
function _pasteImageData(
  atlasImage: JimpImage,
  icon: RgbaImage,
  targetX: number,
  targetY: number,
  atlasWidth: number,
): void {
  const atlasBitmap = atlasImage.bitmap.data
  const source = icon.data

  for (let y = 0; y < icon.height; y++) {
    for (let x = 0; x < icon.width; x++) {
      const srcIndex = (y * icon.width + x) * 4
      const a = source[srcIndex + 3]
      if (a === 0) continue

      const dstIndex = ((targetY + y) * atlasWidth + (targetX + x)) * 4
      atlasBitmap[dstIndex] = source[srcIndex]
      atlasBitmap[dstIndex + 1] = source[srcIndex + 1]
      atlasBitmap[dstIndex + 2] = source[srcIndex + 2]
      atlasBitmap[dstIndex + 3] = a
    }
  }
}

/**
 * 複数のアイコン画像をアトラス画像に合成
 *
 * @param layout - グリッドレイアウト
 * @param icons - layout.placements と同じ順序の RGBA 画像
 * @returns アトラス画像（RGBA）
 */
export function drawIconsToAtlas(layout: GridLayout, icons: RgbaImage[]): RgbaImage {
  try {
    const atlasImage = _createAtlasImage(layout, icons)

    return {
      width: layout.canvasWidth,
      height: layout.canvasHeight,
      data: new Uint8ClampedArray(atlasImage.bitmap.data),
    }
  } catch (error) {
    throw new Error(`Failed to draw icons to atlas: ${String(error)}`)
  }
}

/**
 * RGBA 画像を PNG バッファにエンコード
 */
export async function encodeAtlasPng(image: RgbaImage): Promise<Uint8Array> {
  const atlasImage = Jimp.fromBitmap({
    data: Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength),
    width: image.width,
    height: image.height,
  })

  const pngBuffer = await atlasImage.getBuffer('image/png')
  return new Uint8Array(pngBuffer)
}

/**
 * PNG バッファを RGBA 画像にデコード
 */
export async function decodeAtlasPng(png: Uint8Array): Promise<RgbaImage> {
  const image = await Jimp.fromBuffer(
    Buffer.from(png.buffer, png.byteOffset, png.byteLength),
  )
  return {
    width: image.bitmap.width,
    height: image.bitmap.height,
    data: new Uint8ClampedArray(image.bitmap.data),
  }
}
