/**
 * SVG のラスタライズ
 *
 * resvg で iconSize * supersample の解像度に描画し、
 * sharp の Lanczos3 フィルタで iconSize x iconSize に縮小します。
 * sharp はリサンプル時にアルファを乗算済みで扱うため、
 * 透明部分の縁に背景色がにじみません。
 */

import { Resvg } from '@resvg/resvg-js'
import sharp from 'sharp'
import type { IconSource, RgbaImage } from '../types'

/**
 * アイコン1個をラスタライズする関数
 * 戻り値は必ず iconSize x iconSize の RGBA 画像
 */
export type Rasterizer = (
  source: IconSource,
  iconSize: number,
  supersample: number,
) => Promise<RgbaImage>

const TRANSPARENT = { r: 0, g: 0, b: 0, alpha: 0 }

/**
 * resvg + sharp によるデフォルトのラスタライザを生成
 */
export function createSvgRasterizer(): Rasterizer {
  return async (source, iconSize, supersample) => {
    const content = await source.readContent()
    const svg = typeof content === 'string' ? content : Buffer.from(content)

    // システムフォントは読み込まない（実行環境で結果が変わらないように）
    const resvg = new Resvg(svg, {
      fitTo: { mode: 'width', value: iconSize * supersample },
      background: 'rgba(0,0,0,0)',
      font: { loadSystemFonts: false },
    })
    const rendered = resvg.render()

    // PNG 経由で渡してストレートアルファに戻す
    const { data, info } = await sharp(rendered.asPng())
      .ensureAlpha()
      .resize(iconSize, iconSize, {
        kernel: 'lanczos3',
        fit: 'contain',
        background: TRANSPARENT,
      })
      .raw()
      .toBuffer({ resolveWithObject: true })

    if (info.width !== iconSize || info.height !== iconSize || info.channels !== 4) {
      throw new Error(
        `Unexpected raster ${info.width}x${info.height}x${info.channels} for ${source.name}`,
      )
    }

    return {
      width: iconSize,
      height: iconSize,
      data: new Uint8ClampedArray(data),
    }
  }
}

/**
 * 描画できなかったアイコンの代替画像（不透明な白い正方形）
 */
export function createFallbackImage(iconSize: number): RgbaImage {
  return {
    width: iconSize,
    height: iconSize,
    data: new Uint8ClampedArray(iconSize * iconSize * 4).fill(255),
  }
}
