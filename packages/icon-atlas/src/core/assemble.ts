/**
 * Core atlas assembler
 *
 * IconSet と GridConfig から、アトラス画像 1 枚分の RGBA データを生成する。
 * 各アイコンはレイアウトで決まったセルにだけ書き込まれ、
 * 配置は描画の完了順ではなく IconSet の順序で決まる。
 */

import { ok, ResultAsync, safeTry } from 'neverthrow'
import { drawIconsToAtlas } from '../atlas/draw-image-jimp'
import { computeGridLayout, validateGridConfig } from '../atlas/grid-layout'
import { normalizeToWhite } from '../image/normalize'
import { createFallbackImage, createSvgRasterizer, type Rasterizer } from '../image/rasterize'
import type {
  AtlasPackerError,
  GridConfig,
  GridLayout,
  IconSet,
  IconSource,
  Logger,
  RgbaImage,
  SourceUnrenderableWarning,
} from '../types'

export interface AssembleOptions {
  /** 省略時は resvg + sharp のラスタライザ */
  rasterizer?: Rasterizer
  logger?: Logger
}

export interface AssembledAtlas {
  layout: GridLayout
  /** アトラス画像。アイコンが 0 個の場合は 0x0 */
  image: RgbaImage
  /** 代替画像に差し替えたアイコン */
  warnings: SourceUnrenderableWarning[]
}

/**
 * アイコン集合をグリッド状のアトラス画像にまとめる
 *
 * @param iconSet - 並び順確定済みのアイコン集合
 * @param gridConfig - 列数・アイコンサイズ・スーパーサンプリング倍率
 */
export function assembleAtlas(
  iconSet: IconSet,
  gridConfig: GridConfig,
  options: AssembleOptions = {},
): ResultAsync<AssembledAtlas, AtlasPackerError> {
  const rasterizer = options.rasterizer ?? createSvgRasterizer()
  const logger = options.logger ?? console

  return safeTry(async function* () {
    yield* validateGridConfig(gridConfig)
    const layout = yield* computeGridLayout(
      iconSet.icons.length,
      gridConfig.columns,
      gridConfig.iconSize,
    )

    if (layout.count === 0) {
      return ok<AssembledAtlas>({
        layout,
        image: { width: 0, height: 0, data: new Uint8ClampedArray(0) },
        warnings: [],
      })
    }

    // 各アイコンは独立しているので並列に描画する
    const rendered = await Promise.all(
      iconSet.icons.map((icon, index) =>
        renderIcon(icon, index, gridConfig, rasterizer),
      ),
    )

    const warnings: SourceUnrenderableWarning[] = []
    const icons = rendered.map((result) => {
      if (result.warning) {
        logger.warn(`⚠️  ${result.warning.message}`)
        warnings.push(result.warning)
      }
      return normalizeToWhite(result.image)
    })

    return ok<AssembledAtlas>({
      layout,
      image: drawIconsToAtlas(layout, icons),
      warnings,
    })
  })
}

interface RenderedIcon {
  image: RgbaImage
  warning?: SourceUnrenderableWarning
}

async function renderIcon(
  icon: IconSource,
  index: number,
  gridConfig: GridConfig,
  rasterizer: Rasterizer,
): Promise<RenderedIcon> {
  const { iconSize, supersample } = gridConfig
  const fallback = (reason: string): RenderedIcon => ({
    image: createFallbackImage(iconSize),
    warning: {
      type: 'SOURCE_UNRENDERABLE',
      message: `Failed to render icon "${icon.name}" (index ${index}), using fallback: ${reason}`,
      index,
      name: icon.name,
    },
  })

  let image: RgbaImage
  try {
    image = await rasterizer(icon, iconSize, supersample)
  } catch (error) {
    return fallback(String(error))
  }

  if (
    image.width !== iconSize ||
    image.height !== iconSize ||
    image.data.length !== iconSize * iconSize * 4
  ) {
    return fallback(`rasterizer returned ${image.width}x${image.height}, expected ${iconSize}x${iconSize}`)
  }

  return { image }
}
