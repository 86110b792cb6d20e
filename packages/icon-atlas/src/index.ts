/**
 * icon-atlas - SVG アイコンをグリッド状のテクスチャアトラスにまとめるライブラリ
 */

// メイン処理のエクスポート
export { packCategories, runAtlasJob, MANIFEST_FILE_NAME } from './core/pipeline'
export { assembleAtlas } from './core/assemble'
export { buildIconSet } from './core/icon-set'

// 個別の処理
export {
  atlasFileName,
  computeGridLayout,
  indexFileName,
  placementAt,
  validateGridConfig,
} from './atlas/grid-layout'
export { decodeAtlasPng, drawIconsToAtlas, encodeAtlasPng } from './atlas/draw-image-jimp'
export { normalizeToWhite } from './image/normalize'
export { createFallbackImage, createSvgRasterizer } from './image/rasterize'
export { buildIndexEntries, formatIndex, INDEX_FIELDS, parseIndex } from './io/index-file'
export { discoverCategories, fileIconSource, slugify } from './io/discover'
export { writeJobArtifacts } from './io/write'

// 設定
export {
  DEFAULT_COLUMNS,
  DEFAULT_ICON_SIZES,
  DEFAULT_SUPERSAMPLE,
  gridConfigFor,
  parseSizeList,
  resolvePackerConfig,
} from './config'

// Type exports
export type { PackerConfig, PackerConfigInput } from './config'
export type { AssembleOptions, AssembledAtlas } from './core/assemble'
export type { JobOutcome, JobReport, PipelineOptions } from './core/pipeline'
export type { Rasterizer } from './image/rasterize'
export type { CategorySource } from './io/discover'
export type { IndexFileMeta } from './io/index-file'
export type { JobArtifacts, WrittenArtifacts } from './io/write'
export type {
  AtlasPackerError,
  GridConfig,
  GridLayout,
  IconSet,
  IconSource,
  IndexEntry,
  Logger,
  Placement,
  RgbaImage,
  SourceUnrenderableWarning,
} from './types'
