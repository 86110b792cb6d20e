/**
 * カテゴリ x アイコンサイズ単位のジョブ実行
 *
 * 1 ジョブ = IconSet 構築 → 描画・合成 → アトラス書き出し → インデックス書き出し。
 * ジョブ同士は状態を共有せず、1 つが失敗しても他のジョブは続行する。
 */

import path from 'path'
import { ok, okAsync, ResultAsync, safeTry } from 'neverthrow'
import { encodeAtlasPng } from '../atlas/draw-image-jimp'
import { atlasFileName, indexFileName, validateGridConfig } from '../atlas/grid-layout'
import { gridConfigFor, type PackerConfig } from '../config'
import type { Rasterizer } from '../image/rasterize'
import type { CategorySource } from '../io/discover'
import { formatIndex } from '../io/index-file'
import { writeJobArtifacts, writeTextFile } from '../io/write'
import type { AtlasPackerError, Logger, SourceUnrenderableWarning } from '../types'
import { assembleAtlas } from './assemble'
import { buildIconSet } from './icon-set'

export interface PipelineOptions {
  rasterizer?: Rasterizer
  logger?: Logger
}

/**
 * ジョブの成功結果
 */
export type JobOutcome =
  | {
    status: 'written'
    atlasPath: string
    indexPath: string
    count: number
    columns: number
    rows: number
    warnings: SourceUnrenderableWarning[]
  }
  | { status: 'empty' }

/**
 * packCategories が返すジョブごとのレポート
 */
export type JobReport = { category: string; iconSize: number } & (
  | JobOutcome
  | { status: 'failed'; error: AtlasPackerError }
)

export const MANIFEST_FILE_NAME = 'atlas-manifest.json'

/**
 * 1 カテゴリ・1 サイズ分のアトラスとインデックスを生成して書き出す
 *
 * アイコンが 0 個の場合は何も書き出さず `empty` を返す。
 */
export function runAtlasJob(
  category: CategorySource,
  iconSize: number,
  config: PackerConfig,
  options: PipelineOptions = {},
): ResultAsync<JobOutcome, AtlasPackerError> {
  const logger = options.logger ?? console

  return safeTry(async function* () {
    // 空カテゴリでも設定エラーは報告する
    const gridConfig = yield* validateGridConfig(gridConfigFor(config, iconSize))
    const iconSet = yield* buildIconSet(category.icons)

    if (iconSet.icons.length === 0) {
      logger.info(`ℹ️  ${category.name} (${iconSize}px): no icons found, skipping`)
      return ok<JobOutcome>({ status: 'empty' })
    }

    const atlas = yield* await assembleAtlas(iconSet, gridConfig, {
      rasterizer: options.rasterizer,
      logger,
    })

    const { layout } = atlas
    const atlasFile = atlasFileName(layout)
    const atlasPng = yield* await ResultAsync.fromPromise(
      encodeAtlasPng(atlas.image),
      (error) => ({
        type: 'WRITE_FAILED' as const,
        message: `Failed to encode ${atlasFile}: ${String(error)}`,
        path: atlasFile,
      }),
    )
    const indexText = formatIndex(iconSet, layout, { category: category.name, atlasFile })

    const written = yield* await writeJobArtifacts({
      outputDir: path.join(config.outputRoot, category.slug),
      atlasFile,
      atlasPng,
      indexFile: indexFileName(iconSize),
      indexText,
    })

    return ok<JobOutcome>({
      status: 'written',
      atlasPath: written.atlasPath,
      indexPath: written.indexPath,
      count: layout.count,
      columns: layout.columns,
      rows: layout.rows,
      warnings: atlas.warnings,
    })
  })
}

/**
 * 全カテゴリ x 全サイズのジョブを順番に実行
 *
 * @returns ジョブごとのレポート（カテゴリ順、サイズは設定順）
 */
export async function packCategories(
  categories: readonly CategorySource[],
  config: PackerConfig,
  options: PipelineOptions = {},
): Promise<JobReport[]> {
  const logger = options.logger ?? console
  const reports: JobReport[] = []

  for (const category of categories) {
    const categoryReports: JobReport[] = []

    for (const iconSize of config.iconSizes) {
      const result = await runAtlasJob(category, iconSize, config, options)
      const report: JobReport = result.match(
        (outcome) => ({ category: category.name, iconSize, ...outcome }),
        (error) => ({ category: category.name, iconSize, status: 'failed' as const, error }),
      )
      if (report.status === 'failed') {
        logger.error(`❌ ${category.name} (${iconSize}px): ${report.error.type}: ${report.error.message}`)
      }
      categoryReports.push(report)
    }

    if (config.writeManifest) {
      const manifestResult = await writeManifest(category, config, categoryReports)
      if (manifestResult.isErr()) {
        logger.error(`❌ ${category.name}: ${manifestResult.error.message}`)
      }
    }

    reports.push(...categoryReports)
  }

  return reports
}

/**
 * 書き出したアトラスの一覧を atlas-manifest.json に保存
 * 1 枚も書き出していないカテゴリでは何もしない
 */
function writeManifest(
  category: CategorySource,
  config: PackerConfig,
  reports: JobReport[],
): ResultAsync<void, AtlasPackerError> {
  const atlases = reports.flatMap((report) =>
    report.status === 'written'
      ? [
        {
          iconSize: report.iconSize,
          columns: report.columns,
          rows: report.rows,
          count: report.count,
          atlas: path.basename(report.atlasPath),
          index: path.basename(report.indexPath),
        },
      ]
      : [],
  )

  if (atlases.length === 0) {
    return okAsync(undefined)
  }

  const manifestPath = path.join(config.outputRoot, category.slug, MANIFEST_FILE_NAME)
  const manifest = { category: category.name, atlases }
  return writeTextFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`).map(() => undefined)
}
