import { err, ok, type Result } from 'neverthrow'
import { isPositiveInteger } from './atlas/grid-layout'
import type { AtlasPackerError, GridConfig } from './types'

/**
 * パッカー全体の設定
 * 実行開始時に 1 度だけ作り、以降は変更しない
 */
export interface PackerConfig {
  /** 列数 */
  readonly columns: number
  /** 生成するアイコンサイズ（ピクセル）。サイズごとに 1 枚のアトラスを作る */
  readonly iconSizes: readonly number[]
  /** スーパーサンプリング倍率 */
  readonly supersample: number
  /** 出力先ルート */
  readonly outputRoot: string
  /** カテゴリごとに atlas-manifest.json を書き出す */
  readonly writeManifest: boolean
}

export interface PackerConfigInput {
  columns?: number
  iconSizes?: readonly number[]
  supersample?: number
  outputRoot: string
  writeManifest?: boolean
}

export const DEFAULT_COLUMNS = 20
export const DEFAULT_ICON_SIZES: readonly number[] = [16, 24, 32, 64]
export const DEFAULT_SUPERSAMPLE = 4

/**
 * 設定値を検証して PackerConfig を作る
 *
 * iconSizes の重複は取り除き、指定順を保つ。
 */
export function resolvePackerConfig(
  input: PackerConfigInput,
): Result<PackerConfig, AtlasPackerError> {
  const columns = input.columns ?? DEFAULT_COLUMNS
  const iconSizes = input.iconSizes ?? DEFAULT_ICON_SIZES
  const supersample = input.supersample ?? DEFAULT_SUPERSAMPLE

  if (!isPositiveInteger(columns)) {
    return invalid(`columns must be a positive integer, got ${columns}`)
  }
  if (!isPositiveInteger(supersample)) {
    return invalid(`supersample must be a positive integer, got ${supersample}`)
  }
  if (iconSizes.length === 0) {
    return invalid('at least one icon size is required')
  }
  const badSize = iconSizes.find((size) => !isPositiveInteger(size))
  if (badSize !== undefined) {
    return invalid(`icon sizes must be positive integers, got ${badSize}`)
  }
  if (input.outputRoot.trim() === '') {
    return invalid('output root must not be empty')
  }

  return ok(
    Object.freeze({
      columns,
      iconSizes: Object.freeze([...new Set(iconSizes)]),
      supersample,
      outputRoot: input.outputRoot,
      writeManifest: input.writeManifest ?? false,
    }),
  )
}

/**
 * ジョブ 1 件分のグリッド設定
 */
export function gridConfigFor(config: PackerConfig, iconSize: number): GridConfig {
  return Object.freeze({
    columns: config.columns,
    iconSize,
    supersample: config.supersample,
  })
}

/**
 * `16,24,32` 形式のサイズ指定を数値配列にする
 * 数値として読めない要素は NaN のまま返し、検証は resolvePackerConfig に任せる
 */
export function parseSizeList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '')
    .map((part) => (/^\d+$/.test(part) ? parseInt(part, 10) : Number.NaN))
}

function invalid(message: string): Result<never, AtlasPackerError> {
  return err({ type: 'INVALID_CONFIG', message })
}
