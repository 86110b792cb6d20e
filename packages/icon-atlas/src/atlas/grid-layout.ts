/**
 * 一様グリッドのレイアウト計算
 *
 * アイコン数・列数・アイコンサイズから行数、各アイコンのセル位置と
 * ピクセル原点、キャンバス全体のサイズを求めます。
 * アトラス画像とインデックスファイルは必ずこの同じ結果を参照します。
 */

import { err, ok, type Result } from 'neverthrow'
import type { AtlasPackerError, GridConfig, GridLayout, Placement } from '../types'

/**
 * グリッドレイアウトを計算
 *
 * 行優先（左→右、上→下）で配置します。
 * count が 0 の場合は rows = 0、キャンバス 0x0（書き出し不要）を返します。
 *
 * @param count - アイコン数
 * @param columns - 列数（1 以上）
 * @param iconSize - アイコン1個の一辺（1 以上）
 */
export function computeGridLayout(
  count: number,
  columns: number,
  iconSize: number,
): Result<GridLayout, AtlasPackerError> {
  if (!isPositiveInteger(columns)) {
    return err({
      type: 'INVALID_CONFIG',
      message: `columns must be a positive integer, got ${columns}`,
    })
  }
  if (!isPositiveInteger(iconSize)) {
    return err({
      type: 'INVALID_CONFIG',
      message: `iconSize must be a positive integer, got ${iconSize}`,
    })
  }
  if (!Number.isInteger(count) || count < 0) {
    return err({
      type: 'INVALID_CONFIG',
      message: `icon count must be a non-negative integer, got ${count}`,
    })
  }

  const rows = Math.ceil(count / columns)
  const placements: Placement[] = new Array(count)
  for (let i = 0; i < count; i++) {
    placements[i] = placementAt(i, columns, iconSize)
  }

  return ok({
    count,
    columns,
    rows,
    iconSize,
    canvasWidth: rows === 0 ? 0 : columns * iconSize,
    canvasHeight: rows * iconSize,
    placements,
  })
}

/**
 * ジョブ 1 件分のグリッド設定を検証
 * 列数・アイコンサイズ・スーパーサンプリング倍率はすべて 1 以上の整数
 */
export function validateGridConfig(gridConfig: GridConfig): Result<GridConfig, AtlasPackerError> {
  const fields = [
    ['columns', gridConfig.columns],
    ['iconSize', gridConfig.iconSize],
    ['supersample', gridConfig.supersample],
  ] as const

  for (const [field, value] of fields) {
    if (!isPositiveInteger(value)) {
      return err({
        type: 'INVALID_CONFIG',
        message: `${field} must be a positive integer, got ${value}`,
      })
    }
  }
  return ok(gridConfig)
}

/**
 * インデックス i のセル位置
 */
export function placementAt(index: number, columns: number, iconSize: number): Placement {
  const column = index % columns
  const row = Math.floor(index / columns)
  return {
    index,
    column,
    row,
    x: column * iconSize,
    y: row * iconSize,
  }
}

/** アトラス画像のファイル名（ランタイム側はこの名前で読み込む） */
export function atlasFileName(layout: Pick<GridLayout, 'columns' | 'rows' | 'iconSize'>): string {
  return `texture_atlas_${layout.columns}x${layout.rows}_${layout.iconSize}px.png`
}

/** インデックスファイルのファイル名 */
export function indexFileName(iconSize: number): string {
  return `icon_mapping_${iconSize}.txt`
}

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1
}
