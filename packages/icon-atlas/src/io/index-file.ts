/**
 * アイコン位置インデックスファイル
 *
 * 書式:
 * - `#` で始まる行はヘッダ（メタデータのみ、データ行として扱わない）
 * - データ行はタブ区切りで index, name, column, row, pixel_x, pixel_y
 * - データ行の順序はアトラスの配置順と同じ
 */

import { err, ok, type Result } from 'neverthrow'
import type { AtlasPackerError, GridLayout, IconSet, IndexEntry } from '../types'

export const INDEX_FIELDS = ['index', 'name', 'column', 'row', 'pixel_x', 'pixel_y'] as const

export interface IndexFileMeta {
  /** カテゴリ名 */
  category: string
  /** 対応するアトラス画像のファイル名 */
  atlasFile: string
}

/**
 * IconSet とレイアウトからインデックスエントリを作る
 */
export function buildIndexEntries(iconSet: IconSet, layout: GridLayout): IndexEntry[] {
  if (iconSet.icons.length !== layout.placements.length) {
    throw new Error(
      `Icon set has ${iconSet.icons.length} icons but layout has ${layout.placements.length} placements`,
    )
  }

  return layout.placements.map((placement) => ({
    index: placement.index,
    name: iconSet.icons[placement.index].name,
    column: placement.column,
    row: placement.row,
    x: placement.x,
    y: placement.y,
  }))
}

/**
 * インデックスファイルの内容を生成
 *
 * 並べ替え・除外・重複除去は行わない（アイコン 1 個につき 1 行）。
 */
export function formatIndex(iconSet: IconSet, layout: GridLayout, meta: IndexFileMeta): string {
  const entries = buildIndexEntries(iconSet, layout)
  const indexWidth = Math.max(3, String(Math.max(0, layout.count - 1)).length)

  const lines = [
    '# Icon atlas index',
    `# category: ${headerValue(meta.category)}`,
    `# icon size: ${layout.iconSize}x${layout.iconSize} px`,
    `# grid: ${layout.columns} columns x ${layout.rows} rows`,
    `# atlas size: ${layout.canvasWidth}x${layout.canvasHeight} px`,
    `# atlas file: ${headerValue(meta.atlasFile)}`,
    `# fields: ${INDEX_FIELDS.join('\t')}`,
  ]

  for (const entry of entries) {
    lines.push(
      [
        String(entry.index).padStart(indexWidth, '0'),
        entry.name,
        entry.column,
        entry.row,
        entry.x,
        entry.y,
      ].join('\t'),
    )
  }

  return `${lines.join('\n')}\n`
}

/** ヘッダ値は 1 行に収める */
function headerValue(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ')
}

/**
 * インデックスファイルを読み込む
 * ヘッダ行と空行は読み飛ばす
 */
export function parseIndex(text: string): Result<IndexEntry[], AtlasPackerError> {
  const entries: IndexEntry[] = []
  const lines = text.split(/\r?\n/)

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]
    if (line.trim() === '' || line.startsWith('#')) continue

    const fields = line.split('\t')
    if (fields.length !== INDEX_FIELDS.length) {
      return err({
        type: 'INDEX_PARSE_FAILED',
        message: `Expected ${INDEX_FIELDS.length} fields, got ${fields.length}`,
        line: i + 1,
      })
    }

    const [indexField, name, ...numberFields] = fields
    const numbers = [indexField, ...numberFields].map(parseNonNegativeInteger)
    const [index, column, row, x, y] = numbers
    if (
      index === null ||
      column === null ||
      row === null ||
      x === null ||
      y === null ||
      name === ''
    ) {
      return err({
        type: 'INDEX_PARSE_FAILED',
        message: `Malformed index record: ${line}`,
        line: i + 1,
      })
    }

    entries.push({ index, name, column, row, x, y })
  }

  return ok(entries)
}

function parseNonNegativeInteger(value: string): number | null {
  if (!/^\d+$/.test(value)) return null
  return parseInt(value, 10)
}
