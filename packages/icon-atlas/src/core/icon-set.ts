import { err, ok, type Result } from 'neverthrow'
import type { AtlasPackerError, IconSet, IconSource } from '../types'

const UNWRITABLE_NAME = /[\t\r\n]/

/**
 * アイコンの並び順を確定させて IconSet を作る
 *
 * 名前のコードユニット順で並べる（ロケールに依存しない）。
 * 同名のアイコンが 2 つ以上ある場合は設定エラー。
 * タブ・改行を含む名前はインデックスに書けないので受け付けない。
 *
 * @param sources - 走査で見つかったアイコン（順不同）
 */
export function buildIconSet(sources: readonly IconSource[]): Result<IconSet, AtlasPackerError> {
  const invalid = sources.find((source) => UNWRITABLE_NAME.test(source.name))
  if (invalid) {
    return err({
      type: 'INVALID_IDENTIFIER',
      message: `Icon name ${JSON.stringify(invalid.name)} contains a tab or line break`,
      name: invalid.name,
    })
  }

  const sorted = [...sources].sort((a, b) => compareNames(a.name, b.name))

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].name === sorted[i - 1].name) {
      return err({
        type: 'DUPLICATE_IDENTIFIER',
        message: `Icon name "${sorted[i].name}" is defined more than once`,
        name: sorted[i].name,
      })
    }
  }

  return ok({ icons: Object.freeze(sorted) })
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
