/**
 * アイコンフォルダの走査
 *
 * 入力ルート直下のサブフォルダを 1 カテゴリとして扱い、
 * ルート直下に置かれた SVG はルートフォルダ名のカテゴリにまとめる。
 * アイコンの並び順はここでは決めない（buildIconSet の責務）。
 */

import { readFile, readdir } from 'fs/promises'
import path from 'path'
import { err, ok, ResultAsync, type Result } from 'neverthrow'
import type { AtlasPackerError, IconSource } from '../types'

export interface CategorySource {
  /** フォルダ名 */
  name: string
  /** 出力フォルダ名 */
  slug: string
  icons: IconSource[]
}

const SVG_EXTENSION = '.svg'

/**
 * カテゴリを列挙
 *
 * @param inputRoot - アイコンフォルダのルート
 * @returns 名前順のカテゴリ一覧（SVG を含まないフォルダは除外）
 * 出力フォルダ名が重なるカテゴリがある場合は DISCOVERY_FAILED
 */
export function discoverCategories(
  inputRoot: string,
): ResultAsync<CategorySource[], AtlasPackerError> {
  const root = path.resolve(inputRoot)

  return ResultAsync.fromPromise(
    (async () => {
      const entries = await readdir(root, { withFileTypes: true })
      const categories: CategorySource[] = []

      const rootIcons = entries
        .filter((entry) => entry.isFile() && isSvgFile(entry.name))
        .map((entry) => fileIconSource(path.join(root, entry.name)))
      if (rootIcons.length > 0) {
        const name = path.basename(root)
        categories.push({ name, slug: slugify(name), icons: rootIcons })
      }

      for (const entry of entries) {
        if (!entry.isDirectory()) continue
        const dir = path.join(root, entry.name)
        const files = await readdir(dir, { withFileTypes: true })
        const icons = files
          .filter((file) => file.isFile() && isSvgFile(file.name))
          .map((file) => fileIconSource(path.join(dir, file.name)))
        if (icons.length === 0) continue
        categories.push({ name: entry.name, slug: slugify(entry.name), icons })
      }

      return categories.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    })(),
    (error) => ({
      type: 'DISCOVERY_FAILED' as const,
      message: `Failed to read icon folders under ${root}: ${String(error)}`,
    }),
  ).andThen(ensureUniqueSlugs)
}

function ensureUniqueSlugs(
  categories: CategorySource[],
): Result<CategorySource[], AtlasPackerError> {
  const seen = new Map<string, string>()
  for (const category of categories) {
    const other = seen.get(category.slug)
    if (other !== undefined) {
      return err({
        type: 'DISCOVERY_FAILED',
        message: `Categories "${other}" and "${category.name}" would both be written to "${category.slug}"`,
      })
    }
    seen.set(category.slug, category.name)
  }
  return ok(categories)
}

/**
 * ファイルを読み込む IconSource を作る
 * 名前はファイル名から拡張子を除いたもの
 */
export function fileIconSource(filePath: string): IconSource {
  return {
    name: path.basename(filePath, path.extname(filePath)),
    readContent: () => readFile(filePath),
  }
}

/**
 * カテゴリ名から出力フォルダ名を作る
 * `Generic Icons` -> `generic-icons`
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return slug || 'category'
}

function isSvgFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === SVG_EXTENSION
}
