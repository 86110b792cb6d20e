/**
 * アイコンアトラス生成に必要な型を集約
 */

/**
 * アトラス化対象となる1つのベクターアイコン
 */
export interface IconSource {
  /** ファイル名から拡張子を除いた安定識別子 */
  name: string
  /** ベクターデータ（SVG）を返す非同期ローダー */
  readContent(): Promise<string | Uint8Array>
}

/**
 * 並び順の確定したアイコン集合
 * buildIconSet でのみ生成し、以降並べ替えない（この順序がインデックスになる）
 */
export interface IconSet {
  readonly icons: readonly IconSource[]
}

/**
 * 1ジョブ分のグリッド設定
 */
export interface GridConfig {
  /** 列数 */
  readonly columns: number
  /** アイコン1個の一辺（ピクセル） */
  readonly iconSize: number
  /** スーパーサンプリング倍率（レイアウト計算には使わない） */
  readonly supersample: number
}

/**
 * アイコンのグリッド内配置
 */
export interface Placement {
  index: number
  column: number
  row: number
  /** ピクセル原点 X */
  x: number
  /** ピクセル原点 Y */
  y: number
}

/**
 * グリッドレイアウトの計算結果
 */
export interface GridLayout {
  count: number
  columns: number
  rows: number
  iconSize: number
  canvasWidth: number
  canvasHeight: number
  placements: Placement[]
}

/**
 * RGBA ビットマップ（ストレートアルファ、1ピクセル4バイト）
 */
export interface RgbaImage {
  width: number
  height: number
  data: Uint8ClampedArray
}

/**
 * インデックスファイルの1レコード
 */
export interface IndexEntry {
  index: number
  name: string
  column: number
  row: number
  x: number
  y: number
}

/**
 * ラスタライズに失敗したアイコンの警告
 */
export interface SourceUnrenderableWarning {
  type: 'SOURCE_UNRENDERABLE'
  message: string
  index: number
  name: string
}

/**
 * エラー型定義
 * 型安全なエラーハンドリング用
 */
export type AtlasPackerError =
  | { type: 'INVALID_CONFIG'; message: string }
  | { type: 'DUPLICATE_IDENTIFIER'; message: string; name: string }
  | { type: 'INVALID_IDENTIFIER'; message: string; name: string }
  | { type: 'DISCOVERY_FAILED'; message: string }
  | { type: 'WRITE_FAILED'; message: string; path: string }
  | { type: 'INDEX_PARSE_FAILED'; message: string; line: number }
  | SourceUnrenderableWarning

/**
 * ログ出力先
 * 省略時は console を使用
 */
export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}
