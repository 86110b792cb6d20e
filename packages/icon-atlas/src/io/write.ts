import { mkdir, rm, writeFile } from 'fs/promises'
import path from 'path'
import { errAsync, ResultAsync } from 'neverthrow'
import type { AtlasPackerError } from '../types'

export interface JobArtifacts {
  outputDir: string
  atlasFile: string
  atlasPng: Uint8Array
  indexFile: string
  indexText: string
}

export interface WrittenArtifacts {
  atlasPath: string
  indexPath: string
}

/**
 * アトラス画像とインデックスファイルを書き出す
 *
 * アトラスかインデックスの書き込みに失敗した場合はアトラス画像を削除する。
 * 対応するインデックスのないアトラスは残さない。
 */
export function writeJobArtifacts(
  artifacts: JobArtifacts,
): ResultAsync<WrittenArtifacts, AtlasPackerError> {
  const atlasPath = path.join(artifacts.outputDir, artifacts.atlasFile)
  const indexPath = path.join(artifacts.outputDir, artifacts.indexFile)

  return writeStep(
    mkdir(artifacts.outputDir, { recursive: true }),
    artifacts.outputDir,
  )
    .andThen(() =>
      writeStep(writeFile(atlasPath, artifacts.atlasPng), atlasPath)
        .andThen(() => writeStep(writeFile(indexPath, artifacts.indexText, 'utf-8'), indexPath))
        .orElse((error) => failWithoutAtlas(atlasPath, error)),
    )
    .map(() => ({ atlasPath, indexPath }))
}

/**
 * 書きかけ、またはインデックスのないアトラスを削除してからエラーを返す
 */
function failWithoutAtlas(
  atlasPath: string,
  error: AtlasPackerError,
): ResultAsync<void, AtlasPackerError> {
  return discardAtlas(atlasPath).andThen((removed) =>
    errAsync<void, AtlasPackerError>(
      removed
        ? error
        : { ...error, message: `${error.message} (stale atlas left at ${atlasPath})` },
    ),
  )
}

/**
 * テキストファイルを書き出す（出力フォルダがなければ作る）
 */
export function writeTextFile(
  filePath: string,
  text: string,
): ResultAsync<string, AtlasPackerError> {
  return writeStep(mkdir(path.dirname(filePath), { recursive: true }), filePath)
    .andThen(() => writeStep(writeFile(filePath, text, 'utf-8'), filePath))
    .map(() => filePath)
}

function writeStep<T>(promise: Promise<T>, target: string): ResultAsync<T, AtlasPackerError> {
  return ResultAsync.fromPromise(promise, (error) => ({
    type: 'WRITE_FAILED' as const,
    message: `Failed to write ${target}: ${String(error)}`,
    path: target,
  }))
}

/** 削除できたかどうかを返す */
function discardAtlas(filePath: string): ResultAsync<boolean, never> {
  return ResultAsync.fromSafePromise(
    rm(filePath, { force: true }).then(
      () => true,
      () => false,
    ),
  )
}
