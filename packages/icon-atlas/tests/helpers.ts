import { mkdtemp } from 'fs/promises'
import os from 'os'
import path from 'path'
import { vi, type Mock } from 'vitest'
import type { Rasterizer } from '../src/image/rasterize'
import type { IconSource, Logger, RgbaImage } from '../src/types'

/**
 * テスト用のアイコン（中身は使わない）
 */
export function createIcon(name: string, content: string = '<svg/>'): IconSource {
  return {
    name,
    readContent: async () => content,
  }
}

export function createIcons(names: string[]): IconSource[] {
  return names.map((name) => createIcon(name))
}

/**
 * 単色の RGBA 画像を生成
 * @param color - RGBA カラー値（0xRRGGBBAA）
 */
export function createSolidImage(width: number, height: number, color: number): RgbaImage {
  const data = new Uint8ClampedArray(width * height * 4)
  const r = (color >>> 24) & 0xff
  const g = (color >>> 16) & 0xff
  const b = (color >>> 8) & 0xff
  const a = color & 0xff

  for (let i = 0; i < data.length; i += 4) {
    data[i] = r
    data[i + 1] = g
    data[i + 2] = b
    data[i + 3] = a
  }

  return { width, height, data }
}

/**
 * アイコン名ごとにアルファ値を変えた単色画像を返すラスタライザ
 * 色は (10, 20, 30) 固定、未指定の名前は alpha 255
 */
export function createAlphaRasterizer(
  alphaByName: Record<string, number>,
  failingNames: string[] = [],
): Rasterizer {
  return async (source, iconSize) => {
    if (failingNames.includes(source.name)) {
      throw new Error(`malformed svg: ${source.name}`)
    }
    const alpha = alphaByName[source.name] ?? 255
    return createSolidImage(iconSize, iconSize, (0x0a141e00 | alpha) >>> 0)
  }
}

export function pixelAt(image: RgbaImage, x: number, y: number): number[] {
  const i = (y * image.width + x) * 4
  return Array.from(image.data.slice(i, i + 4))
}

export interface MockLogger extends Logger {
  info: Mock
  warn: Mock
  error: Mock
}

export function createLogger(): MockLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

export function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix))
}
