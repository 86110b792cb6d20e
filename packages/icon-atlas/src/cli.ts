#!/usr/bin/env node

import path from 'path'
import { Command } from 'commander'
import {
  DEFAULT_COLUMNS,
  DEFAULT_ICON_SIZES,
  DEFAULT_SUPERSAMPLE,
  discoverCategories,
  packCategories,
  parseSizeList,
  resolvePackerConfig,
} from './index'

interface PackCommandOptions {
  output: string
  columns: string
  sizes: string
  supersample: string
  manifest: boolean
}

const program = new Command()

program
  .command('pack <input>')
  .description('Pack SVG icon folders into texture atlases with a position index')
  .option('-o, --output <dir>', 'Output root directory', 'atlas')
  .option('-c, --columns <count>', 'Number of grid columns', String(DEFAULT_COLUMNS))
  .option('-s, --sizes <list>', 'Comma separated icon sizes in pixels', DEFAULT_ICON_SIZES.join(','))
  .option('--supersample <factor>', 'Render at size x factor before downsampling', String(DEFAULT_SUPERSAMPLE))
  .option('--manifest', 'Write atlas-manifest.json per category', false)
  .action(async (input: string, options: PackCommandOptions) => {
    try {
      const inputPath = path.resolve(input)
      const outputPath = path.resolve(options.output)

      console.log(`📁 Input:  ${inputPath}`)
      console.log(`📁 Output: ${outputPath}`)

      const configResult = resolvePackerConfig({
        columns: Number(options.columns),
        iconSizes: parseSizeList(options.sizes),
        supersample: Number(options.supersample),
        outputRoot: outputPath,
        writeManifest: options.manifest,
      })
      if (configResult.isErr()) {
        console.error(`❌ Error (${configResult.error.type}): ${configResult.error.message}`)
        process.exit(1)
      }
      const config = configResult.value

      console.log('🔍 Discovering icon folders...')
      const categoriesResult = await discoverCategories(inputPath)
      if (categoriesResult.isErr()) {
        console.error(`❌ Error (${categoriesResult.error.type}): ${categoriesResult.error.message}`)
        process.exit(1)
      }
      const categories = categoriesResult.value

      if (categories.length === 0) {
        console.log('ℹ️  No SVG icons found, nothing to pack')
        return
      }

      console.log(
        `⚙️  Packing ${categories.length} categories at ${config.iconSizes.join(', ')} px (${config.columns} columns, ${config.supersample}x supersampling)...`,
      )
      const reports = await packCategories(categories, config)

      let failed = 0
      for (const report of reports) {
        const label = `${report.category} @ ${report.iconSize}px`
        switch (report.status) {
          case 'written':
            console.log(
              `   ✅ ${label}: ${report.count} icons, ${report.columns}x${report.rows} grid -> ${path.relative(outputPath, report.atlasPath)}`,
            )
            if (report.warnings.length > 0) {
              console.log(`      ⚠️  ${report.warnings.length} icon(s) replaced with fallback`)
            }
            break
          case 'empty':
            console.log(`   ℹ️  ${label}: empty, skipped`)
            break
          case 'failed':
            failed++
            console.error(`   ❌ ${label}: Error (${report.error.type}): ${report.error.message}`)
            break
        }
      }

      if (failed > 0) {
        console.error(`\n❌ ${failed} of ${reports.length} jobs failed`)
        process.exit(1)
      }

      console.log(`\n✅ Packing complete! (${reports.length} jobs)`)
    } catch (error) {
      console.error(`\n❌ Unexpected error: ${String(error)}`)
      process.exit(1)
    }
  })

program
  .name('icon-atlas')
  .description('SVG icon texture atlas packer')
  .version('0.1.0')

program.parse(process.argv)
