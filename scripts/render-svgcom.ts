#!/usr/bin/env npx tsx
/**
 * Render a .svgcom file to SVG
 *
 * Run with: npx tsx scripts/render-svgcom.ts INPUT.svgcom OUTPUT.svg [--stroke COLOR] [--stroke-width N]
 */

import * as fs from 'fs'
import { renderSvgcom } from '../src/utils/render'
import { SvgcomError } from '../src/utils/errors'

function usage(): never {
  console.error('Usage: render-svgcom INPUT.svgcom OUTPUT.svg [--stroke COLOR] [--stroke-width N]')
  process.exit(2)
}

function main() {
  const args = process.argv.slice(2)
  const positional: string[] = []
  let stroke: string | undefined
  let strokeWidth: number | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--stroke') {
      stroke = args[++i]
      if (stroke === undefined) usage()
    } else if (arg === '--stroke-width') {
      strokeWidth = Number(args[++i])
      if (!(strokeWidth > 0)) usage()
    } else {
      positional.push(arg)
    }
  }

  if (positional.length !== 2) usage()
  const [inputPath, outputPath] = positional

  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`)
    process.exit(1)
  }

  try {
    const svg = renderSvgcom(fs.readFileSync(inputPath, 'utf-8'), { stroke, strokeWidth })
    fs.writeFileSync(outputPath, svg)
    console.log(`Wrote ${outputPath}`)
  } catch (err) {
    if (err instanceof SvgcomError) {
      console.error(`[svgcom] ${err.message}`)
      process.exit(1)
    }
    throw err
  }
}

main()
