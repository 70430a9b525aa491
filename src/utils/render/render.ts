// Render direction - canonical stream to SVG markup

import type { CanonicalPath, CanonicalStream } from '../../types/path'
import { RENDER_DEFAULTS } from '../../constants'
import { decodeSvgcom, formatCoordinate } from '../svgcom'
import type { RenderOptions } from './types'

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
}

/**
 * Split a command stream at every M; each run becomes its own element
 */
export function splitRuns(commands: CanonicalPath): CanonicalPath[] {
  const runs: CanonicalPath[] = []
  for (const cmd of commands) {
    if (cmd.type === 'M' || runs.length === 0) runs.push([])
    runs[runs.length - 1].push(cmd)
  }
  return runs
}

/**
 * SVG path data for canonical commands: "M x y", "L x y", "C x1 y1,x2 y2,x y", "Z"
 */
export function toPathData(commands: CanonicalPath): string {
  const f = formatCoordinate
  return commands.map((cmd): string => {
    switch (cmd.type) {
      case 'M':
        return `M${f(cmd.to.x)} ${f(cmd.to.y)}`
      case 'L':
        return `L${f(cmd.to.x)} ${f(cmd.to.y)}`
      case 'C':
        return `C${f(cmd.c1.x)} ${f(cmd.c1.y)},${f(cmd.c2.x)} ${f(cmd.c2.y)},${f(cmd.to.x)} ${f(cmd.to.y)}`
      case 'Z':
        return 'Z'
    }
  }).join('')
}

export function renderSvg(stream: CanonicalStream, options: RenderOptions = {}): string {
  const stroke = escapeAttribute(options.stroke ?? RENDER_DEFAULTS.STROKE)
  const strokeWidth = options.strokeWidth ?? RENDER_DEFAULTS.STROKE_WIDTH
  const runs = splitRuns(stream.commands)

  if (options.verbose) {
    console.log(`[svgcom] rendering ${runs.length} path element(s)`)
  }

  const lines = [
    '<?xml version="1.0" standalone="no"?>',
    `<svg version="1.1" xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${stream.viewBox.width} ${stream.viewBox.height}">`,
    ...runs.map(run =>
      `<path stroke="${stroke}" stroke-width="${strokeWidth}" fill="none" d="${toPathData(run)}"/>`
    ),
    '</svg>',
  ]
  return lines.join('\n') + '\n'
}

/**
 * Decode .svgcom text and render it. Format errors propagate.
 */
export function renderSvgcom(text: string, options: RenderOptions = {}): string {
  return renderSvg(decodeSvgcom(text, { verbose: options.verbose }), options)
}
