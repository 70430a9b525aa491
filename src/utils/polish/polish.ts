// Polisher - drops sub-paths too short to be worth plotting

import type { CanonicalPath, ViewBox } from '../../types/path'
import { POLISH } from '../../constants'
import { viewBoxDiagonal } from '../geometry'
import { pathLength } from '../pathAnalysis'
import type { PolishOptions, PolishResult } from './types'

/**
 * Default threshold for a viewbox: a small fraction of its diagonal
 */
export function defaultMinLength(viewBox: ViewBox): number {
  return viewBoxDiagonal(viewBox.width, viewBox.height) * POLISH.MIN_LENGTH_RATIO
}

/**
 * Keep the sub-paths whose drawn length reaches the threshold.
 * Surviving sub-paths are returned as the same objects, untouched.
 */
export function polishPaths(
  subpaths: CanonicalPath[],
  viewBox: ViewBox,
  options: PolishOptions = {}
): PolishResult {
  const minLength = options.minLength ?? defaultMinLength(viewBox)
  const kept = subpaths.filter(path => pathLength(path) >= minLength)
  const removed = subpaths.length - kept.length

  if (options.verbose) {
    console.log(`[polish] kept ${kept.length} sub-path(s), removed ${removed} shorter than ${minLength}`)
  }

  return { subpaths: kept, removed }
}
